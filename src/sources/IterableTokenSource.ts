import { END_OF_STREAM } from "../types/json.js";

import type { EndOfStream, JsonToken, JsonTokenSource } from "../types/json.js";

/**
 * JSON token source over any iterable: an array of tokens, a generator, or a
 * tokenizer that exposes `Symbol.iterator`. Once exhausted it keeps returning
 * END_OF_STREAM.
 */
export class IterableTokenSource implements JsonTokenSource {
  private readonly iterator: Iterator<JsonToken>;
  private exhausted = false;

  constructor(tokens: Iterable<JsonToken>) {
    this.iterator = tokens[Symbol.iterator]();
  }

  next(): JsonToken | EndOfStream {
    if (this.exhausted) {
      return END_OF_STREAM;
    }

    const result = this.iterator.next();
    if (result.done === true) {
      this.exhausted = true;
      return END_OF_STREAM;
    }
    return result.value;
  }
}
