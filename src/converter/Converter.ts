/**
 * Converter - JSON token stream to XML token stream
 *
 * Each JSON value becomes an element named after its kind:
 *
 *   {"Location": {"Longitude": -1.8262}}
 *
 * becomes
 *
 *   <object><object name="Location"><number name="Longitude">-1.8262</number></object></object>
 *
 * Object members carry their key as a `name` attribute; array items and the
 * top-level value carry none. Scalars take three tokens (start, char-data,
 * end) and null takes two (start, end).
 *
 * The only state kept between calls is the stack of open elements and one
 * pending char-data slot. A scalar or null element sits on top of the stack
 * for exactly the calls between its start and its end.
 */

import { MAX_DEPTH } from "../config.js";
import {
  BOOLEAN_TEXT,
  NAME_ATTRIBUTE,
  TYPE_TAG_TRAITS,
  isContainerTag,
  type ContainerTag,
  type TypeTag,
} from "../constants/typeTags.js";
import { logger } from "../logging/index.js";
import { describeToken, isJsonToken } from "../sources/jsonTokens.js";
import {
  InvalidKeyError,
  InvalidTokenError,
  MaxDepthExceededError,
  UnexpectedEndError,
  UnknownTokenError,
  type ConversionError,
} from "../types/errors.js";
import { END_OF_STREAM } from "../types/json.js";
import { formatFloat } from "../utils/numberFormat.js";

import type { EndOfStream, JsonToken, JsonTokenSource } from "../types/json.js";
import type { EndElementToken, StartElementToken, XmlAttribute, XmlToken } from "../types/xml.js";

export interface ConverterOptions {
  /** Maximum number of nested containers; defaults to `converter.maxDepth` */
  maxDepth?: number;
}

/**
 * - `idle`: next call reads from the source
 * - `awaitingClose`: a scalar or null element is open; next call ends it
 * - `hasPendingData`: next call emits the queued char-data
 */
export type ConverterState = "idle" | "awaitingClose" | "hasPendingData";

const NO_ATTRIBUTES: readonly XmlAttribute[] = Object.freeze([]);

export class Converter implements Iterable<XmlToken> {
  private readonly source: JsonTokenSource;
  private readonly maxDepth: number;
  private readonly types: TypeTag[] = [];
  private pending: string | null = null;

  constructor(source: JsonTokenSource, options: ConverterOptions = {}) {
    const maxDepth = options.maxDepth ?? MAX_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError(`maxDepth must be a positive integer. Got: ${String(maxDepth)}`);
    }

    this.source = source;
    this.maxDepth = maxDepth;
  }

  /** Number of elements currently open */
  get depth(): number {
    return this.types.length;
  }

  get state(): ConverterState {
    if (this.pending !== null) {
      return "hasPendingData";
    }
    const top = this.top();
    return top !== undefined && !isContainerTag(top) ? "awaitingClose" : "idle";
  }

  /**
   * Produces the next XML token, pulling from the source only when needed.
   * Returns END_OF_STREAM once the source is exhausted with nothing left open.
   * Throws a ConversionError on malformed input; errors thrown by the source
   * pass through untouched.
   */
  nextToken(): XmlToken | EndOfStream {
    if (this.pending !== null) {
      const data = this.pending;
      this.pending = null;
      return { type: "charData", data };
    }

    const top = this.top();
    if (top !== undefined && !isContainerTag(top)) {
      return this.closeTop();
    }

    let token = this.pull();
    if (token === END_OF_STREAM) {
      return this.finish();
    }

    let keyName: string | undefined;
    if (top === "object" && token.type !== "objectEnd") {
      if (token.type === "arrayEnd") {
        throw this.fail(new InvalidTokenError("']' does not close the open object", this.depth));
      }
      if (token.type !== "string") {
        throw this.fail(new InvalidKeyError(describeToken(token), this.depth));
      }

      keyName = token.value;
      token = this.pull();
      if (token === END_OF_STREAM) {
        throw this.fail(
          new UnexpectedEndError(`missing value for member ${JSON.stringify(keyName)}`, this.depth),
        );
      }
    }

    return this.dispatch(token, keyName);
  }

  *[Symbol.iterator](): Generator<XmlToken, void, undefined> {
    for (;;) {
      const token = this.nextToken();
      if (token === END_OF_STREAM) {
        return;
      }
      yield token;
    }
  }

  private dispatch(token: JsonToken, keyName: string | undefined): XmlToken {
    switch (token.type) {
      case "objectStart":
        return this.openElement("object", keyName);
      case "arrayStart":
        return this.openElement("array", keyName);
      case "objectEnd":
        return this.closeContainer("object", keyName);
      case "arrayEnd":
        return this.closeContainer("array", keyName);
      case "boolean":
        return this.openScalar("boolean", token.value ? BOOLEAN_TEXT.true : BOOLEAN_TEXT.false, keyName);
      case "number":
        if (!Number.isFinite(token.value)) {
          throw this.fail(new UnknownTokenError(describeToken(token), this.depth));
        }
        return this.openScalar("number", formatFloat(token.value), keyName);
      case "numberLiteral":
        return this.openScalar("number", token.text, keyName);
      case "string":
        return this.openScalar("string", token.value, keyName);
      case "null":
        return this.openScalar("null", null, keyName);
    }
  }

  private pull(): JsonToken | EndOfStream {
    const token: unknown = this.source.next();
    if (token === END_OF_STREAM) {
      return END_OF_STREAM;
    }
    if (!isJsonToken(token)) {
      throw this.fail(new UnknownTokenError(describeToken(token), this.depth));
    }
    return token;
  }

  private openScalar(tag: TypeTag, data: string | null, keyName: string | undefined): StartElementToken {
    this.pending = TYPE_TAG_TRAITS[tag].needsCharData ? data : null;
    return this.openElement(tag, keyName);
  }

  private openElement(tag: TypeTag, keyName: string | undefined): StartElementToken {
    if (isContainerTag(tag) && this.types.length >= this.maxDepth) {
      throw this.fail(new MaxDepthExceededError(this.maxDepth));
    }
    this.types.push(tag);

    return {
      type: "startElement",
      name: tag,
      attributes: keyName === undefined ? NO_ATTRIBUTES : [{ name: NAME_ATTRIBUTE, value: keyName }],
    };
  }

  private closeContainer(tag: ContainerTag, keyName: string | undefined): EndElementToken {
    const delimiter = tag === "object" ? "'}'" : "']'";

    if (keyName !== undefined) {
      throw this.fail(
        new InvalidTokenError(`${delimiter} where the value of member ${JSON.stringify(keyName)} was expected`, this.depth),
      );
    }

    const top = this.top();
    if (top === undefined) {
      throw this.fail(new InvalidTokenError(`${delimiter} with no open container`, this.depth));
    }
    if (top !== tag) {
      throw this.fail(new InvalidTokenError(`${delimiter} does not close the open ${top}`, this.depth));
    }

    return this.closeTop();
  }

  private closeTop(): EndElementToken {
    const tag = this.types.pop();
    if (tag === undefined) {
      throw new InvalidTokenError("end element with no open element", 0);
    }
    return { type: "endElement", name: tag };
  }

  private finish(): EndOfStream {
    const top = this.top();
    if (top !== undefined) {
      throw this.fail(new UnexpectedEndError(`${this.depth} unclosed element(s), innermost ${top}`, this.depth));
    }
    return END_OF_STREAM;
  }

  private top(): TypeTag | undefined {
    return this.types[this.types.length - 1];
  }

  private fail(error: ConversionError): ConversionError {
    logger.debug(`[CONVERTER] ${error.name} at depth ${this.depth}: ${error.message}`);
    return error;
  }
}
