import { IterableTokenSource } from "./IterableTokenSource.js";
import { JsonTokens } from "./jsonTokens.js";

import type { JsonToken, JsonValue } from "../types/json.js";

type Frame =
  | { kind: "array"; items: readonly JsonValue[]; index: number }
  | { kind: "object"; entries: ReadonlyArray<[string, JsonValue]>; index: number };

/** Token for `value`; containers also push the frame that walks their children. */
function enter(value: JsonValue, frames: Frame[]): JsonToken {
  if (value === null) {
    return JsonTokens.null();
  }
  if (Array.isArray(value)) {
    frames.push({ kind: "array", items: value, index: 0 });
    return JsonTokens.arrayStart();
  }

  switch (typeof value) {
    case "string":
      return JsonTokens.string(value);
    case "number":
      return JsonTokens.number(value);
    case "boolean":
      return JsonTokens.boolean(value);
    default:
      frames.push({ kind: "object", entries: Object.entries(value), index: 0 });
      return JsonTokens.objectStart();
  }
}

/**
 * Lazily walks an already-parsed value (e.g. the result of `JSON.parse`) and
 * yields its tokens in document order. Object members follow the key order of
 * `Object.keys`; numbers come out as float tokens.
 *
 * Open containers live on an explicit frame stack, so nesting depth is bounded
 * by memory and the converter's `maxDepth`, not by the call stack.
 */
export function* walkValue(root: JsonValue): Generator<JsonToken, void, undefined> {
  const frames: Frame[] = [];
  let value: JsonValue = root;

  for (;;) {
    yield enter(value, frames);

    // climb until some open container still has a child to visit
    for (;;) {
      const frame = frames[frames.length - 1];
      if (frame === undefined) {
        return;
      }

      if (frame.kind === "array") {
        if (frame.index < frame.items.length) {
          value = frame.items[frame.index++];
          break;
        }
        yield JsonTokens.arrayEnd();
      } else {
        if (frame.index < frame.entries.length) {
          const [key, member] = frame.entries[frame.index++];
          yield JsonTokens.key(key);
          value = member;
          break;
        }
        yield JsonTokens.objectEnd();
      }
      frames.pop();
    }
  }
}

/** Token source over an in-memory JSON value. */
export class ValueTokenSource extends IterableTokenSource {
  constructor(value: JsonValue) {
    super(walkValue(value));
  }
}
