import type {
  ArrayEndToken,
  ArrayStartToken,
  BooleanToken,
  JsonToken,
  NullToken,
  NumberLiteralToken,
  NumberToken,
  ObjectEndToken,
  ObjectStartToken,
  StringToken,
} from "../types/json.js";

const OBJECT_START: ObjectStartToken = Object.freeze({ type: "objectStart" });
const OBJECT_END: ObjectEndToken = Object.freeze({ type: "objectEnd" });
const ARRAY_START: ArrayStartToken = Object.freeze({ type: "arrayStart" });
const ARRAY_END: ArrayEndToken = Object.freeze({ type: "arrayEnd" });
const NULL: NullToken = Object.freeze({ type: "null" });

/**
 * Token constructors for building JSON token streams by hand.
 *
 * @example
 * // {"a": [1, null]}
 * [JsonTokens.objectStart(), JsonTokens.string("a"), JsonTokens.arrayStart(),
 *  JsonTokens.number(1), JsonTokens.null(), JsonTokens.arrayEnd(), JsonTokens.objectEnd()]
 */
export const JsonTokens = {
  objectStart: (): ObjectStartToken => OBJECT_START,
  objectEnd: (): ObjectEndToken => OBJECT_END,
  arrayStart: (): ArrayStartToken => ARRAY_START,
  arrayEnd: (): ArrayEndToken => ARRAY_END,
  string: (value: string): StringToken => ({ type: "string", value }),
  /** Member keys are plain string tokens */
  key: (name: string): StringToken => ({ type: "string", value: name }),
  number: (value: number): NumberToken => ({ type: "number", value }),
  numberLiteral: (text: string): NumberLiteralToken => ({ type: "numberLiteral", text }),
  boolean: (value: boolean): BooleanToken => ({ type: "boolean", value }),
  null: (): NullToken => NULL,
} as const;

/** Short human-readable label of a token, for error messages and traces. */
export const describeToken = (token: unknown): string => {
  if (!isJsonToken(token)) {
    return describeUnknown(token);
  }

  switch (token.type) {
    case "string":
      return `string ${JSON.stringify(token.value)}`;
    case "number":
    case "boolean":
      return `${token.type} ${String(token.value)}`;
    case "numberLiteral":
      return `number ${token.text}`;
    case "objectStart":
      return "'{'";
    case "objectEnd":
      return "'}'";
    case "arrayStart":
      return "'['";
    case "arrayEnd":
      return "']'";
    case "null":
      return "null";
  }
};

const describeUnknown = (token: unknown): string => {
  if (typeof token === "object" && token !== null && "type" in token) {
    return `token type ${JSON.stringify(token.type)}`;
  }
  return typeof token;
};

/**
 * Checks the shape of a value handed over by a source. Sources written in
 * plain JavaScript can return anything, so the converter validates before
 * dispatching.
 */
export const isJsonToken = (value: unknown): value is JsonToken => {
  if (typeof value !== "object" || value === null || !("type" in value)) {
    return false;
  }

  switch (value.type) {
    case "objectStart":
    case "objectEnd":
    case "arrayStart":
    case "arrayEnd":
    case "null":
      return true;
    case "string":
      return "value" in value && typeof value.value === "string";
    case "number":
      return "value" in value && typeof value.value === "number";
    case "boolean":
      return "value" in value && typeof value.value === "boolean";
    case "numberLiteral":
      return "text" in value && typeof value.text === "string";
    default:
      return false;
  }
};
