/**
 * JSON token stream types
 */

/** Signals that a token source has no more tokens. Not an error. */
export const END_OF_STREAM: unique symbol = Symbol("jsonxml.endOfStream");
export type EndOfStream = typeof END_OF_STREAM;

export interface ObjectStartToken { type: "objectStart" }
export interface ObjectEndToken { type: "objectEnd" }
export interface ArrayStartToken { type: "arrayStart" }
export interface ArrayEndToken { type: "arrayEnd" }

/** A string value, or a member key when read inside an open object. */
export interface StringToken {
  type: "string";
  value: string;
}

/** A number already decoded to a float; formatted on output. */
export interface NumberToken {
  type: "number";
  value: number;
}

/**
 * A number kept in its source text, e.g. "1.50" or "12345678901234567890".
 * Passed through verbatim, so prefer it whenever the tokenizer can keep it.
 */
export interface NumberLiteralToken {
  type: "numberLiteral";
  text: string;
}

export interface BooleanToken {
  type: "boolean";
  value: boolean;
}

export interface NullToken { type: "null" }

export type JsonDelimiterToken = ObjectStartToken | ObjectEndToken | ArrayStartToken | ArrayEndToken;

export type JsonScalarToken = StringToken | NumberToken | NumberLiteralToken | BooleanToken | NullToken;

export type JsonToken = JsonDelimiterToken | JsonScalarToken;

export type JsonTokenType = JsonToken["type"];

/**
 * Pull-based producer of JSON tokens in document order. A source may throw;
 * its errors reach the caller unchanged.
 */
export interface JsonTokenSource {
  next(): JsonToken | EndOfStream;
}

/** Any value `JSON.parse` can return. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };
