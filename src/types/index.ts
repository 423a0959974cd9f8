/**
 * Type definitions index - exports all types used throughout jsonxml-stream
 */

export { END_OF_STREAM } from "./json.js";
export type {
  ArrayEndToken,
  ArrayStartToken,
  BooleanToken,
  EndOfStream,
  JsonDelimiterToken,
  JsonScalarToken,
  JsonToken,
  JsonTokenSource,
  JsonTokenType,
  JsonValue,
  NullToken,
  NumberLiteralToken,
  NumberToken,
  ObjectEndToken,
  ObjectStartToken,
  StringToken,
} from "./json.js";
export type * from "./xml.js";
export {
  ConversionError,
  InvalidKeyError,
  InvalidTokenError,
  MaxDepthExceededError,
  UnexpectedEndError,
  UnknownTokenError,
  XmlWriterError,
  isConversionError,
  type ConversionErrorCode,
} from "./errors.js";

/** Result of a completed `convert` run. */
export interface ConversionSummary {
  /** XML tokens handed to the sink */
  tokenCount: number;
  durationMs: number;
}

// Environment variables
declare global {
  namespace NodeJS {
    interface ProcessEnv {
      JSONXML_DEBUG?: string;
      JSONXML_MAX_DEPTH?: string;
    }
  }
}
