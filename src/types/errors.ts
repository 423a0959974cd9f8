export type ConversionErrorCode =
  | "INVALID_KEY"
  | "UNKNOWN_TOKEN"
  | "INVALID_TOKEN"
  | "UNEXPECTED_END"
  | "MAX_DEPTH_EXCEEDED";

// Error types for conversion. Source and sink errors are never wrapped in these.
export class ConversionError extends Error {
  constructor(
    message: string,
    public code: ConversionErrorCode,
    public depth?: number,
  ) {
    super(message);
    this.name = "ConversionError";
  }
}

/** A member key inside an object was not a string token. */
export class InvalidKeyError extends ConversionError {
  constructor(found: string, depth: number) {
    super(`invalid key type: expected string, found ${found}`, "INVALID_KEY", depth);
    this.name = "InvalidKeyError";
  }
}

export class UnknownTokenError extends ConversionError {
  constructor(found: string, depth: number) {
    super(`unknown token type: ${found}`, "UNKNOWN_TOKEN", depth);
    this.name = "UnknownTokenError";
  }
}

/** A close token that does not match the open container, or has none to close. */
export class InvalidTokenError extends ConversionError {
  constructor(detail: string, depth: number) {
    super(`invalid token: ${detail}`, "INVALID_TOKEN", depth);
    this.name = "InvalidTokenError";
  }
}

export class UnexpectedEndError extends ConversionError {
  constructor(detail: string, depth: number) {
    super(`unexpected end of token stream: ${detail}`, "UNEXPECTED_END", depth);
    this.name = "UnexpectedEndError";
  }
}

export class MaxDepthExceededError extends ConversionError {
  constructor(maxDepth: number) {
    super(`nesting exceeds the maximum depth of ${maxDepth}`, "MAX_DEPTH_EXCEEDED", maxDepth);
    this.name = "MaxDepthExceededError";
  }
}

/** Raised by XmlTextWriter when the tokens it receives are not balanced. */
export class XmlWriterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "XmlWriterError";
  }
}

export function isConversionError(value: unknown): value is ConversionError {
  return value instanceof ConversionError;
}
