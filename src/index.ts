import { validateConfig } from "./config.js";

/**
 * Public entrypoint of jsonxml-stream.
 *
 * - `Converter` / `convert` : the JSON token → XML token state machine and its driving loop
 * - `convertToString`      : one-shot conversion to XML text
 * - `createXmlTextStream`  : the same text as a Node.js Readable
 * - sources                : `IterableTokenSource`, `ValueTokenSource`, `JsonTokens`
 * - sinks                  : `XmlTextWriter`, `StringOutput`, `TokenCollector`
 */

validateConfig();

export { Converter, convert, convertToString } from "./converter/index.js";
export type {
  ConverterOptions,
  ConverterState,
  ConvertOptions,
  ConvertToStringOptions,
} from "./converter/index.js";
export { TYPE_TAGS, NAME_ATTRIBUTE, type TypeTag } from "./constants/typeTags.js";
export { createXmlTextStream, generateXmlText, type XmlTextStreamOptions } from "./handlers/stream/xmlTextStream.js";
export { IterableTokenSource } from "./sources/IterableTokenSource.js";
export { ValueTokenSource, walkValue } from "./sources/ValueTokenSource.js";
export { JsonTokens, describeToken, isJsonToken } from "./sources/jsonTokens.js";
export { TokenCollector } from "./sinks/TokenCollector.js";
export { StringOutput, XmlTextWriter, XML_DECLARATION, type XmlTextWriterOptions } from "./sinks/XmlTextWriter.js";
export { escapeAttribute, escapeText } from "./sinks/xmlEscape.js";
export { formatFloat } from "./utils/numberFormat.js";
export {
  END_OF_STREAM,
  ConversionError,
  InvalidKeyError,
  InvalidTokenError,
  MaxDepthExceededError,
  UnexpectedEndError,
  UnknownTokenError,
  XmlWriterError,
  isConversionError,
} from "./types/index.js";
export type {
  ConversionErrorCode,
  ConversionSummary,
  EndOfStream,
  JsonToken,
  JsonTokenSource,
  JsonTokenType,
  JsonValue,
  TextOutput,
  XmlAttribute,
  XmlToken,
  XmlTokenSink,
} from "./types/index.js";
