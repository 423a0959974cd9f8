/**
 * Node.js stream adapter: serialized XML text as a Readable.
 *
 * Text is produced lazily, one XML token at a time, as the consumer reads,
 * so a slow consumer never makes the converter run ahead of it.
 */

import { Readable } from "stream";
import { performance } from "perf_hooks";

import { Converter } from "../../converter/Converter.js";
import { logConversion, logConversionFailure, logger } from "../../logging/index.js";
import { StringOutput, XmlTextWriter } from "../../sinks/XmlTextWriter.js";

import type { ConvertToStringOptions } from "../../converter/convert.js";
import type { JsonTokenSource } from "../../types/json.js";

export type XmlTextStreamOptions = ConvertToStringOptions;

/**
 * Yields the XML text for each converted token. Errors from the converter,
 * the source or the writer are thrown from the generator unchanged.
 */
export function* generateXmlText(
  source: JsonTokenSource,
  options: XmlTextStreamOptions = {},
): Generator<string, void, undefined> {
  const { maxDepth, label, ...writerOptions } = options;
  const output = new StringOutput();
  const writer = new XmlTextWriter({ ...writerOptions, output });
  const converter = new Converter(source, maxDepth !== undefined ? { maxDepth } : {});
  const startedAt = performance.now();
  let tokenCount = 0;

  try {
    for (const token of converter) {
      writer.writeToken(token);
      tokenCount++;

      const text = output.take();
      if (text !== "") {
        yield text;
      }
    }
    writer.flush();
  } catch (error: unknown) {
    logConversionFailure(error, label);
    throw error;
  }

  logConversion({ tokenCount, durationMs: performance.now() - startedAt }, label);
}

/**
 * Readable of XML text chunks (strings). A conversion error destroys the
 * stream and surfaces as its `error` event.
 */
export function createXmlTextStream(
  source: JsonTokenSource,
  options: XmlTextStreamOptions = {},
): Readable {
  logger.debug("[XML STREAM] Creating XML text stream");
  return Readable.from(generateXmlText(source, options));
}
