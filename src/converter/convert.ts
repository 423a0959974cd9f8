import { performance } from "perf_hooks";

import { logConversion, logConversionFailure } from "../logging/index.js";
import { StringOutput, XmlTextWriter, type XmlTextWriterOptions } from "../sinks/XmlTextWriter.js";
import { END_OF_STREAM } from "../types/json.js";

import { Converter, type ConverterOptions } from "./Converter.js";

import type { ConversionSummary } from "../types/index.js";
import type { JsonTokenSource } from "../types/json.js";
import type { XmlTokenSink } from "../types/xml.js";

export interface ConvertOptions extends ConverterOptions {
  /** Shown in conversion log lines */
  label?: string;
}

/**
 * Runs a whole conversion: pulls every XML token from a fresh Converter and
 * hands it to the sink, then flushes the sink. The first error, whether from
 * the converter, the source or the sink, stops the loop and is rethrown as is.
 */
export function convert(
  source: JsonTokenSource,
  sink: XmlTokenSink,
  options: ConvertOptions = {},
): ConversionSummary {
  const { label, ...converterOptions } = options;
  const converter = new Converter(source, converterOptions);
  const startedAt = performance.now();
  let tokenCount = 0;

  try {
    for (;;) {
      const token = converter.nextToken();
      if (token === END_OF_STREAM) {
        break;
      }
      sink.writeToken(token);
      tokenCount++;
    }
    sink.flush?.();
  } catch (error: unknown) {
    logConversionFailure(error, label);
    throw error;
  }

  const summary: ConversionSummary = {
    tokenCount,
    durationMs: performance.now() - startedAt,
  };
  logConversion(summary, label);
  return summary;
}

export type ConvertToStringOptions = ConvertOptions & Omit<XmlTextWriterOptions, "output">;

/** Converts a token stream to XML text in one go. */
export function convertToString(
  source: JsonTokenSource,
  options: ConvertToStringOptions = {},
): string {
  const { maxDepth, label, ...writerOptions } = options;
  const output = new StringOutput();
  const writer = new XmlTextWriter({ ...writerOptions, output });

  convert(source, writer, {
    ...(maxDepth !== undefined ? { maxDepth } : {}),
    ...(label !== undefined ? { label } : {}),
  });
  return output.toString();
}
