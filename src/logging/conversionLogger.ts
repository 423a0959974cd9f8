import chalk, { type ChalkInstance } from "chalk";

import { LOG_CONVERSIONS } from "../config.js";
import { isConversionError } from "../types/errors.js";

import logger from "./logger.js";

import type { Logger } from "./configLogger.js";
import type { ConversionSummary } from "../types/index.js";

const DEFAULT_LABEL = "json→xml";

export interface ConversionLogger {
  logConversion(summary: ConversionSummary, label?: string): void;
  logConversionFailure(err: unknown, label?: string): void;
}

export interface ConversionLoggerOptions {
  enabled: boolean;
  output: Pick<Logger, "info" | "warn">;
  colors?: ChalkInstance;
}

function formatDuration(durationMs: number): string {
  if (durationMs < 1) {
    return `${(durationMs * 1000).toFixed(0)}µs`;
  }
  return `${durationMs.toFixed(1)}ms`;
}

/**
 * One-line summaries of finished and failed conversions: successes on
 * `output.info`, failures on `output.warn`. Silent when not enabled.
 */
export function createConversionLogger(options: ConversionLoggerOptions): ConversionLogger {
  const { enabled, output, colors = chalk } = options;

  return {
    logConversion(summary, label = DEFAULT_LABEL) {
      if (!enabled) {return;}

      const timestamp = new Date().toISOString();
      output.info(
        `${colors.blue("⮑")} ${colors.dim(timestamp)} ${colors.yellow(label)} ` +
          `${colors.green(`${summary.tokenCount} tokens`)} ${colors.dim("in")} ` +
          colors.magenta(formatDuration(summary.durationMs)),
      );
    },

    logConversionFailure(err, label = DEFAULT_LABEL) {
      if (!enabled) {return;}

      const code = isConversionError(err) ? err.code : "SOURCE_OR_SINK";
      const message = err instanceof Error ? err.message : String(err);
      output.warn(`${colors.red("✗")} ${colors.yellow(label)} ${colors.red(code)} ${message}`);
    },
  };
}

/** Bound to `logging.logConversions` and the shared logger. */
export const { logConversion, logConversionFailure } = createConversionLogger({
  enabled: LOG_CONVERSIONS,
  output: logger,
});
