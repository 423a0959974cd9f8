/**
 * Logging Module
 *
 * Every log line of the library goes through here.
 */

export { default as logger } from "./logger.js";
export type { Logger } from "./configLogger.js";
export { logConversion, logConversionFailure } from "./conversionLogger.js";
