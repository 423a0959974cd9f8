import "dotenv/config";
import { readFileSync } from "fs";
import { join } from "path";

import { createLogger } from "./logging/configLogger.js";

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export interface JsonXmlConfig {
  logging: {
    debugMode: boolean;
    logConversions: boolean;
  };
  converter: {
    maxDepth: number;
  };
  writer: {
    indent: string;
    prefix: string;
    xmlDeclaration: boolean;
  };
}

export const DEFAULT_CONFIG: JsonXmlConfig = {
  logging: {
    debugMode: false,
    logConversions: false,
  },
  converter: {
    // Same nesting ceiling as common JSON decoders
    maxDepth: 10_000,
  },
  writer: {
    indent: "",
    prefix: "",
    xmlDeclaration: false,
  },
};

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

function getEnv(env: ConfigEnv, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  return value;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Reads `config.json`; a missing file means "no overrides". */
export function loadConfigFromFile(
  configPath: string = join(process.cwd(), "config.json"),
): DeepPartial<JsonXmlConfig> {
  try {
    // Field types are checked by validateConfig()
    return JSON.parse(readFileSync(configPath, "utf8")) as DeepPartial<JsonXmlConfig>;
  } catch (error: unknown) {
    if (!isMissingFile(error)) {
      // Can't use logger here as it's not created yet
      console.warn(`[CONFIG] Unable to load ${configPath} (${error instanceof Error ? error.message : "Unknown error"}). Using defaults.`);
    }
    return {};
  }
}

/**
 * Merges file settings over DEFAULT_CONFIG section by section, then applies
 * JSONXML_DEBUG and JSONXML_MAX_DEPTH from `env`.
 */
export function resolveConfig(
  fileConfig: DeepPartial<JsonXmlConfig>,
  env: ConfigEnv = process.env,
): JsonXmlConfig {
  const envDebug = getEnv(env, "JSONXML_DEBUG");
  const envMaxDepth = getEnv(env, "JSONXML_MAX_DEPTH");

  return {
    logging: {
      debugMode: envDebug !== undefined
        ? envDebug.toLowerCase() === "true"
        : fileConfig.logging?.debugMode ?? DEFAULT_CONFIG.logging.debugMode,
      logConversions: fileConfig.logging?.logConversions ?? DEFAULT_CONFIG.logging.logConversions,
    },
    converter: {
      maxDepth: envMaxDepth !== undefined
        ? Number(envMaxDepth)
        : fileConfig.converter?.maxDepth ?? DEFAULT_CONFIG.converter.maxDepth,
    },
    writer: {
      indent: fileConfig.writer?.indent ?? DEFAULT_CONFIG.writer.indent,
      prefix: fileConfig.writer?.prefix ?? DEFAULT_CONFIG.writer.prefix,
      xmlDeclaration: fileConfig.writer?.xmlDeclaration ?? DEFAULT_CONFIG.writer.xmlDeclaration,
    },
  };
}

export const config: JsonXmlConfig = resolveConfig(loadConfigFromFile());

const logger = createLogger(config.logging.debugMode);

// ============================================================================
// LOGGING (config.json, JSONXML_DEBUG overrides debugMode)
// ============================================================================

export const DEBUG_MODE = config.logging.debugMode;
export const LOG_CONVERSIONS = config.logging.logConversions;

// ============================================================================
// CONVERTER (config.json, JSONXML_MAX_DEPTH overrides maxDepth)
// ============================================================================

export const MAX_DEPTH = config.converter.maxDepth;

// ============================================================================
// XML WRITER DEFAULTS (config.json)
// ============================================================================

export const WRITER_INDENT = config.writer.indent;
export const WRITER_PREFIX = config.writer.prefix;
export const WRITER_XML_DECLARATION = config.writer.xmlDeclaration;

function checkType(errors: string[], path: string, value: unknown, type: "boolean" | "string"): boolean {
  if (typeof value !== type) {
    errors.push(`${path} must be a ${type}. Got: ${JSON.stringify(value)}`);
    return false;
  }
  return true;
}

/** Every problem with `candidate`, in a stable order; empty when it is valid. */
export function collectConfigErrors(candidate: JsonXmlConfig): string[] {
  const errors: string[] = [];

  checkType(errors, "logging.debugMode", candidate.logging.debugMode, "boolean");
  checkType(errors, "logging.logConversions", candidate.logging.logConversions, "boolean");

  const { maxDepth } = candidate.converter;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    errors.push(`converter.maxDepth must be a positive integer. Got: ${String(maxDepth)}`);
  }

  if (checkType(errors, "writer.indent", candidate.writer.indent, "string") && /[^ \t]/.test(candidate.writer.indent)) {
    errors.push("writer.indent may only contain spaces and tabs");
  }

  if (checkType(errors, "writer.prefix", candidate.writer.prefix, "string") && /[^ \t]/.test(candidate.writer.prefix)) {
    errors.push("writer.prefix may only contain spaces and tabs");
  }

  checkType(errors, "writer.xmlDeclaration", candidate.writer.xmlDeclaration, "boolean");

  return errors;
}

export function validateConfig(candidate: JsonXmlConfig = config): void {
  const errors = collectConfigErrors(candidate);

  if (errors.length > 0) {
    const errorMessage = `Configuration validation failed:\n${errors.map((error) => `- ${error}`).join("\n")}`;
    logger.error(errorMessage);
    throw new Error(errorMessage);
  }

  logger.debug("jsonxml-stream configuration:");
  logger.debug(`  Debug Mode: ${candidate.logging.debugMode ? "ENABLED" : "DISABLED"}`);
  logger.debug(`  Log Conversions: ${candidate.logging.logConversions ? "YES" : "NO"}`);
  logger.debug(`  Max Depth: ${candidate.converter.maxDepth}`);
  logger.debug(`  Writer Indent: ${JSON.stringify(candidate.writer.indent)}`);
  logger.debug(`  Writer Prefix: ${JSON.stringify(candidate.writer.prefix)}`);
  logger.debug(`  XML Declaration: ${candidate.writer.xmlDeclaration ? "YES" : "NO"}`);
}
