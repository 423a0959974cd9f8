export interface Logger {
  debug: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
}

export interface OutputStream {
  write(text: string): unknown;
}

export interface LoggerStreams {
  stdout: OutputStream;
  stderr: OutputStream;
}

function formatArgs(args: unknown[]): string {
  return args
    .map((arg) => (arg instanceof Error ? arg.stack ?? arg.message : String(arg)))
    .join(" ");
}

function writeLine(stream: OutputStream, args: unknown[]): void {
  stream.write(`${formatArgs(args)}\n`);
}

/**
 * Builds a logger bound to a debug flag. The flag may come straight from an
 * environment variable, so the string "true" (any case) also enables it.
 * debug and info go to stdout; warn and error to stderr.
 */
export function createLogger(
  debugMode: boolean | string = false,
  streams: LoggerStreams = { stdout: process.stdout, stderr: process.stderr },
): Logger {
  const isDebugEnabled =
    typeof debugMode === "string" ? debugMode.toLowerCase() === "true" : debugMode;

  return {
    debug: (...args: unknown[]) => {
      if (isDebugEnabled) {
        writeLine(streams.stdout, args);
      }
    },
    error: (...args: unknown[]) => writeLine(streams.stderr, args),
    warn: (...args: unknown[]) => writeLine(streams.stderr, args),
    info: (...args: unknown[]) => writeLine(streams.stdout, args),
  };
}
