import pino from "pino";

const redactPaths = ["headers.authorization", "*.headers.authorization"];

export type Logger = pino.Logger;

export interface LoggerOptions {
  file: string;
  level?: string;
}

/**
 * Opens (creating if needed) the append-only log file and returns a logger
 * bound to it. Throws when the file cannot be opened.
 *
 * stdout carries the MCP protocol, so nothing may be logged there.
 */
export function createLogger(options: LoggerOptions): Logger {
  const destination = pino.destination({
    dest: options.file,
    append: true,
    mkdir: true,
    sync: true,
  });

  return pino(
    {
      level: options.level ?? "debug",
      redact: {
        paths: redactPaths,
        censor: "[secure]",
      },
      base: undefined,
    },
    destination,
  );
}
