/**
 * Console logger used by every component.
 *
 * Everything goes to stderr: stdout carries the MCP protocol when the
 * server runs over stdio.
 */

export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const PREFIX = "[session]";

function format(message: string, meta?: Record<string, unknown>): string {
  if (!meta || Object.keys(meta).length === 0) return `${PREFIX} ${message}`;
  return `${PREFIX} ${message} ${JSON.stringify(meta)}`;
}

export function createConsoleLogger(options: { quiet?: boolean } = {}): Logger {
  return {
    info(message, meta) {
      if (!options.quiet) console.error(format(message, meta));
    },
    warn(message, meta) {
      console.error(format(message, meta));
    },
    error(message, meta) {
      console.error(format(message, meta));
    },
  };
}

/** Logger that drops everything; the default for library use. */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};
