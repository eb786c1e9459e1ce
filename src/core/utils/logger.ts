/**
 * Logger
 *
 * Core modules take a `Logger` by injection and default to the no-op logger.
 * The CLI logger writes to stderr so stdout stays free for command output
 * (JSON from `discover`, tool lists from `tools`).
 */

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, error?: unknown) => void;
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const isDebug = process.env.DEBUG === 'true' || process.env.DEBUG === '1';

export const logger: Logger = {
  info: (message: string, ...args: unknown[]) => {
    console.error(`[INFO] ${message}`, ...args);
  },

  warn: (message: string, ...args: unknown[]) => {
    console.error(`[WARN] ${message}`, ...args);
  },

  error: (message: string, error?: unknown) => {
    if (error instanceof Error) {
      console.error(`[ERROR] ${message}:`, error.message);
      if (isDebug && error.stack) {
        console.error(error.stack);
      }
    } else if (error !== undefined) {
      console.error(`[ERROR] ${message}:`, error);
    } else {
      console.error(`[ERROR] ${message}`);
    }
  },

  debug: (message: string, ...args: unknown[]) => {
    if (isDebug) {
      console.error(`[DEBUG] ${message}`, ...args);
    }
  },
};

/**
 * Shorten a secret for log output.
 */
export function redact(value: string | undefined | null, visible = 8): string {
  if (!value) return '(none)';
  return value.length <= visible ? `${value.slice(0, 2)}...` : `${value.slice(0, visible)}...`;
}
