/* eslint-disable no-console */

/** Structured logger handed to every server component. */
export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export function createConsoleLogger(namespace: string, env: NodeJS.ProcessEnv = process.env): Logger {
  const prefix = `[${namespace}]`;
  return {
    debug(message: string, meta?: unknown): void {
      if (env["DEBUG"]) {
        console.debug(prefix, message, meta ?? "");
      }
    },
    info(message: string, meta?: unknown): void {
      console.info(prefix, message, meta ?? "");
    },
    warn(message: string, meta?: unknown): void {
      console.warn(prefix, message, meta ?? "");
    },
    error(message: string, meta?: unknown): void {
      console.error(prefix, message, meta ?? "");
    }
  } satisfies Logger;
}

/** Logger that drops everything; used by tests that do not assert on logs. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
