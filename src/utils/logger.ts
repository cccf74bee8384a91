export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/**
 * Console logger. Lines are prefixed with the component tag, e.g.
 * `[embed] 35 records in 3 batches`.
 */
export function createConsoleLogger(tag: string, options: { verbose?: boolean } = {}): Logger {
  const prefix = `[${tag}]`;

  return {
    debug(message: string): void {
      if (options.verbose) {
        console.log(`${prefix} ${message}`);
      }
    },
    info(message: string): void {
      console.log(`${prefix} ${message}`);
    },
    warn(message: string): void {
      console.warn(`${prefix} ${message}`);
    },
    error(message: string, error?: unknown): void {
      if (error === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}:`, error instanceof Error ? error.message : String(error));
      }
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
