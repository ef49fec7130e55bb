/**
 * Console Logger
 *
 * Small prefixed logger used by the storage and CLI layers. Each line is
 * tagged with its source, e.g.
 * ```
 * [Storage] Loaded "B.Sc. Computer Science" (8 semesters, 26 modules) from ./data/program.json
 * [Storage] Duplicate module code "CS503" (2 modules)
 * ```
 * Debug lines are dropped unless `debug` is enabled. Warnings and errors
 * go to stderr so they never mix with rendered output.
 */

import { dim, red, yellow } from './cli/utils/terminal';

/**
 * Configuration options for a logger.
 */
export interface LoggerConfig {
  /** Tag printed in front of every line, e.g. '[Storage]' */
  prefix: string;
  /** Whether to prepend an ISO timestamp */
  includeTimestamp: boolean;
  /** Whether to color warnings and errors */
  colorize: boolean;
  /** Whether debug lines are printed */
  debug: boolean;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const DEFAULT_LOGGER_CONFIG: Omit<LoggerConfig, 'prefix'> = {
  includeTimestamp: false,
  colorize: process.env.NODE_ENV !== 'production',
  debug: Boolean(process.env.DEBUG),
};

/**
 * Creates a logger that tags each line with `prefix`.
 *
 * @example
 * ```typescript
 * const log = createLogger('[CLI]');
 * log.info('Saved.');
 * log.error('Save failed', error);
 * ```
 */
export function createLogger(prefix: string, config: Partial<Omit<LoggerConfig, 'prefix'>> = {}): Logger {
  const finalConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config, prefix };

  const format = (message: string): string => {
    const line = `${finalConfig.prefix} ${message}`;
    return finalConfig.includeTimestamp ? `${new Date().toISOString()} ${line}` : line;
  };
  const paint = (color: (s: string) => string, s: string): string =>
    finalConfig.colorize ? color(s) : s;

  return {
    debug(message) {
      if (finalConfig.debug) {
        console.log(paint(dim, format(message)));
      }
    },
    info(message) {
      console.log(format(message));
    },
    warn(message) {
      console.warn(paint(yellow, format(message)));
    },
    error(message, error) {
      const detail = error instanceof Error ? `: ${error.message}` : '';
      console.error(paint(red, format(`${message}${detail}`)));
      if (finalConfig.debug && error instanceof Error && error.stack) {
        console.error(paint(dim, error.stack));
      }
    },
  };
}
