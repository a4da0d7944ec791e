/**
 * ReportCalc – Utils / logger
 *
 * pino logger factory. Level comes from LOG_LEVEL (default "info"); output
 * is JSON on stdout, pretty-printed when NODE_ENV=development. Components
 * take a logger through their options and log through a child carrying a
 * `component` binding.
 *
 * License: Apache-2.0
 */

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

const SERVICE_NAME = 'reportcalc';

function buildTransport(): pino.TransportSingleOptions | undefined {
  if (process.env.NODE_ENV !== 'development') return undefined;

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export interface CreateLoggerOptions {
  /** Overrides LOG_LEVEL. */
  level?: string;
  name?: string;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const config: LoggerOptions = {
    name: options.name ?? SERVICE_NAME,
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: buildTransport(),
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        host: bindings.hostname,
        service: SERVICE_NAME,
      }),
    },
  };

  return pino(config);
}

let rootLogger: Logger | undefined;

/**
 * Shared process logger, created on first use.
 */
export function getLogger(): Logger {
  rootLogger ??= createLogger();
  return rootLogger;
}

/**
 * Child of `parent` (or of the shared logger) bound to a component name.
 */
export function componentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? getLogger()).child({ component });
}
