import { getConfig, isConfigLoaded } from '../config/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Debug output follows the loaded config, falling back to the raw VERBOSE
 * variable when logging happens before loadConfig() (e.g. in library use).
 */
export function isVerboseEnabled(): boolean {
  if (isConfigLoaded()) {
    return getConfig().app.verbose;
  }
  return /^(1|true|yes)$/i.test(String(process.env.VERBOSE ?? ''));
}

/**
 * Creates a console logger whose lines are prefixed with `[scope]`.
 *
 * Console methods are looked up on every call, so Ink's console patching and
 * test doubles installed after import both see the output.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug: (message, ...details) => {
      if (!isVerboseEnabled()) return;
      console.log(prefix, message, ...details);
    },
    info: (message, ...details) => {
      console.info(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      console.error(prefix, message, ...details);
    },
  };
}

/**
 * Logger that drops everything; handy for callers embedding the pipeline
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
