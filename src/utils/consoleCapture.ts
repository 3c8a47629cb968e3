import { format } from 'node:util';

export type ConsoleLevel = 'log' | 'info' | 'warn' | 'error';

export interface ConsoleEntry {
  level: ConsoleLevel;
  message: string;
}

export type ConsoleListener = (entry: ConsoleEntry) => void;

export interface SubscribeOptions {
  levels?: ConsoleLevel[];
  predicate?: (entry: ConsoleEntry) => boolean;
}

const LEVELS: ConsoleLevel[] = ['log', 'info', 'warn', 'error'];

const listeners = new Set<ConsoleListener>();

type ConsoleMethod = (...args: unknown[]) => void;

/** Console methods in place before patching; null while unpatched */
let originals: Record<ConsoleLevel, ConsoleMethod> | null = null;

function patchConsole(): void {
  if (originals) {
    return;
  }

  originals = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };

  for (const level of LEVELS) {
    const original = originals[level];
    const toStderr = level === 'warn' || level === 'error';

    console[level] = (...args: unknown[]) => {
      const message = format(...args);
      if (message) {
        for (const listener of listeners) {
          listener({ level, message });
        }
      }

      // The TUI owns the terminal; elsewhere (pipes, CI) keep the output visible
      const stream = toStderr ? process.stderr : process.stdout;
      if (!stream.isTTY) {
        original.apply(console, args);
      }
    };
  }
}

/**
 * Routes console output to `listener` while the Ink app is mounted.
 * Returns an unsubscribe function.
 */
export function subscribeToConsole(listener: ConsoleListener, options?: SubscribeOptions): () => void {
  patchConsole();

  const filtered: ConsoleListener = (entry) => {
    if (options?.levels && !options.levels.includes(entry.level)) {
      return;
    }
    if (options?.predicate && !options.predicate(entry)) {
      return;
    }
    listener(entry);
  };

  listeners.add(filtered);
  return () => {
    listeners.delete(filtered);
  };
}

/**
 * Puts the original console methods back and drops every listener
 */
export function restoreConsole(): void {
  if (!originals) {
    return;
  }

  for (const level of LEVELS) {
    console[level] = originals[level];
  }
  originals = null;
  listeners.clear();
}
