/**
 * Process-wide registry of report temp files. Anything still registered when
 * the process exits (normally or on SIGINT/SIGTERM) is deleted.
 */

import { rmSync } from 'node:fs';

const tempFiles = new Set<string>();

let handlersRegistered = false;

/**
 * Register a temporary file for cleanup on process exit
 */
export function registerTempFile(filePath: string): void {
  tempFiles.add(filePath);

  // Handlers are only installed once something needs cleaning
  if (!handlersRegistered) {
    registerCleanupHandlers();
    handlersRegistered = true;
  }
}

/**
 * Unregister a temporary file, e.g. after it was renamed into place
 */
export function unregisterTempFile(filePath: string): void {
  tempFiles.delete(filePath);
}

export function getTempFileCount(): number {
  return tempFiles.size;
}

/**
 * Synchronously delete every registered temp file.
 * Runs inside 'exit', where async work never completes.
 */
export function cleanupTempFiles(): void {
  for (const filePath of tempFiles) {
    try {
      rmSync(filePath, { force: true });
    } catch (error) {
      console.error(`[cleanup] Failed to delete temp file: ${filePath}`, error);
    }
  }
  tempFiles.clear();
}

function registerCleanupHandlers(): void {
  process.on('exit', () => {
    cleanupTempFiles();
  });

  process.once('SIGINT', () => {
    cleanupTempFiles();
    process.exit(130);
  });

  process.once('SIGTERM', () => {
    cleanupTempFiles();
    process.exit(143);
  });
}
