/**
 * ArtifactAccumulator - collects CIDR blocks for one report and writes them
 * to the artifact path in a single atomic step.
 *
 * Small reports stay in memory. Past the threshold the content spills to a
 * temp file inside the artifact directory, so persisting is a rename on the
 * same filesystem either way.
 */

import { randomBytes } from 'node:crypto';
import { createWriteStream, mkdirSync, promises as fs, rmSync, type WriteStream } from 'node:fs';
import { join } from 'node:path';
import { finished } from 'node:stream/promises';
import { createLogger, describeError, type Logger } from '../logger.js';
import { PersistenceFailureError } from '../report/errors.js';
import { registerTempFile, unregisterTempFile } from './cleanupHandler.js';

/**
 * Default memory threshold: 5MB in bytes
 */
const DEFAULT_MEMORY_THRESHOLD = 5 * 1024 * 1024;

export type AccumulatorMode = 'memory' | 'spilled';

export interface ArtifactAccumulatorOptions {
  /** Directory for the spill file; should be the artifact directory */
  tempDir: string;
  /** Bytes kept in memory before spilling (default: 5MB) */
  memoryThreshold?: number;
  logger?: Logger;
}

export class ArtifactAccumulator {
  private readonly tempDir: string;
  private readonly memoryThreshold: number;
  private readonly logger: Logger;

  private mode: AccumulatorMode = 'memory';
  private memoryBuffer: string[] = [];
  private tempFilePath: string | null = null;
  private writeStream: WriteStream | null = null;
  private streamError: Error | null = null;

  private bytesWritten = 0;
  private blockCount = 0;
  private disposed = false;

  constructor(options: ArtifactAccumulatorOptions) {
    this.tempDir = options.tempDir;
    this.memoryThreshold = options.memoryThreshold ?? DEFAULT_MEMORY_THRESHOLD;
    this.logger = options.logger ?? createLogger('artifact');
  }

  /**
   * Append one ASN's block; every block ends with a newline
   */
  append(block: string): void {
    if (this.disposed) {
      throw new Error('ArtifactAccumulator has been disposed');
    }

    const chunk = `${block}\n`;
    const projectedSize = this.bytesWritten + Buffer.byteLength(chunk, 'utf8');

    if (this.mode === 'memory' && projectedSize >= this.memoryThreshold) {
      this.spillToDisk();
    }

    if (this.writeStream) {
      this.writeStream.write(chunk);
    } else {
      this.memoryBuffer.push(chunk);
    }

    this.bytesWritten = projectedSize;
    this.blockCount++;
  }

  hasContent(): boolean {
    return this.blockCount > 0;
  }

  getMode(): AccumulatorMode {
    return this.mode;
  }

  getByteLength(): number {
    return this.bytesWritten;
  }

  getTempFilePath(): string | null {
    return this.tempFilePath;
  }

  /**
   * Moves the accumulated content to `targetPath`. Readers of the target see
   * either the previous file or the complete new one.
   *
   * @throws {PersistenceFailureError} When the content cannot be written
   */
  async persist(targetPath: string): Promise<void> {
    if (this.disposed) {
      throw new Error('ArtifactAccumulator has been disposed');
    }

    try {
      if (this.mode === 'memory') {
        const stagingPath = `${targetPath}.${randomBytes(6).toString('hex')}.tmp`;
        registerTempFile(stagingPath);
        try {
          await fs.writeFile(stagingPath, this.memoryBuffer.join(''), 'utf8');
          await fs.rename(stagingPath, targetPath);
        } finally {
          unregisterTempFile(stagingPath);
          await fs.rm(stagingPath, { force: true });
        }
        return;
      }

      const spillPath = this.tempFilePath;
      if (!spillPath) {
        throw new Error('Spilled accumulator has no temp file');
      }
      await this.closeWriteStream();
      await fs.rename(spillPath, targetPath);
      unregisterTempFile(spillPath);
      this.tempFilePath = null;
    } catch (error) {
      throw new PersistenceFailureError('write artifact', targetPath, { cause: error });
    }
  }

  /**
   * Drop buffered content and delete the spill file if one is left
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }

    this.writeStream?.destroy();
    this.writeStream = null;

    if (this.tempFilePath) {
      try {
        rmSync(this.tempFilePath, { force: true });
      } catch (error) {
        this.logger.warn(`Failed to remove temp file ${this.tempFilePath}: ${describeError(error)}`);
      }
      unregisterTempFile(this.tempFilePath);
      this.tempFilePath = null;
    }

    this.memoryBuffer = [];
    this.disposed = true;
  }

  private spillToDisk(): void {
    mkdirSync(this.tempDir, { recursive: true });

    const tempFilePath = join(this.tempDir, `report-${randomBytes(8).toString('hex')}.tmp`);
    registerTempFile(tempFilePath);

    const stream = createWriteStream(tempFilePath, { encoding: 'utf8', flags: 'w' });
    stream.on('error', (error) => {
      this.streamError = error;
      this.logger.error(`Write to ${tempFilePath} failed: ${error.message}`);
    });

    if (this.memoryBuffer.length > 0) {
      stream.write(this.memoryBuffer.join(''));
      this.memoryBuffer = [];
    }

    this.tempFilePath = tempFilePath;
    this.writeStream = stream;
    this.mode = 'spilled';
    this.logger.debug(`Report exceeded ${this.memoryThreshold} bytes, spilling to ${tempFilePath}`);
  }

  private async closeWriteStream(): Promise<void> {
    const stream = this.writeStream;
    if (!stream) {
      return;
    }

    stream.end();
    await finished(stream);
    this.writeStream = null;

    if (this.streamError) {
      throw this.streamError;
    }
  }
}
