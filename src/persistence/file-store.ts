import * as fs from 'fs/promises';
import * as path from 'path';
import { DataCorruptionError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('FileStore');

/**
 * Single JSON document on disk.
 *
 * Writes go to a temp file and are renamed into place, and are chained so two
 * saves never interleave. The caller hands over an already-taken snapshot.
 */
export class JsonFileStore<T> {
  private readonly filePath: string;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Read and parse the document. Returns null when the file does not exist;
   * unparseable JSON raises DataCorruptionError.
   */
  async load(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new DataCorruptionError(`Could not parse ${this.filePath}`, {
        reason: errorMessage(error),
      });
    }
  }

  async save(data: T): Promise<void> {
    const content = JSON.stringify(data, null, 2);
    const write = this.writeChain.then(() => this.atomicWrite(content));
    // Keep the chain alive after a failed write; the failure still reaches this caller.
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  /**
   * Move an unreadable document aside so the next save does not overwrite it.
   * Returns the new location.
   */
  async quarantine(): Promise<string> {
    const target = `${this.filePath}.corrupt-${Date.now()}`;
    await fs.rename(this.filePath, target);
    return target;
  }

  /**
   * Wait for queued writes to land
   */
  async flush(): Promise<void> {
    await this.writeChain;
  }

  private async atomicWrite(content: string): Promise<void> {
    const tempPath = `${this.filePath}.tmp.${process.pid}.${Date.now()}`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, this.filePath);
      logger.debug(`Saved ${this.filePath}`, { size: content.length });
    } catch (error) {
      logger.error(`Failed to save ${this.filePath}`, error);
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}

/**
 * Checks the shape, not the prototype: errors raised by fs may come from
 * another realm (Jest's module sandbox) and fail an instanceof Error check.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}
