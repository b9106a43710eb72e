/**
 * JSONL Sink - append-only JSON-lines file with size-based rotation
 *
 * Appends are serialized through a promise chain, so concurrent writers
 * never interleave partial lines. Before each append the sink checks the
 * file size; at or above `maxSizeBytes` it shifts `file.1 .. file.N-1` up
 * by one, moves `file` to `file.1` and drops the oldest.
 *
 * @module logging/jsonl-sink
 */

import { appendFile, mkdir, rename, rm, stat } from 'fs/promises';
import { dirname } from 'path';

export const DEFAULT_MAX_FILE_BYTES = 10 * 1024 * 1024; // 10MB

export const DEFAULT_MAX_FILES = 5;

export interface JsonlSinkConfig {
  path: string;
  maxSizeBytes?: number;
  /** Rotated files kept beside the live one */
  maxFiles?: number;
}

export class JsonlSink {
  private readonly path: string;
  private readonly maxSizeBytes: number;
  private readonly maxFiles: number;

  private initialized = false;
  /** Bytes in the live file; null until the first stat */
  private size: number | null = null;
  private tail: Promise<void> = Promise.resolve();
  private rotations = 0;

  constructor(config: JsonlSinkConfig) {
    this.path = config.path;
    this.maxSizeBytes = config.maxSizeBytes ?? DEFAULT_MAX_FILE_BYTES;
    this.maxFiles = config.maxFiles ?? DEFAULT_MAX_FILES;
  }

  getPath(): string {
    return this.path;
  }

  get rotationCount(): number {
    return this.rotations;
  }

  /**
   * Append one record as a single JSON line.
   */
  append(record: unknown): Promise<void> {
    const line = `${JSON.stringify(record)}\n`;
    const write = this.tail.then(() => this.write(line));
    // Keep the chain going after a failed write; the failure reaches this caller
    this.tail = write.catch(() => undefined);
    return write;
  }

  /** Resolves once every append issued so far has settled. */
  flush(): Promise<void> {
    return this.tail;
  }

  private async write(line: string): Promise<void> {
    if (!this.initialized) {
      await mkdir(dirname(this.path), { recursive: true });
      this.initialized = true;
    }

    if (this.size === null) {
      this.size = await currentSize(this.path);
    }
    if (this.size > 0 && this.size >= this.maxSizeBytes) {
      await this.rotate();
    }

    await appendFile(this.path, line, 'utf-8');
    this.size += Buffer.byteLength(line, 'utf-8');
  }

  private async rotate(): Promise<void> {
    if (this.maxFiles < 1) {
      await rm(this.path, { force: true });
    } else {
      await rm(`${this.path}.${this.maxFiles}`, { force: true });
      for (let i = this.maxFiles - 1; i >= 1; i--) {
        await renameIfExists(`${this.path}.${i}`, `${this.path}.${i + 1}`);
      }
      await rename(this.path, `${this.path}.1`);
    }
    this.size = 0;
    this.rotations++;
  }
}

async function currentSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (isNotFound(error)) return 0;
    throw error;
  }
}

async function renameIfExists(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if (!isNotFound(error)) throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
