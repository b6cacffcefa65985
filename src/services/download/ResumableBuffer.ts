/**
 * ResumableBuffer
 *
 * On-disk sink for one stream. Concurrent fetch tasks write disjoint byte ranges
 * at absolute offsets; `writtenSize` only ever covers the contiguous prefix that
 * is on disk, so a later run can resume from the file length.
 */

import fs from 'fs-extra';
import { open, type FileHandle } from 'fs/promises';
import * as path from 'path';
import { logger } from '../../utils/logging.js';
import { ErrorCode, FileSystemError, InvalidStateError } from '../../errors/index.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';

export interface ResumableBufferOptions {
  /** Discard any existing partial file instead of resuming */
  overwrite: boolean;
}

export class ResumableBuffer {
  private frontier: number;
  private closed = false;
  /** Landed ranges beyond the frontier, start -> end (exclusive) */
  private readonly pending = new Map<number, number>();

  private constructor(
    public readonly filePath: string,
    private readonly handle: FileHandle,
    initialSize: number
  ) {
    this.frontier = initialSize;
  }

  /**
   * Open (or create) the partial file.
   * With `overwrite` the file is truncated; otherwise its length is the resume point.
   */
  static async open(filePath: string, options: ResumableBufferOptions): Promise<ResumableBuffer> {
    try {
      await fs.ensureDir(path.dirname(filePath));
      // 'a+' would force appends; 'r+' needs the file to exist
      if (options.overwrite || !(await fs.pathExists(filePath))) {
        await fs.writeFile(filePath, Buffer.alloc(0));
      }
      const handle = await open(filePath, 'r+');
      const { size } = await handle.stat();

      if (size > 0) {
        logger.info('[ResumableBuffer] Resuming partial file', { filePath, resumeFrom: size });
      }

      return new ResumableBuffer(filePath, handle, size);
    } catch (error) {
      throw new FileSystemError(
        `Failed to open buffer file: ${getErrorMessage(error)}`,
        ErrorCode.FS_WRITE_FAILED,
        filePath,
        false,
        { service: 'ResumableBuffer', operation: 'open' },
        toError(error)
      );
    }
  }

  /**
   * Bytes durably written as one contiguous prefix from offset 0
   */
  get writtenSize(): number {
    return this.frontier;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Write bytes at an absolute offset. Callers own disjoint ranges.
   */
  async write(offset: number, bytes: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new InvalidStateError('open', 'closed', `Write to closed buffer: ${this.filePath}`);
    }
    if (bytes.length === 0) {
      return;
    }

    let written = 0;
    try {
      while (written < bytes.length) {
        const { bytesWritten } = await this.handle.write(
          bytes,
          written,
          bytes.length - written,
          offset + written
        );
        written += bytesWritten;
      }
    } catch (error) {
      throw new FileSystemError(
        `Failed to write ${bytes.length} bytes at offset ${offset}: ${getErrorMessage(error)}`,
        ErrorCode.FS_WRITE_FAILED,
        this.filePath,
        false,
        { service: 'ResumableBuffer', operation: 'write' },
        toError(error)
      );
    }

    this.recordRange(offset, offset + bytes.length);
  }

  /**
   * Release the file handle. Safe to call more than once.
   * Bytes that landed past a gap are cut off so the file length equals writtenSize.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      if (this.pending.size > 0) {
        logger.debug('[ResumableBuffer] Truncating non-contiguous tail', {
          filePath: this.filePath,
          writtenSize: this.frontier,
          pendingRanges: this.pending.size,
        });
        await this.handle.truncate(this.frontier);
        this.pending.clear();
      }
    } finally {
      await this.handle.close();
    }
  }

  private recordRange(start: number, end: number): void {
    if (start > this.frontier) {
      const existing = this.pending.get(start);
      this.pending.set(start, existing === undefined ? end : Math.max(existing, end));
      return;
    }

    this.frontier = Math.max(this.frontier, end);

    // Pull in ranges that now touch the frontier
    let advanced = true;
    while (advanced) {
      advanced = false;
      for (const [pendingStart, pendingEnd] of this.pending) {
        if (pendingStart <= this.frontier) {
          this.pending.delete(pendingStart);
          if (pendingEnd > this.frontier) {
            this.frontier = pendingEnd;
            advanced = true;
          }
        }
      }
    }
  }
}

/**
 * Open a buffer, run `fn`, and always close the buffer afterwards
 */
export async function withResumableBuffer<T>(
  filePath: string,
  options: ResumableBufferOptions,
  fn: (buffer: ResumableBuffer) => Promise<T>
): Promise<T> {
  const buffer = await ResumableBuffer.open(filePath, options);
  try {
    return await fn(buffer);
  } finally {
    await buffer.close();
  }
}
