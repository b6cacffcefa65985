/**
 * RangeFetcher
 *
 * Downloads one block of a stream into a ResumableBuffer. Sources are tried in
 * order (primary, then mirrors); a source that fails mid-block hands over to the
 * next one at the first byte not yet received. Every connection holds one slot
 * of the shared ConnectionLimiter.
 */

import { logger } from '../../utils/logging.js';
import { getErrorMessage, isAbortError, toError } from '../../utils/errorHandling.js';
import {
  ApplicationError,
  ConnectionError,
  DownloadCancelledError,
  MIRROR_RETRY_POLICY,
  RetryStrategy,
  StreamDownloadError,
  type RetryPolicy,
} from '../../errors/index.js';
import type { ConnectionLimiter } from './ConnectionLimiter.js';
import type { ByteRange, HttpTransport } from './HttpTransport.js';
import type { ResumableBuffer } from './ResumableBuffer.js';

export interface RangeFetcherOptions {
  transport: HttpTransport;
  limiter: ConnectionLimiter;
  /** Passes over the source list per block */
  maxAttempts?: number;
  retryPolicy?: Partial<RetryPolicy>;
}

/**
 * Transient failures move on to the next source; anything else (disk, programmer error) stops the block
 */
function isTransient(error: unknown): boolean {
  return error instanceof ApplicationError && error.retryable;
}

/**
 * Errors raised while reading a response body (socket reset, premature close)
 * arrive as plain Node errors
 */
function classifyStreamError(error: unknown, url: string): unknown {
  if (error instanceof ApplicationError || isAbortError(error)) {
    return error;
  }
  return new ConnectionError(
    url,
    `Stream interrupted: ${getErrorMessage(error)}`,
    { service: 'RangeFetcher', operation: 'fetch' },
    toError(error)
  );
}

export class RangeFetcher {
  private readonly transport: HttpTransport;
  private readonly limiter: ConnectionLimiter;
  private readonly retryStrategy: RetryStrategy;

  constructor(options: RangeFetcherOptions) {
    this.transport = options.transport;
    this.limiter = options.limiter;
    this.retryStrategy = new RetryStrategy({
      ...MIRROR_RETRY_POLICY,
      ...options.retryPolicy,
      ...(options.maxAttempts !== undefined && { maxAttempts: options.maxAttempts }),
    });
  }

  /**
   * Total size of a stream, asking each source in turn. Null when a source
   * answered without a length; throws when every source failed.
   */
  async getSize(urls: readonly string[], signal?: AbortSignal): Promise<number | null> {
    let answered = false;
    let lastError: unknown;

    for (const url of urls) {
      try {
        const size = await this.limiter.run(
          () => this.transport.getContentLength(url, signal),
          signal
        );
        if (size !== null) {
          return size;
        }
        answered = true;
      } catch (error) {
        if (signal?.aborted || isAbortError(error)) {
          throw new DownloadCancelledError();
        }
        lastError = error;
        logger.warn('[RangeFetcher] Could not read stream size from source', {
          url,
          error: getErrorMessage(error),
        });
      }
    }

    if (!answered && lastError !== undefined) {
      throw new StreamDownloadError(
        urls,
        0,
        `All ${urls.length} source(s) failed while reading the stream size`,
        { service: 'RangeFetcher', operation: 'getSize' },
        toError(lastError)
      );
    }

    logger.debug('[RangeFetcher] No source reported a size', { sources: urls.length });
    return null;
  }

  /**
   * Fetch `size` bytes starting at `offset` (or the whole object when `size` is null)
   * and write them into `buffer` at their absolute offsets as they arrive.
   */
  async fetch(
    urls: readonly string[],
    buffer: ResumableBuffer,
    offset: number,
    size: number | null,
    signal?: AbortSignal
  ): Promise<void> {
    if (urls.length === 0) {
      throw new StreamDownloadError(urls, offset, 'No source URL for stream');
    }
    if (size === 0) {
      return;
    }

    let received = 0;

    const onePass = async (): Promise<void> => {
      let lastError: unknown;

      for (const url of urls) {
        try {
          await this.limiter.run(async () => {
            const range = this.rangeFor(offset + received, offset, size);
            const stream = await this.transport.openStream(url, range, signal);

            for await (const chunk of stream) {
              let bytes = chunk;
              if (size !== null) {
                const remaining = size - received;
                if (bytes.length > remaining) {
                  bytes = bytes.subarray(0, remaining);
                }
              }
              await buffer.write(offset + received, bytes);
              received += bytes.length;
              if (size !== null && received >= size) {
                break;
              }
            }
          }, signal);

          if (size !== null && received < size) {
            throw new ConnectionError(
              url,
              `Connection closed after ${received} of ${size} bytes`,
              { service: 'RangeFetcher', operation: 'fetch' }
            );
          }
          return;
        } catch (caught) {
          const error = classifyStreamError(caught, url);
          if (signal?.aborted || isAbortError(error) || !isTransient(error)) {
            throw error;
          }
          lastError = error;
          logger.warn('[RangeFetcher] Source failed, trying next one', {
            url,
            offset,
            received,
            error: getErrorMessage(error),
          });
        }
      }

      throw lastError;
    };

    try {
      await this.retryStrategy.execute(onePass, `block at offset ${offset}`, signal);
      logger.debug('[RangeFetcher] Block complete', { offset, size: received });
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw new DownloadCancelledError(undefined, {
          service: 'RangeFetcher',
          metadata: { offset, received },
        });
      }
      if (!isTransient(error)) {
        throw error;
      }
      throw new StreamDownloadError(
        urls,
        offset,
        undefined,
        { service: 'RangeFetcher', operation: 'fetch', metadata: { received } },
        toError(error)
      );
    }
  }

  /**
   * Range header for the next request. The very first request of an unbounded
   * block sends none, so sources that do not support ranges still work.
   */
  private rangeFor(position: number, blockStart: number, size: number | null): ByteRange | null {
    if (size === null) {
      return position === 0 ? null : { start: position, end: null };
    }
    return { start: position, end: blockStart + size - 1 };
  }
}
