/**
 * HTTP Transport
 *
 * The network seam of the download engine. RangeFetcher only talks to this
 * interface; AxiosTransport is the production implementation.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { Readable } from 'stream';
import { logger } from '../../utils/logging.js';
import { getErrorMessage, isAbortError } from '../../utils/errorHandling.js';
import {
  ConnectionError,
  HttpStatusError,
  NetworkError,
  TimeoutError,
} from '../../errors/index.js';
import type { HttpConfig } from '../../config/types.js';

/**
 * Inclusive byte range; `end: null` reads to the end of the object
 */
export interface ByteRange {
  start: number;
  end: number | null;
}

export interface HttpTransport {
  /**
   * Size of the remote object, or null when the source does not report one
   */
  getContentLength(url: string, signal?: AbortSignal): Promise<number | null>;

  /**
   * Stream the object (or one range of it). `range: null` requests the full object.
   */
  openStream(
    url: string,
    range: ByteRange | null,
    signal?: AbortSignal
  ): Promise<AsyncIterable<Uint8Array>>;
}

/**
 * Format a Range header value
 */
export function formatRangeHeader(range: ByteRange): string {
  return `bytes=${range.start}-${range.end === null ? '' : range.end}`;
}

/**
 * Total size from a `Content-Range: bytes 0-0/12345` header
 */
export function parseContentRangeTotal(value: unknown): number | null {
  if (typeof value !== 'string') {
    return null;
  }
  const match = /\/(\d+)\s*$/.exec(value);
  return match ? parseInt(match[1], 10) : null;
}

function parseContentLength(value: unknown): number | null {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? null : parsed;
}

export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;

  /**
   * @param adapter - replaces axios' http adapter (tests, proxies)
   */
  constructor(private readonly config: HttpConfig, adapter?: AxiosAdapter) {
    this.client = axios.create({
      timeout: config.timeoutMs,
      headers: {
        'User-Agent': config.userAgent,
        ...(config.referer ? { Referer: config.referer } : {}),
      },
      // Media payloads are already compressed
      decompress: false,
      maxRedirects: 5,
      ...(adapter && { adapter }),
    });
  }

  async getContentLength(url: string, signal?: AbortSignal): Promise<number | null> {
    try {
      const response = await this.client.head(url, { ...(signal && { signal }) });
      const length = parseContentLength(response.headers['content-length']);
      if (length !== null) {
        return length;
      }
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      logger.debug('[AxiosTransport] HEAD request failed, probing with a range request', {
        url,
        error: getErrorMessage(error),
      });
    }

    // Some CDNs refuse HEAD; a one-byte range reports the total in Content-Range
    try {
      const response = await this.client.get<Readable>(url, {
        responseType: 'stream',
        headers: { Range: formatRangeHeader({ start: 0, end: 0 }) },
        ...(signal && { signal }),
      });
      response.data.destroy();
      return parseContentRangeTotal(response.headers['content-range']);
    } catch (error) {
      throw this.convertToApplicationError(error, url);
    }
  }

  async openStream(
    url: string,
    range: ByteRange | null,
    signal?: AbortSignal
  ): Promise<AsyncIterable<Uint8Array>> {
    try {
      const response = await this.client.get<Readable>(url, {
        responseType: 'stream',
        ...(range && { headers: { Range: formatRangeHeader(range) } }),
        ...(signal && { signal }),
      });

      // A 200 to a range request that does not start at 0 carries the wrong bytes
      if (range && range.start > 0 && response.status !== 206) {
        response.data.destroy();
        throw new HttpStatusError(
          response.status,
          url,
          `Source ignored range request (status ${response.status}): ${url}`
        );
      }

      return response.data;
    } catch (error) {
      throw this.convertToApplicationError(error, url);
    }
  }

  /**
   * Convert Axios errors to ApplicationError types
   */
  private convertToApplicationError(error: unknown, url: string): unknown {
    if (error instanceof NetworkError || isAbortError(error)) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      const statusCode = error.response?.status;
      if (statusCode !== undefined) {
        return new HttpStatusError(statusCode, url, undefined, { service: 'AxiosTransport' });
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new TimeoutError(this.config.timeoutMs, url, undefined, { service: 'AxiosTransport' });
      }
      return new ConnectionError(url, `Request failed: ${error.message}`, { service: 'AxiosTransport' }, error);
    }

    return new ConnectionError(
      url,
      `Unexpected error: ${getErrorMessage(error)}`,
      { service: 'AxiosTransport' },
      error instanceof Error ? error : undefined
    );
  }
}
