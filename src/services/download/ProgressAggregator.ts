/**
 * ProgressAggregator
 *
 * Samples the written size of every active buffer on a fixed interval.
 * Observation only: it never waits on or throttles the fetch tasks.
 */

import { setTimeout as sleep } from 'timers/promises';
import type { ProgressSnapshot } from '../../types/media.js';

export interface TrackedBuffer {
  readonly writtenSize: number;
}

export interface TrackedStream {
  buffer: TrackedBuffer;
  /** Known total size, or null when the source did not report one */
  totalSize: number | null;
}

export interface SnapshotOptions {
  intervalMs: number;
  signal?: AbortSignal;
}

export class ProgressAggregator {
  constructor(private readonly streams: readonly TrackedStream[]) {}

  /**
   * Current totals across all streams
   */
  sample(elapsedMs = 0, previousDone = this.bytesDone()): ProgressSnapshot {
    const bytesDone = this.bytesDone();
    const bytesTotal = this.streams.reduce((sum, stream) => sum + (stream.totalSize ?? 0), 0);
    const bytesPerSecond =
      elapsedMs > 0 ? Math.max(0, ((bytesDone - previousDone) * 1000) / elapsedMs) : 0;

    return {
      bytesDone,
      bytesTotal,
      bytesPerSecond,
      complete: this.isComplete(),
    };
  }

  /**
   * Lazy sequence of snapshots, one per interval. Ends after the snapshot that
   * reports completion, or when the signal aborts. Each call starts a new sequence.
   */
  async *snapshots(options: SnapshotOptions): AsyncGenerator<ProgressSnapshot, void, undefined> {
    const { intervalMs, signal } = options;
    let previousDone = this.bytesDone();
    let previousTime = Date.now();

    while (!signal?.aborted) {
      try {
        await sleep(intervalMs, undefined, signal ? { signal } : undefined);
      } catch {
        // aborted while sleeping
        return;
      }

      const now = Date.now();
      const snapshot = this.sample(now - previousTime, previousDone);
      previousDone = snapshot.bytesDone;
      previousTime = now;

      yield snapshot;

      if (snapshot.complete) {
        return;
      }
    }
  }

  /**
   * Streams with an unknown size never count as complete here;
   * the caller stops the sequence when their fetch ends.
   */
  isComplete(): boolean {
    return this.streams.every(
      stream => stream.totalSize !== null && stream.buffer.writtenSize >= stream.totalSize
    );
  }

  private bytesDone(): number {
    return this.streams.reduce((sum, stream) => sum + stream.buffer.writtenSize, 0);
  }
}

const UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[unit]}` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

/**
 * One-line human readable progress, e.g. "1.5 MiB / 3.0 MiB 50.0% 512.0 KiB/s"
 */
export function formatProgress(snapshot: ProgressSnapshot): string {
  const speed = `${formatBytes(Math.round(snapshot.bytesPerSecond))}/s`;
  if (snapshot.bytesTotal <= 0) {
    return `${formatBytes(snapshot.bytesDone)} ${speed}`;
  }
  const percent = Math.min(100, (snapshot.bytesDone / snapshot.bytesTotal) * 100).toFixed(1);
  return `${formatBytes(snapshot.bytesDone)} / ${formatBytes(snapshot.bytesTotal)} ${percent}% ${speed}`;
}
