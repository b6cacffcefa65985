import { ResumeInconsistencyError, ValidationError } from '../../errors/index.js';
import type { Block } from '../../types/media.js';

/**
 * Split the remaining part of a remote object into fetchable blocks.
 *
 * - unknown total size: one unbounded block from byte 0
 * - empty object: no blocks
 * - no block size: one block covering the whole object from byte 0 (resume ignored)
 * - otherwise: contiguous blocks of `blockSize` from `resumeFrom`, the last one
 *   shrunk to the remainder
 */
export function planBlocks(
  resumeFrom: number,
  totalSize: number | null,
  blockSize: number | null
): Block[] {
  assertByteCount(resumeFrom, 'resumeFrom');

  if (totalSize === null) {
    return [{ start: 0, size: null }];
  }
  assertByteCount(totalSize, 'totalSize');

  if (resumeFrom > totalSize) {
    throw new ResumeInconsistencyError(resumeFrom, totalSize, undefined, {
      service: 'blockPlanner',
      operation: 'planBlocks',
    });
  }

  if (totalSize === 0) {
    return [];
  }

  if (blockSize === null) {
    return [{ start: 0, size: totalSize }];
  }
  if (!Number.isSafeInteger(blockSize) || blockSize <= 0) {
    throw new ValidationError(`blockSize must be a positive integer, got: ${blockSize}`);
  }

  const blocks: Block[] = [];
  for (let start = resumeFrom; start < totalSize; start += blockSize) {
    blocks.push({ start, size: Math.min(blockSize, totalSize - start) });
  }
  return blocks;
}

function assertByteCount(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer, got: ${value}`);
  }
}
