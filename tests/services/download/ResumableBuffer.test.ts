/**
 * ResumableBuffer Tests
 *
 * Uses a real temp directory: the buffer's contract is about bytes on disk.
 */

import { jest } from '@jest/globals';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { ResumableBuffer, withResumableBuffer } from '../../../src/services/download/ResumableBuffer.js';
import { planBlocks } from '../../../src/services/download/blockPlanner.js';
import { InvalidStateError } from '../../../src/errors/index.js';

jest.mock('../../../src/utils/logging.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

function pattern(length: number): Buffer {
  const bytes = Buffer.alloc(length);
  for (let i = 0; i < length; i++) {
    bytes[i] = i % 251;
  }
  return bytes;
}

describe('ResumableBuffer', () => {
  let tmpDir: string;
  let filePath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mediaweld-buffer-'));
    filePath = path.join(tmpDir, 'nested', 'episode_video.m4s');
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  it('should create the file and its directory with writtenSize 0', async () => {
    const buffer = await ResumableBuffer.open(filePath, { overwrite: false });
    expect(buffer.writtenSize).toBe(0);
    await buffer.close();

    expect(await fs.pathExists(filePath)).toBe(true);
    expect((await fs.stat(filePath)).size).toBe(0);
  });

  it('should advance writtenSize on in-order writes', async () => {
    const buffer = await ResumableBuffer.open(filePath, { overwrite: false });
    await buffer.write(0, Buffer.from('hello'));
    expect(buffer.writtenSize).toBe(5);
    await buffer.write(5, Buffer.from(' world'));
    expect(buffer.writtenSize).toBe(11);
    await buffer.close();

    expect(await fs.readFile(filePath, 'utf-8')).toBe('hello world');
  });

  it('should not advance past a gap until the gap is filled', async () => {
    const buffer = await ResumableBuffer.open(filePath, { overwrite: false });
    await buffer.write(4, Buffer.from('EFGH'));
    expect(buffer.writtenSize).toBe(0);
    await buffer.write(8, Buffer.from('IJ'));
    expect(buffer.writtenSize).toBe(0);
    await buffer.write(0, Buffer.from('ABCD'));
    expect(buffer.writtenSize).toBe(10);
    await buffer.close();

    expect(await fs.readFile(filePath, 'utf-8')).toBe('ABCDEFGHIJ');
  });

  it('should assemble the planned blocks written in any order', async () => {
    const total = 2_500_000;
    const content = pattern(total);
    const blocks = planBlocks(0, total, 1_000_000);

    const buffer = await ResumableBuffer.open(filePath, { overwrite: false });
    for (const block of [blocks[2], blocks[0], blocks[1]]) {
      if (!block || block.size === null) {
        throw new Error('unexpected block');
      }
      await buffer.write(block.start, content.subarray(block.start, block.start + block.size));
    }
    expect(buffer.writtenSize).toBe(2_500_000);
    await buffer.close();

    const onDisk = await fs.readFile(filePath);
    expect(onDisk.length).toBe(total);
    expect(onDisk.equals(content)).toBe(true);
  });

  it('should resume from the length of an existing file', async () => {
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(filePath, Buffer.from('0123456789'));

    const buffer = await ResumableBuffer.open(filePath, { overwrite: false });
    expect(buffer.writtenSize).toBe(10);
    expect(planBlocks(buffer.writtenSize, 25, 10)).toEqual([
      { start: 10, size: 10 },
      { start: 20, size: 5 },
    ]);
    await buffer.close();
  });

  it('should truncate an existing file when overwrite is set', async () => {
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(filePath, Buffer.from('stale partial data'));

    const buffer = await ResumableBuffer.open(filePath, { overwrite: true });
    expect(buffer.writtenSize).toBe(0);
    await buffer.close();

    expect((await fs.stat(filePath)).size).toBe(0);
  });

  it('should cut bytes past a gap on close so the file length equals writtenSize', async () => {
    const buffer = await ResumableBuffer.open(filePath, { overwrite: false });
    await buffer.write(0, Buffer.from('abc'));
    await buffer.write(10, Buffer.from('xyz'));
    expect(buffer.writtenSize).toBe(3);
    await buffer.close();

    expect(await fs.readFile(filePath, 'utf-8')).toBe('abc');

    const resumed = await ResumableBuffer.open(filePath, { overwrite: false });
    expect(resumed.writtenSize).toBe(3);
    await resumed.close();
  });

  it('should reject writes after close and tolerate a second close', async () => {
    const buffer = await ResumableBuffer.open(filePath, { overwrite: false });
    await buffer.close();
    await buffer.close();

    expect(buffer.isClosed).toBe(true);
    await expect(buffer.write(0, Buffer.from('x'))).rejects.toThrow(InvalidStateError);
  });

  describe('withResumableBuffer', () => {
    it('should close the buffer when the callback throws', async () => {
      const seen: { buffer?: ResumableBuffer } = {};

      await expect(
        withResumableBuffer(filePath, { overwrite: false }, async buffer => {
          seen.buffer = buffer;
          await buffer.write(0, Buffer.from('partial'));
          throw new Error('fetch failed');
        })
      ).rejects.toThrow('fetch failed');

      expect(seen.buffer?.isClosed).toBe(true);
      expect(await fs.readFile(filePath, 'utf-8')).toBe('partial');
    });
  });
});
