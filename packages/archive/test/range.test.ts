import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { RangeWindow } from '@snapferry/core';
import { InvalidRangeError, RangeNotSatisfiableError } from '@snapferry/core';
import {
  parseRangeHeader,
  resolveRange,
  windowLength,
  formatContentRange,
  createRangeStream,
} from '../src/range.js';

async function collect(stream: AsyncIterable<Buffer>): Promise<Buffer[]> {
  const blocks: Buffer[] = [];
  for await (const block of stream) {
    blocks.push(block);
  }
  return blocks;
}

describe('parseRangeHeader', () => {
  it('should parse an open-ended range', () => {
    expect(parseRangeHeader('bytes=500-')).toEqual({ start: 500 });
  });

  it('should parse a closed range', () => {
    expect(parseRangeHeader('bytes=0-99')).toEqual({ start: 0, end: 99 });
  });

  it('should treat a missing start as offset 0', () => {
    expect(parseRangeHeader('bytes=-500')).toEqual({ end: 500 });
    expect(resolveRange(parseRangeHeader('bytes=-500'), 1000)).toEqual({
      start: 0,
      end: 500,
      total: 1000,
      partial: true,
    });
  });

  it('should accept a range with neither bound', () => {
    expect(parseRangeHeader('bytes=-')).toEqual({});
  });

  it.each(['bytes=a-b', 'items=0-1', 'bytes=0-1,5-6', 'bytes=10-5', 'bytes 0-1'])(
    'should reject %s',
    (header) => {
      expect(() => parseRangeHeader(header)).toThrow(InvalidRangeError);
    },
  );
});

describe('resolveRange', () => {
  it('should cover the whole archive without a range', () => {
    expect(resolveRange(undefined, 1000)).toEqual({ start: 0, end: 999, total: 1000, partial: false });
  });

  it('should resolve an open-ended range to the last byte', () => {
    const window = resolveRange({ start: 500 }, 1000);

    expect(window).toEqual({ start: 500, end: 999, total: 1000, partial: true });
    expect(windowLength(window)).toBe(500);
    expect(formatContentRange(window)).toBe('bytes 500-999/1000');
  });

  it('should clamp an end past the last byte', () => {
    expect(resolveRange({ start: 0, end: 5000 }, 1000)).toEqual({
      start: 0,
      end: 999,
      total: 1000,
      partial: true,
    });
  });

  it('should reject a start at or beyond the length', () => {
    expect(() => resolveRange({ start: 1000 }, 1000)).toThrow(RangeNotSatisfiableError);
    expect(() => resolveRange({ start: 1500, end: 1600 }, 1000)).toThrow(RangeNotSatisfiableError);
  });
});

describe('createRangeStream', () => {
  let tempDir: string;
  let filePath: string;
  const content = Buffer.from(Array.from({ length: 1000 }, (_, i) => i % 256));

  beforeAll(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'snapferry-test-'));
    filePath = path.join(tempDir, 'archive.zip');
    await fs.promises.writeFile(filePath, content);
  });

  afterAll(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should yield the window in bounded blocks', async () => {
    const window = resolveRange({ start: 500 }, content.length);
    const blocks = await collect(createRangeStream(filePath, window, 128));

    expect(blocks.map((block) => block.length)).toEqual([128, 128, 128, 116]);
    expect(Buffer.concat(blocks).equals(content.subarray(500))).toBe(true);
  });

  it('should reproduce the file from consecutive ranges', async () => {
    const windows: RangeWindow[] = [
      resolveRange(parseRangeHeader('bytes=0-299'), content.length),
      resolveRange(parseRangeHeader('bytes=300-699'), content.length),
      resolveRange(parseRangeHeader('bytes=700-'), content.length),
    ];

    const parts: Buffer[] = [];
    for (const window of windows) {
      parts.push(...(await collect(createRangeStream(filePath, window))));
    }

    expect(Buffer.concat(parts).equals(content)).toBe(true);
  });

  it('should stop at end of file', async () => {
    const blocks = await collect(createRangeStream(filePath, { start: 0, end: 1999, total: 2000, partial: true }));

    expect(Buffer.concat(blocks).length).toBe(1000);
  });

  it('should reject an invalid block size', async () => {
    await expect(collect(createRangeStream(filePath, resolveRange(undefined, 1000), 0))).rejects.toThrow(RangeError);
  });
});
