/**
 * Range Negotiator
 *
 * Parses `Range: bytes=start-end` headers, resolves them against the
 * archive length and produces the byte stream for the resolved window.
 */

import * as fs from 'node:fs';
import type { RangeWindow, RequestedRange } from '@snapferry/core';
import { InvalidRangeError, RangeNotSatisfiableError } from '@snapferry/core';
import { DEFAULT_STREAM_CHUNK_SIZE } from './types.js';

const RANGE_PATTERN = /^bytes=(\d*)-(\d*)$/;

function toOffset(value: string, header: string): number | undefined {
  if (value === '') {
    return undefined;
  }
  const offset = Number(value);
  if (!Number.isSafeInteger(offset)) {
    throw new InvalidRangeError(header);
  }
  return offset;
}

/**
 * Parse a single-range header. A missing start means 0 (not a suffix
 * range); a missing end means "to the last byte".
 */
export function parseRangeHeader(header: string): RequestedRange {
  const match = header.trim().match(RANGE_PATTERN);
  if (!match) {
    throw new InvalidRangeError(header);
  }

  const start = toOffset(match[1] ?? '', header);
  const end = toOffset(match[2] ?? '', header);

  if (start !== undefined && end !== undefined && end < start) {
    throw new InvalidRangeError(header);
  }

  const range: RequestedRange = {};
  if (start !== undefined) range.start = start;
  if (end !== undefined) range.end = end;
  return range;
}

export function resolveRange(requested: RequestedRange | undefined, total: number): RangeWindow {
  if (!requested) {
    return { start: 0, end: total - 1, total, partial: false };
  }

  const start = requested.start ?? 0;
  let end = requested.end ?? total - 1;

  if (start >= total) {
    throw new RangeNotSatisfiableError(start, total);
  }
  if (end >= total) {
    end = total - 1;
  }

  return { start, end, total, partial: true };
}

export function windowLength(window: RangeWindow): number {
  return Math.max(0, window.end - window.start + 1);
}

export function formatContentRange(window: RangeWindow): string {
  return `bytes ${window.start}-${window.end}/${window.total}`;
}

/**
 * Yield the bytes of `window` in blocks of at most `chunkSize`. Stops at
 * `window.end` or at end of file, whichever comes first.
 */
export async function* createRangeStream(
  filePath: string,
  window: RangeWindow,
  chunkSize: number = DEFAULT_STREAM_CHUNK_SIZE,
): AsyncGenerator<Buffer> {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`Invalid chunk size: ${chunkSize}`);
  }

  const fileHandle = await fs.promises.open(filePath, 'r');

  try {
    let position = window.start;
    let remaining = windowLength(window);

    while (remaining > 0) {
      const size = Math.min(chunkSize, remaining);
      const buffer = Buffer.alloc(size);
      const { bytesRead } = await fileHandle.read(buffer, 0, size, position);
      if (bytesRead === 0) {
        break;
      }

      position += bytesRead;
      remaining -= bytesRead;
      yield buffer.subarray(0, bytesRead);
    }
  } finally {
    await fileHandle.close();
  }
}
