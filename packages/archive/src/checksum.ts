/**
 * Streaming file checksums. Memory use is bounded by the block size,
 * not the file size.
 */

import * as fs from 'node:fs';
import * as crypto from 'node:crypto';
import { type ChecksumOptions, DEFAULT_CHECKSUM_OPTIONS } from './types.js';

export async function computeFileChecksum(filePath: string, options: ChecksumOptions = {}): Promise<string> {
  const algorithm = options.algorithm ?? DEFAULT_CHECKSUM_OPTIONS.algorithm;
  const blockSize = options.blockSize ?? DEFAULT_CHECKSUM_OPTIONS.blockSize;

  return new Promise((resolve, reject) => {
    const hash = crypto.createHash(algorithm);
    const stream = fs.createReadStream(filePath, { highWaterMark: blockSize });

    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}

/**
 * Case-insensitive comparison of two hex digests.
 */
export function checksumsMatch(expected: string, actual: string): boolean {
  return expected.trim().toLowerCase() === actual.toLowerCase();
}
