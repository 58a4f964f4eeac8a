/**
 * Archive Package Configuration Types
 */

export type ChecksumAlgorithm = 'md5' | 'sha1' | 'sha256';

export interface ChecksumOptions {
  /** Digest algorithm, default md5 */
  algorithm?: ChecksumAlgorithm;
  /** Read block size (bytes), default 64KB */
  blockSize?: number;
}

export interface BuildArchiveOptions {
  /** zlib compression level for deflated entries, default 6 */
  compressionLevel?: number;
}

/**
 * Default configuration values
 */
export const DEFAULT_CHECKSUM_OPTIONS = {
  algorithm: 'md5',
  blockSize: 64 * 1024,              // 64KB
} as const;

export const DEFAULT_STREAM_CHUNK_SIZE = 1024 * 1024; // 1MB

export const DEFAULT_COMPRESSION_LEVEL = 6;
