/**
 * @snapferry/archive
 *
 * Archive codec, checksums, byte-range streaming, chunk reassembly,
 * restore and deferred cleanup for database snapshot transfers.
 */

export { computeFileChecksum, checksumsMatch } from './checksum.js';

export {
  parseRangeHeader,
  resolveRange,
  windowLength,
  formatContentRange,
  createRangeStream,
} from './range.js';

export {
  ChunkReassembler,
  chunkFileName,
  ASSEMBLED_ARCHIVE_NAME,
  SINGLE_UPLOAD_NAME,
  type ChunkReassemblerConfig,
} from './chunk-reassembler.js';

export {
  RestoreEngine,
  type RestoreTarget,
  type RestoreEngineConfig,
  type RestoreResult,
} from './restore-engine.js';

export { DeferredReclaimer, type ReclaimTarget, type ReclaimHandle } from './reclaimer.js';

export type { ChecksumAlgorithm, ChecksumOptions, BuildArchiveOptions } from './types.js';
export { DEFAULT_CHECKSUM_OPTIONS, DEFAULT_STREAM_CHUNK_SIZE, DEFAULT_COMPRESSION_LEVEL } from './types.js';

export { buildArchive, listArchiveEntries, extractArchiveEntries } from './utils/index.js';
