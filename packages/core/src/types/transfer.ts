/**
 * Transfer Protocol Types
 */

// ========== Managed Files ==========

/**
 * A database file subject to backup and restore, identified by a fixed
 * path relative to the data directory.
 */
export interface ManagedFile {
  path: string;
  exists: boolean;
  sizeBytes: number;
  sizeFormatted: string;
}

export interface ManagedFilesSummary {
  files: ManagedFile[];
  totalSizeBytes: number;
  totalSizeFormatted: string;
  allFilesExist: boolean;
}

// ========== Archives ==========

export interface ArchiveInfo {
  /** Absolute location of the archive on disk */
  archivePath: string;
  /** Name offered to clients in Content-Disposition */
  fileName: string;
  totalSize: number;
  /** Hex digest of the archive bytes */
  checksum: string;
}

/**
 * Source for one archive entry: the file at `path` is stored under `name`.
 */
export interface ArchiveSource {
  name: string;
  path: string;
}

// ========== Ranges ==========

export interface RequestedRange {
  start?: number;
  end?: number;
}

/**
 * Resolved byte span for a download. `end` is inclusive.
 */
export interface RangeWindow {
  start: number;
  end: number;
  total: number;
  /** True when the client asked for a range (206), false for full content (200) */
  partial: boolean;
}

// ========== Operations ==========

export type OperationKind = 'restore';

export type OperationStatus = 'uploading' | 'restoring' | 'completed' | 'failed';

export interface TransferOperation {
  id: string;
  kind: OperationKind;
  status: OperationStatus;
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
  chunksReceived: number;
  totalChunks: number;
  /** Distinct chunk indices persisted so far, ascending */
  receivedChunks: number[];
  stagingDir: string;
  restoredFiles?: string[];
  error?: string;
}

// ========== Chunks ==========

export type ChunkOutcome =
  | { type: 'more_expected'; chunksReceived: number; totalChunks: number }
  | { type: 'ready_to_assemble'; chunksReceived: number; totalChunks: number };

export interface ChunkStatus {
  received: number[];
  missing: number[];
  complete: boolean;
}
