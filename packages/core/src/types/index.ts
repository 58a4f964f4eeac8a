export type {
  ManagedFile,
  ManagedFilesSummary,
  ArchiveInfo,
  ArchiveSource,
  RequestedRange,
  RangeWindow,
  OperationKind,
  OperationStatus,
  TransferOperation,
  ChunkOutcome,
  ChunkStatus,
} from './transfer.js';
