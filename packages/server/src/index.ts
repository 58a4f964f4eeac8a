/**
 * @snapferry/server
 *
 * HTTP server and client for snapshot backup download and chunked restore
 */

// Service
export {
  TransferService,
  sanitizeFileName,
  type TransferServiceOptions,
  type RestoreUpload,
  type RestoreUploadResult,
} from './transfer-service.js';

// Configuration
export {
  resolveServerConfig,
  loadServerConfig,
  serverConfigSchema,
  DEFAULT_MANAGED_FILES,
  DEFAULT_ARCHIVE_PREFIX,
  DEFAULT_TRANSFER,
  DEFAULT_RETENTION,
  type ServerConfig,
  type TransferSettings,
  type RetentionSettings,
  type ResolvedServerConfig,
  type ResolvedManagedFile,
} from './config.js';

// Express integration
export {
  transferHandler,
  type TransferHandlerOptions,
  type TransferHandlerResult,
} from './server/express/index.js';

// Daemon
export {
  startTransferDaemon,
  parseArgs,
  main,
  DEFAULT_PORT,
  DEFAULT_HOST,
  type DaemonConfig,
  type DaemonInstance,
} from './bin/daemon.js';

// Client
export {
  TransferClient,
  TransferClientError,
  DEFAULT_UPLOAD_CHUNK_SIZE,
  type TransferClientOptions,
  type DownloadOptions,
  type DownloadResult,
  type UploadOptions,
} from './client.js';

// Wire types
export {
  toOperationView,
  isRestoreCompleted,
  RESTORE_COMPLETED_MESSAGE,
  type BackupStatusResponse,
  type ManagedFileView,
  type VerifyResponse,
  type RestoreResponse,
  type RestoreProgressResponse,
  type RestoreCompletedResponse,
  type ChunkStatusResponse,
  type OperationView,
  type ErrorResponse,
} from './types.js';
