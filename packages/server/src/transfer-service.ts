/**
 * Transfer Service
 *
 * Backs every HTTP endpoint: builds download archives, tracks chunked
 * restore uploads and runs restores, and schedules removal of whatever
 * they leave behind.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ArchiveInfo, ChunkStatus, ManagedFilesSummary, TransferOperation } from '@snapferry/core';
import {
  OperationRegistry,
  ChecksumMismatchError,
  InvalidChunkError,
  IoFailureError,
  OperationConflictError,
  TransferError,
  formatSize,
  formatTimestamp,
  generateId,
  isValidOperationId,
} from '@snapferry/core';
import {
  ASSEMBLED_ARCHIVE_NAME,
  ChunkReassembler,
  DeferredReclaimer,
  RestoreEngine,
  SINGLE_UPLOAD_NAME,
  buildArchive,
  type ReclaimHandle,
  type ReclaimTarget,
  checksumsMatch,
  computeFileChecksum,
} from '@snapferry/archive';
import { resolveServerConfig, type ResolvedServerConfig, type ServerConfig } from './config.js';
import type { VerifyResponse } from './types.js';

export interface TransferServiceOptions {
  config: ServerConfig;
}

/**
 * One `POST /restore` request, already parsed from the multipart form.
 */
export interface RestoreUpload {
  data: Buffer;
  /** Chunk index; absent for a single-shot upload */
  chunk?: number;
  uploadId?: string;
  totalChunks?: number;
  /** Digest of the whole archive, checked before restoring */
  checksum?: string;
}

export type RestoreUploadResult =
  | { type: 'progress'; operationId: string; chunk: number; chunksReceived: number; totalChunks: number }
  | { type: 'restored'; operationId: string; restoredFiles: string[] };

export class TransferService {
  readonly config: ResolvedServerConfig;
  private registry = new OperationRegistry();
  private reassembler: ChunkReassembler;
  private restoreEngine: RestoreEngine;
  private reclaimer: DeferredReclaimer;
  private operationReclaims = new Map<string, ReclaimHandle>();

  constructor(options: TransferServiceOptions) {
    this.config = resolveServerConfig(options.config);
    this.reclaimer = new DeferredReclaimer(this.registry);

    this.reassembler = new ChunkReassembler(this.registry, {
      uploadsDir: this.config.uploadsDir,
      idleTimeoutMs: this.config.retention.uploadIdleTimeoutMs,
      onIdleTimeout: (operationId) => this.scheduleOperationReclaim(operationId),
    });

    this.restoreEngine = new RestoreEngine(this.registry, {
      targets: this.config.managedFiles.map((file) => ({
        label: file.relativePath,
        path: file.absolutePath,
      })),
    });
  }

  /**
   * Create the temp roots and remove what an earlier run left in them.
   */
  async initialize(): Promise<void> {
    const { uploadsDir, backupsDir, cleanupOnInitialize } = this.config;

    if (cleanupOnInitialize) {
      const stale = await this.listStaleEntries();
      for (const target of stale) {
        await this.reclaimer.reclaimNow(target);
      }
      if (stale.length > 0) {
        console.log(`[Snapferry:Transfer] Removed ${stale.length} stale temp entries`);
      }
    }

    await fs.promises.mkdir(uploadsDir, { recursive: true });
    await fs.promises.mkdir(backupsDir, { recursive: true });
  }

  async shutdown(): Promise<void> {
    this.reassembler.shutdown();
    this.reclaimer.shutdown();
    this.operationReclaims.clear();
    await this.reclaimer.settle();
  }

  /**
   * Wait for removals that have already started.
   */
  async settle(): Promise<void> {
    await this.reclaimer.settle();
  }

  /** Operations with a removal scheduled and not yet finished */
  get scheduledReclaimCount(): number {
    return this.operationReclaims.size;
  }

  // ========== Backup ==========

  async getBackupStatus(): Promise<ManagedFilesSummary> {
    const files = await Promise.all(
      this.config.managedFiles.map(async (file) => {
        const stats = await fs.promises.stat(file.absolutePath).catch(() => undefined);
        const sizeBytes = stats?.isFile() ? stats.size : 0;
        return {
          path: file.relativePath,
          exists: stats?.isFile() ?? false,
          sizeBytes,
          sizeFormatted: formatSize(sizeBytes),
        };
      }),
    );

    const totalSizeBytes = files.reduce((sum, file) => sum + file.sizeBytes, 0);
    return {
      files,
      totalSizeBytes,
      totalSizeFormatted: formatSize(totalSizeBytes),
      allFilesExist: files.every((file) => file.exists),
    };
  }

  /**
   * Build a fresh archive of every managed file. The caller streams it and
   * then hands it back through `releaseBackup`.
   */
  async prepareBackup(): Promise<ArchiveInfo> {
    const fileName = `${this.config.archivePrefix}_${formatTimestamp()}_${generateId({ length: 'short' })}.zip`;
    const archivePath = path.join(this.config.backupsDir, fileName);

    await buildArchive(
      this.config.managedFiles.map((file) => ({ name: file.entryName, path: file.absolutePath })),
      archivePath,
    );

    const [stats, checksum] = await Promise.all([
      fs.promises.stat(archivePath),
      computeFileChecksum(archivePath, { algorithm: this.config.transfer.checksumAlgorithm }),
    ]);

    console.log(`[Snapferry:Transfer] Built ${fileName} (${formatSize(stats.size)}, ${checksum})`);
    return { archivePath, fileName, totalSize: stats.size, checksum };
  }

  /**
   * Schedule removal of a download archive after the retention delay, which
   * leaves a window for verify calls and ranged resumes.
   */
  releaseBackup(info: ArchiveInfo): void {
    const handle = this.reclaimer.schedule(
      { kind: 'file', path: info.archivePath },
      this.config.retention.backupRetentionMs,
    );
    console.log(
      `[Snapferry:Transfer] ${info.fileName} will be removed at ${new Date(handle.dueAt).toISOString()}`,
    );
  }

  /**
   * Compare `checksum` with the digest of a temp archive still on disk.
   * Returns undefined when no such archive exists.
   */
  async verifyBackup(fileName: string, checksum: string): Promise<VerifyResponse | undefined> {
    const safeName = sanitizeFileName(fileName);
    if (!safeName) {
      return undefined;
    }

    const archivePath = path.join(this.config.backupsDir, safeName);
    const stats = await fs.promises.stat(archivePath).catch(() => undefined);
    if (!stats?.isFile()) {
      return undefined;
    }

    const calculated = await computeFileChecksum(archivePath, {
      algorithm: this.config.transfer.checksumAlgorithm,
    });
    return checksumsMatch(checksum, calculated)
      ? { verified: true }
      : { verified: false, expected: calculated, received: checksum };
  }

  // ========== Restore ==========

  async handleRestoreUpload(upload: RestoreUpload): Promise<RestoreUploadResult> {
    if (upload.chunk === undefined) {
      return this.handleSingleUpload(upload);
    }

    const { chunk } = upload;
    let operationId = upload.uploadId;

    if (operationId === undefined || (chunk === 0 && !this.registry.has(operationId))) {
      if (chunk !== 0) {
        throw new InvalidChunkError(`upload_id is required for chunk ${chunk}`);
      }
      operationId = await this.reassembler.begin(operationId, upload.totalChunks ?? 1);
      console.log(`[Snapferry:Transfer] Upload ${operationId} started (${upload.totalChunks ?? 1} chunks)`);
    }

    const outcome = await this.reassembler.accept(operationId, chunk, upload.data);
    if (outcome.type === 'more_expected') {
      return {
        type: 'progress',
        operationId,
        chunk,
        chunksReceived: outcome.chunksReceived,
        totalChunks: outcome.totalChunks,
      };
    }

    const id = operationId;
    return this.finishRestore(id, upload.checksum, () => this.reassembler.assemble(id));
  }

  getOperation(operationId: string): TransferOperation | undefined {
    return this.registry.lookup(operationId);
  }

  getChunkStatus(operationId: string): ChunkStatus {
    return this.reassembler.getStatus(operationId);
  }

  private async handleSingleUpload(upload: RestoreUpload): Promise<RestoreUploadResult> {
    const operationId = await this.reassembler.begin(upload.uploadId, 1);
    const archivePath = path.join(this.config.uploadsDir, operationId, SINGLE_UPLOAD_NAME);

    try {
      await fs.promises.writeFile(archivePath, upload.data);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.registry.markFailed(operationId, message);
      this.reassembler.release(operationId);
      this.scheduleOperationReclaim(operationId);
      throw new IoFailureError(`Failed to store upload: ${message}`, operationId);
    }

    return this.finishRestore(operationId, upload.checksum, async () => archivePath);
  }

  /**
   * Claim the restore, produce the archive, check its digest and restore.
   * Runs under the operation lock so no late chunk write can interleave.
   */
  private async finishRestore(
    operationId: string,
    checksum: string | undefined,
    produceArchive: () => Promise<string>,
  ): Promise<RestoreUploadResult> {
    try {
      return await this.registry.runExclusive(operationId, async () => {
        if (!this.registry.markRestoring(operationId)) {
          const current = this.registry.require(operationId);
          throw new OperationConflictError(
            `Operation ${operationId} is already ${current.status}`,
            operationId,
          );
        }
        this.reassembler.release(operationId);
        console.log(`[Snapferry:Transfer] Upload ${operationId} complete, restoring`);

        let archivePath: string;
        try {
          archivePath = await produceArchive();
          if (checksum) {
            const calculated = await computeFileChecksum(archivePath, {
              algorithm: this.config.transfer.checksumAlgorithm,
            });
            if (!checksumsMatch(checksum, calculated)) {
              throw new ChecksumMismatchError(checksum, calculated, operationId);
            }
          }
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.registry.markFailed(operationId, message);
          console.error(`[Snapferry:Transfer] Upload ${operationId} rejected: ${message}`);
          throw error;
        }

        const result = await this.restoreEngine.restore(archivePath, operationId);
        return { type: 'restored' as const, operationId, restoredFiles: result.restoredFiles };
      });
    } catch (error) {
      if (error instanceof TransferError && !error.operationId) {
        error.operationId = operationId;
      }
      throw error;
    } finally {
      const operation = this.registry.lookup(operationId);
      if (operation && (operation.status === 'completed' || operation.status === 'failed')) {
        this.scheduleOperationReclaim(operationId);
      }
    }
  }

  private scheduleOperationReclaim(operationId: string): void {
    const existing = this.operationReclaims.get(operationId);
    if (existing && existing.dueAt > Date.now()) {
      return;
    }
    const operation = this.registry.lookup(operationId);
    if (!operation) {
      return;
    }

    const handle = this.reclaimer.schedule(
      { kind: 'operation', operationId, stagingDir: operation.stagingDir },
      this.config.retention.operationRetentionMs,
      () => {
        if (this.operationReclaims.get(operationId) === handle) {
          this.operationReclaims.delete(operationId);
        }
      },
    );
    this.operationReclaims.set(operationId, handle);
  }

  private async listStaleEntries(): Promise<ReclaimTarget[]> {
    const { uploadsDir, backupsDir, archivePrefix } = this.config;
    const uploads = await fs.promises.readdir(uploadsDir, { withFileTypes: true }).catch(() => []);
    const backups = await fs.promises.readdir(backupsDir, { withFileTypes: true }).catch(() => []);

    const stagingDirs: ReclaimTarget[] = [];
    for (const entry of uploads) {
      const dirPath = path.join(uploadsDir, entry.name);
      if (entry.isDirectory() && isValidOperationId(entry.name) && (await isStagingDirectory(dirPath))) {
        stagingDirs.push({ kind: 'directory', path: dirPath });
      }
    }

    return [
      ...stagingDirs,
      ...backups
        .filter((entry) => entry.isFile() && entry.name.startsWith(`${archivePrefix}_`) && entry.name.endsWith('.zip'))
        .map((entry) => ({ kind: 'file' as const, path: path.join(backupsDir, entry.name) })),
    ];
  }
}

const STAGING_FILE_PATTERN = /^chunk_\d+$/;

/**
 * True when `dirPath` holds nothing but chunk files and assembled uploads.
 */
async function isStagingDirectory(dirPath: string): Promise<boolean> {
  const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  return entries.every(
    (entry) =>
      entry.isFile() &&
      (STAGING_FILE_PATTERN.test(entry.name) ||
        entry.name === ASSEMBLED_ARCHIVE_NAME ||
        entry.name === SINGLE_UPLOAD_NAME),
  );
}

/**
 * Reduce a client-supplied name to a single safe path segment.
 */
export function sanitizeFileName(fileName: string): string {
  return path
    .basename(fileName.replace(/\\/g, '/'))
    .replace(/[^A-Za-z0-9._-]/g, '_')
    .replace(/^\.+/, '');
}
