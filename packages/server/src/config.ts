/**
 * Snapferry Server Configuration
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import type { ChecksumAlgorithm } from '@snapferry/archive';

// ========== Transfer ==========

export interface TransferSettings {
  /** Block size for streamed downloads when the client sends no chunk_size */
  defaultChunkSize?: number;
  /** Largest chunk_size a client may ask for */
  maxChunkSize?: number;
  /** Largest accepted upload part */
  maxUploadBytes?: number;
  checksumAlgorithm?: ChecksumAlgorithm;
}

// ========== Retention ==========

export interface RetentionSettings {
  /** Temp archives built for downloads are removed after this */
  backupRetentionMs?: number;
  /** Completed and failed operations are forgotten after this */
  operationRetentionMs?: number;
  /** Uploads with no new chunk for this long are failed */
  uploadIdleTimeoutMs?: number;
}

// ========== Config ==========

export interface ServerConfig {
  /** Root that managed file paths are relative to */
  dataDir?: string;
  managedFiles?: string[];
  uploadsDir?: string;
  backupsDir?: string;
  archivePrefix?: string;
  transfer?: TransferSettings;
  retention?: RetentionSettings;
  /** Remove staging directories and archives left by an earlier run */
  cleanupOnInitialize?: boolean;
}

// ========== Defaults ==========

export const DEFAULT_MANAGED_FILES = ['database/app_data.db', 'database/app_static.db'] as const;

export const DEFAULT_ARCHIVE_PREFIX = 'db_backup';

export const DEFAULT_TRANSFER = {
  defaultChunkSize: 1024 * 1024,          // 1MB
  maxChunkSize: 64 * 1024 * 1024,         // 64MB
  maxUploadBytes: 512 * 1024 * 1024,      // 512MB
  checksumAlgorithm: 'md5',
} as const;

export const DEFAULT_RETENTION = {
  backupRetentionMs: 10 * 60 * 1000,      // 10 minutes
  operationRetentionMs: 60 * 60 * 1000,   // 1 hour
  uploadIdleTimeoutMs: 30 * 60 * 1000,    // 30 minutes
} as const;

function defaultTempRoot(): string {
  return path.join(os.tmpdir(), 'snapferry');
}

// ========== Resolved ==========

export interface ResolvedManagedFile {
  /** Path as configured, reported back to clients */
  relativePath: string;
  absolutePath: string;
  /** Entry name inside archives */
  entryName: string;
}

export interface ResolvedServerConfig {
  dataDir: string;
  managedFiles: ResolvedManagedFile[];
  uploadsDir: string;
  backupsDir: string;
  archivePrefix: string;
  transfer: Required<TransferSettings>;
  retention: Required<RetentionSettings>;
  cleanupOnInitialize: boolean;
}

export function resolveServerConfig(config: ServerConfig = {}): ResolvedServerConfig {
  const dataDir = path.resolve(config.dataDir ?? process.cwd());
  const tempRoot = defaultTempRoot();

  const managedFiles = (config.managedFiles ?? [...DEFAULT_MANAGED_FILES]).map((relativePath) => ({
    relativePath,
    absolutePath: path.resolve(dataDir, relativePath),
    entryName: path.basename(relativePath),
  }));

  const seen = new Set<string>();
  for (const file of managedFiles) {
    if (seen.has(file.entryName)) {
      throw new Error(`Managed files must have distinct base names, "${file.entryName}" appears twice`);
    }
    seen.add(file.entryName);
  }

  const resolved: ResolvedServerConfig = {
    dataDir,
    managedFiles,
    uploadsDir: path.resolve(config.uploadsDir ?? path.join(tempRoot, 'uploads')),
    backupsDir: path.resolve(config.backupsDir ?? path.join(tempRoot, 'backups')),
    archivePrefix: config.archivePrefix ?? DEFAULT_ARCHIVE_PREFIX,
    transfer: {
      defaultChunkSize: config.transfer?.defaultChunkSize ?? DEFAULT_TRANSFER.defaultChunkSize,
      maxChunkSize: config.transfer?.maxChunkSize ?? DEFAULT_TRANSFER.maxChunkSize,
      maxUploadBytes: config.transfer?.maxUploadBytes ?? DEFAULT_TRANSFER.maxUploadBytes,
      checksumAlgorithm: config.transfer?.checksumAlgorithm ?? DEFAULT_TRANSFER.checksumAlgorithm,
    },
    retention: {
      backupRetentionMs: config.retention?.backupRetentionMs ?? DEFAULT_RETENTION.backupRetentionMs,
      operationRetentionMs: config.retention?.operationRetentionMs ?? DEFAULT_RETENTION.operationRetentionMs,
      uploadIdleTimeoutMs: config.retention?.uploadIdleTimeoutMs ?? DEFAULT_RETENTION.uploadIdleTimeoutMs,
    },
    cleanupOnInitialize: config.cleanupOnInitialize ?? true,
  };

  if (resolved.transfer.defaultChunkSize > resolved.transfer.maxChunkSize) {
    throw new Error('transfer.defaultChunkSize must not exceed transfer.maxChunkSize');
  }

  return resolved;
}

// ========== Config File ==========

const positiveInt = z.number().int().positive();

export const serverConfigSchema = z
  .object({
    dataDir: z.string().min(1).optional(),
    managedFiles: z.array(z.string().min(1)).min(1).optional(),
    uploadsDir: z.string().min(1).optional(),
    backupsDir: z.string().min(1).optional(),
    archivePrefix: z.string().regex(/^[A-Za-z0-9_-]+$/).optional(),
    transfer: z
      .object({
        defaultChunkSize: positiveInt.optional(),
        maxChunkSize: positiveInt.optional(),
        maxUploadBytes: positiveInt.optional(),
        checksumAlgorithm: z.enum(['md5', 'sha1', 'sha256']).optional(),
      })
      .strict()
      .optional(),
    retention: z
      .object({
        backupRetentionMs: positiveInt.optional(),
        operationRetentionMs: positiveInt.optional(),
        uploadIdleTimeoutMs: positiveInt.optional(),
      })
      .strict()
      .optional(),
    cleanupOnInitialize: z.boolean().optional(),
  })
  .strict();

/**
 * Read a JSON config file. Relative directories in it resolve against the
 * file's own location.
 */
export async function loadServerConfig(configPath: string): Promise<ServerConfig> {
  const content = await fs.promises.readFile(configPath, 'utf-8');
  const parsed = serverConfigSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid config ${configPath}: ${issues.join('; ')}`);
  }

  const baseDir = path.dirname(path.resolve(configPath));
  const config: ServerConfig = parsed.data;
  for (const key of ['dataDir', 'uploadsDir', 'backupsDir'] as const) {
    const value = config[key];
    if (value !== undefined) {
      config[key] = path.resolve(baseDir, value);
    }
  }
  return config;
}
