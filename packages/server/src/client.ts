/**
 * Transfer Client
 *
 * HTTP client for a running transfer server: resumable backup download
 * and chunked restore upload.
 *
 * @example
 * ```typescript
 * import { TransferClient } from '@snapferry/server';
 *
 * const client = new TransferClient('http://localhost:5000');
 *
 * // Download, resuming a partial file if one is there
 * const backup = await client.downloadBackup('/tmp/backup.zip', { resume: true });
 *
 * // Upload in 1MB chunks and restore
 * const result = await client.uploadRestore('/tmp/backup.zip', { chunkSize: 1024 * 1024 });
 * console.log(result.restored_files);
 * ```
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ChecksumMismatchError, generateOperationId } from '@snapferry/core';
import { computeFileChecksum, checksumsMatch, type ChecksumAlgorithm } from '@snapferry/archive';
import {
  isRestoreCompleted,
  type BackupStatusResponse,
  type ChunkStatusResponse,
  type ErrorResponse,
  type OperationView,
  type RestoreCompletedResponse,
  type RestoreResponse,
  type VerifyResponse,
} from './types.js';

export interface TransferClientOptions {
  /** Per-request timeout (ms) */
  timeout?: number;
  /** Attempts per request before giving up */
  retries?: number;
  /** Base delay between attempts (ms), multiplied by the attempt number */
  retryDelayMs?: number;
  checksumAlgorithm?: ChecksumAlgorithm;
}

export interface DownloadOptions {
  /** Continue from the bytes already in `destPath` */
  resume?: boolean;
  /** Block size the server reads with */
  chunkSize?: number;
}

export interface DownloadResult {
  path: string;
  fileName: string;
  totalSize: number;
  checksum: string;
  /** True when some bytes came from an earlier partial download */
  resumed: boolean;
}

export interface UploadOptions {
  /** Bytes per chunk */
  chunkSize?: number;
  /** Continue an earlier upload; chunks the server already has are skipped */
  uploadId?: string;
}

export const DEFAULT_UPLOAD_CHUNK_SIZE = 1024 * 1024;

/**
 * HTTP error from the transfer server
 */
export class TransferClientError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: ErrorResponse | undefined,
  ) {
    super(message);
    this.name = 'TransferClientError';
  }

  /** Server-side faults and timeouts are worth retrying; client errors are not */
  get retryable(): boolean {
    return this.status >= 500;
  }
}

function isErrorResponse(value: unknown): value is ErrorResponse {
  return typeof value === 'object' && value !== null && 'error' in value && typeof value.error === 'string';
}

function parseContentDisposition(header: string | null): string | undefined {
  const match = header?.match(/filename="?([^";]+)"?/);
  return match?.[1];
}

export class TransferClient {
  private baseUrl: string;
  private timeout: number;
  private retries: number;
  private retryDelayMs: number;
  private checksumAlgorithm: ChecksumAlgorithm;

  constructor(serverUrl: string, options?: TransferClientOptions) {
    this.baseUrl = serverUrl.replace(/\/$/, '');
    this.timeout = options?.timeout ?? 5 * 60 * 1000;
    this.retries = Math.max(1, options?.retries ?? 3);
    this.retryDelayMs = options?.retryDelayMs ?? 1000;
    this.checksumAlgorithm = options?.checksumAlgorithm ?? 'md5';
  }

  async getBackupStatus(): Promise<BackupStatusResponse> {
    return this.request<BackupStatusResponse>('/backup/status');
  }

  async verifyBackup(fileName: string, checksum: string): Promise<VerifyResponse> {
    const query = new URLSearchParams({ checksum, filename: fileName });
    return this.request<VerifyResponse>(`/backup/verify?${query.toString()}`);
  }

  async getOperation(uploadId: string): Promise<OperationView> {
    return this.request<OperationView>(`/operation/status/${encodeURIComponent(uploadId)}`);
  }

  async getChunkStatus(uploadId: string): Promise<ChunkStatusResponse> {
    return this.request<ChunkStatusResponse>(`/restore/chunks/${encodeURIComponent(uploadId)}`);
  }

  async health(): Promise<boolean> {
    try {
      await this.request('/health');
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Download the current backup to `destPath`. Interrupted attempts resume
   * with a Range request; the result is checked against X-Checksum.
   */
  async downloadBackup(destPath: string, options: DownloadOptions = {}): Promise<DownloadResult> {
    await fs.promises.mkdir(path.dirname(destPath), { recursive: true });

    let offset = 0;
    if (options.resume) {
      const stats = await fs.promises.stat(destPath).catch(() => undefined);
      offset = stats?.isFile() ? stats.size : 0;
    }
    let resumed = offset > 0;

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.downloadFrom(destPath, offset, options.chunkSize);
        const actual = await computeFileChecksum(destPath, { algorithm: this.checksumAlgorithm });

        if (checksumsMatch(result.checksum, actual)) {
          return { path: destPath, ...result, resumed };
        }
        if (!resumed) {
          throw new ChecksumMismatchError(result.checksum, actual);
        }

        // The partial bytes came from a different archive; start over
        console.warn('[Snapferry:Client] Resumed download failed verification, restarting');
        offset = 0;
        resumed = false;
      } catch (error) {
        if (error instanceof TransferClientError && error.status === 416 && offset > 0) {
          // Partial file is at least as long as the current archive
          offset = 0;
          resumed = false;
          continue;
        }
        if (attempt >= this.retries || (error instanceof TransferClientError && !error.retryable)) {
          throw error;
        }
        console.warn(
          `[Snapferry:Client] Download attempt ${attempt}/${this.retries} failed:`,
          error instanceof Error ? error.message : error,
        );
        await this.delay(attempt);

        if (error instanceof ChecksumMismatchError) {
          offset = 0;
        } else {
          const stats = await fs.promises.stat(destPath).catch(() => undefined);
          offset = stats?.isFile() ? stats.size : 0;
          resumed = resumed || offset > 0;
        }
      }
    }
  }

  /**
   * Upload `archivePath` in chunks and return the final restore result.
   */
  async uploadRestore(archivePath: string, options: UploadOptions = {}): Promise<RestoreCompletedResponse> {
    const chunkSize = options.chunkSize ?? DEFAULT_UPLOAD_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`Invalid chunk size: ${chunkSize}`);
    }

    const stats = await fs.promises.stat(archivePath);
    const totalChunks = Math.max(1, Math.ceil(stats.size / chunkSize));
    const checksum = await computeFileChecksum(archivePath, { algorithm: this.checksumAlgorithm });
    const uploadId = options.uploadId ?? generateOperationId();
    const fileName = path.basename(archivePath);

    let pending = Array.from({ length: totalChunks }, (_, i) => i);
    if (options.uploadId) {
      const status = await this.getChunkStatus(options.uploadId).catch((error: unknown) => {
        if (error instanceof TransferClientError && error.status === 404) return undefined;
        throw error;
      });
      if (status) {
        pending = status.missing;
      }
    }

    if (pending.length === 0) {
      throw new Error(`Upload ${uploadId} already has every chunk; check GET /operation/status/${uploadId}`);
    }

    let last: RestoreResponse | undefined;
    for (const index of pending) {
      const data = await this.readChunk(archivePath, index * chunkSize, Math.min(chunkSize, stats.size - index * chunkSize));
      last = await this.withRetry(`Chunk ${index}`, () =>
        this.sendChunk({ data, fileName, index, uploadId, totalChunks, checksum }),
      );
    }

    if (!last || !isRestoreCompleted(last)) {
      throw new Error(`Upload ${uploadId} finished without a restore result`);
    }
    return last;
  }

  private async downloadFrom(
    destPath: string,
    offset: number,
    chunkSize: number | undefined,
  ): Promise<Omit<DownloadResult, 'path' | 'resumed'>> {
    const query = chunkSize ? `?chunk_size=${chunkSize}` : '';
    const headers: Record<string, string> = offset > 0 ? { Range: `bytes=${offset}-` } : {};

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(`${this.baseUrl}/backup${query}`, { headers, signal: controller.signal });
      if (!response.ok) {
        throw await this.toError(response);
      }
      if (!response.body) {
        throw new Error('Download failed: no response body');
      }

      const checksum = response.headers.get('X-Checksum') ?? '';
      const totalSize = Number(response.headers.get('X-Total-Size') ?? '0');
      const fileName = parseContentDisposition(response.headers.get('Content-Disposition')) ?? path.basename(destPath);

      // A 200 means the server sent everything from byte 0
      const append = response.status === 206;
      const fileHandle = await fs.promises.open(destPath, append ? 'a' : 'w');

      try {
        const reader = response.body.getReader();
        try {
          while (true) {
            const { done, value } = await reader.read();
            if (done) break;
            await fileHandle.write(value);
          }
        } finally {
          reader.releaseLock();
        }
      } finally {
        await fileHandle.close();
      }

      return { fileName, totalSize, checksum };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async sendChunk(params: {
    data: Buffer;
    fileName: string;
    index: number;
    uploadId: string;
    totalChunks: number;
    checksum: string;
  }): Promise<RestoreResponse> {
    const form = new FormData();
    form.append('chunk', String(params.index));
    form.append('upload_id', params.uploadId);
    form.append('total_chunks', String(params.totalChunks));
    form.append('checksum', params.checksum);
    form.append('backup_file', new Blob([params.data]), params.fileName);

    return this.request<RestoreResponse>('/restore', { method: 'POST', body: form });
  }

  private async withRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= this.retries || (error instanceof TransferClientError && !error.retryable)) {
          throw error;
        }
        console.warn(
          `[Snapferry:Client] ${label} attempt ${attempt}/${this.retries} failed:`,
          error instanceof Error ? error.message : error,
        );
        await this.delay(attempt);
      }
    }
  }

  private async delay(attempt: number): Promise<void> {
    if (this.retryDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs * attempt));
    }
  }

  /**
   * Read a range of bytes from file
   */
  private async readChunk(filePath: string, offset: number, size: number): Promise<Buffer> {
    const buffer = Buffer.alloc(size);
    const fileHandle = await fs.promises.open(filePath, 'r');

    try {
      const { bytesRead } = await fileHandle.read(buffer, 0, size, offset);
      return buffer.subarray(0, bytesRead);
    } finally {
      await fileHandle.close();
    }
  }

  private async toError(response: Response): Promise<TransferClientError> {
    const body: unknown = await response.json().catch(() => undefined);
    const errorBody = isErrorResponse(body) ? body : undefined;
    const parts = [errorBody?.error ?? `HTTP ${response.status}: ${response.statusText}`];
    if (errorBody?.hint) parts.push(`Hint: ${errorBody.hint}`);
    return new TransferClientError(parts.join('. '), response.status, errorBody);
  }

  private async request<T>(urlPath: string, options?: { method?: string; body?: FormData }): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(`${this.baseUrl}${urlPath}`, {
        method: options?.method ?? 'GET',
        body: options?.body,
        signal: controller.signal,
      });

      if (!response.ok) {
        throw await this.toError(response);
      }

      return (await response.json()) as T;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
