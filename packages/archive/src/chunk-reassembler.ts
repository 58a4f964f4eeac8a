/**
 * Chunk Reassembler - server-side receiver for chunked restore uploads
 *
 * Persists numbered chunks into a per-operation staging directory and
 * concatenates them in index order once every chunk has arrived.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ChunkOutcome, ChunkStatus, OperationRegistry } from '@snapferry/core';
import {
  generateOperationId,
  isValidOperationId,
  InvalidChunkError,
  IoFailureError,
  MissingChunkError,
  OperationConflictError,
} from '@snapferry/core';

export interface ChunkReassemblerConfig {
  /** Root for per-operation staging directories */
  uploadsDir: string;
  /** Idle time (ms) after which an upload that stopped sending chunks is failed */
  idleTimeoutMs: number;
  /** Called after an idle upload has been marked failed */
  onIdleTimeout?: (operationId: string) => void;
}

export const ASSEMBLED_ARCHIVE_NAME = 'combined.zip';
export const SINGLE_UPLOAD_NAME = 'backup.zip';

export function chunkFileName(index: number): string {
  return `chunk_${index}`;
}

export class ChunkReassembler {
  private config: ChunkReassemblerConfig;
  private idleTimers = new Map<string, ReturnType<typeof setTimeout>>();

  constructor(
    private registry: OperationRegistry,
    config: ChunkReassemblerConfig,
  ) {
    this.config = config;
  }

  /**
   * Register a new upload and create its staging directory.
   * Mints an id when the client did not supply one.
   */
  async begin(requestedId: string | undefined, totalChunks: number): Promise<string> {
    const operationId = requestedId ?? generateOperationId();

    if (!isValidOperationId(operationId)) {
      throw new InvalidChunkError(`upload id must match [A-Za-z0-9_-]{1,128}, got "${operationId}"`);
    }
    if (!Number.isInteger(totalChunks) || totalChunks < 1) {
      throw new InvalidChunkError(`total_chunks must be a positive integer, got ${totalChunks}`, operationId);
    }

    const stagingDir = path.join(this.config.uploadsDir, operationId);
    this.registry.create({ id: operationId, totalChunks, stagingDir });

    try {
      await fs.promises.mkdir(stagingDir, { recursive: true });
    } catch (error) {
      this.registry.markFailed(operationId, 'Failed to create staging directory');
      throw new IoFailureError(
        `Failed to create staging directory: ${error instanceof Error ? error.message : String(error)}`,
        operationId,
      );
    }

    this.startIdleTimer(operationId);
    return operationId;
  }

  /**
   * Persist one chunk. The last write for an index wins.
   */
  async accept(operationId: string, index: number, data: Buffer): Promise<ChunkOutcome> {
    const operation = this.registry.require(operationId);

    if (!Number.isInteger(index) || index < 0 || index >= operation.totalChunks) {
      throw new InvalidChunkError(
        `index ${index}, expected 0-${operation.totalChunks - 1}`,
        operationId,
      );
    }

    const outcome = await this.registry.runExclusive(operationId, async () => {
      const current = this.registry.require(operationId);
      if (current.status !== 'uploading') {
        throw new OperationConflictError(
          `Operation ${operationId} is ${current.status}, not accepting chunks`,
          operationId,
        );
      }

      const chunkPath = path.join(operation.stagingDir, chunkFileName(index));
      try {
        await fs.promises.writeFile(chunkPath, data);
      } catch (error) {
        throw new IoFailureError(
          `Failed to store chunk ${index}: ${error instanceof Error ? error.message : String(error)}`,
          operationId,
        );
      }
      return this.registry.recordChunk(operationId, index);
    });

    this.startIdleTimer(operationId);
    return outcome;
  }

  /**
   * Concatenate chunks 0..totalChunks-1 into one archive inside the
   * staging directory. Callers hold the operation lock so no chunk write
   * can interleave with the read.
   */
  async assemble(operationId: string): Promise<string> {
    const operation = this.registry.require(operationId);
    this.clearIdleTimer(operationId);

    const missing = this.getMissingIndices(operation.receivedChunks, operation.totalChunks);
    if (missing.length > 0) {
      throw new MissingChunkError(missing, operationId);
    }

    const archivePath = path.join(operation.stagingDir, ASSEMBLED_ARCHIVE_NAME);
    const output = await fs.promises.open(archivePath, 'w');

    try {
      for (let i = 0; i < operation.totalChunks; i++) {
        const chunkData = await fs.promises.readFile(path.join(operation.stagingDir, chunkFileName(i)));
        await output.write(chunkData);
      }
    } finally {
      await output.close();
    }

    return archivePath;
  }

  /**
   * Received and missing indices, for resuming an interrupted upload
   */
  getStatus(operationId: string): ChunkStatus {
    const operation = this.registry.require(operationId);
    const missing = this.getMissingIndices(operation.receivedChunks, operation.totalChunks);
    return {
      received: operation.receivedChunks,
      missing,
      complete: missing.length === 0,
    };
  }

  /**
   * Stop watching an upload for idleness (once its restore was claimed).
   */
  release(operationId: string): void {
    this.clearIdleTimer(operationId);
  }

  shutdown(): void {
    for (const timer of this.idleTimers.values()) {
      clearTimeout(timer);
    }
    this.idleTimers.clear();
  }

  private getMissingIndices(received: number[], totalChunks: number): number[] {
    const have = new Set(received);
    const missing: number[] = [];
    for (let i = 0; i < totalChunks; i++) {
      if (!have.has(i)) {
        missing.push(i);
      }
    }
    return missing;
  }

  private startIdleTimer(operationId: string): void {
    this.clearIdleTimer(operationId);
    const timer = setTimeout(() => this.onIdleTimeout(operationId), this.config.idleTimeoutMs);
    timer.unref();
    this.idleTimers.set(operationId, timer);
  }

  private clearIdleTimer(operationId: string): void {
    const timer = this.idleTimers.get(operationId);
    if (timer) {
      clearTimeout(timer);
      this.idleTimers.delete(operationId);
    }
  }

  private onIdleTimeout(operationId: string): void {
    this.idleTimers.delete(operationId);

    const operation = this.registry.lookup(operationId);
    if (!operation || operation.status !== 'uploading') {
      return;
    }

    console.warn(`[Snapferry:ChunkReassembler] Upload ${operationId} idle, marking failed`);
    this.registry.markFailed(operationId, 'Upload idle timeout');
    this.config.onIdleTimeout?.(operationId);
  }
}
