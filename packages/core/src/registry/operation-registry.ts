/**
 * Operation Registry
 *
 * In-memory table of transfer operations keyed by operation id. Every
 * mutation goes through a state machine transition; records handed out are
 * copies, so callers cannot mutate registry state directly.
 */

import type { ChunkOutcome, TransferOperation } from '../types/transfer.js';
import {
  OperationStateMachine,
  createOperation,
  type OperationEvent,
} from '../state-machine/operation.js';
import { OperationConflictError, UnknownOperationError } from '../errors/index.js';

/**
 * The only view of the registry that may remove records.
 * Handed to the reclaimer; request handlers never receive it.
 */
export interface ReclaimableRegistry {
  delete(operationId: string): boolean;
}

export interface CreateOperationParams {
  id: string;
  totalChunks: number;
  stagingDir: string;
}

interface Entry {
  operation: TransferOperation;
  stateMachine: OperationStateMachine;
  chunks: Set<number>;
}

export class OperationRegistry implements ReclaimableRegistry {
  private entries = new Map<string, Entry>();
  private locks = new Map<string, Promise<void>>();

  create(params: CreateOperationParams): TransferOperation {
    if (this.entries.has(params.id)) {
      throw new OperationConflictError(`Operation already exists: ${params.id}`, params.id);
    }

    const operation = createOperation(params);
    this.entries.set(params.id, {
      operation,
      stateMachine: new OperationStateMachine(),
      chunks: new Set(),
    });
    return structuredClone(operation);
  }

  has(operationId: string): boolean {
    return this.entries.has(operationId);
  }

  lookup(operationId: string): TransferOperation | undefined {
    const entry = this.entries.get(operationId);
    return entry ? structuredClone(entry.operation) : undefined;
  }

  require(operationId: string): TransferOperation {
    return structuredClone(this.getEntry(operationId).operation);
  }

  list(): TransferOperation[] {
    return Array.from(this.entries.values(), (entry) => structuredClone(entry.operation));
  }

  /**
   * Record a persisted chunk. Counts distinct indices, so a re-delivered
   * chunk never advances the count.
   */
  recordChunk(operationId: string, index: number): ChunkOutcome {
    const entry = this.getEntry(operationId);
    const { operation } = entry;

    if (operation.status !== 'uploading') {
      throw new OperationConflictError(
        `Operation ${operationId} is ${operation.status}, not accepting chunks`,
        operationId,
      );
    }

    entry.chunks.add(index);
    operation.receivedChunks = Array.from(entry.chunks).sort((a, b) => a - b);
    operation.chunksReceived = entry.chunks.size;
    operation.updatedAt = new Date().toISOString();

    const { chunksReceived, totalChunks } = operation;
    return chunksReceived < totalChunks
      ? { type: 'more_expected', chunksReceived, totalChunks }
      : { type: 'ready_to_assemble', chunksReceived, totalChunks };
  }

  /**
   * Compare-and-set uploading -> restoring. Returns false when another
   * request already claimed the restore or the operation has ended.
   */
  markRestoring(operationId: string): boolean {
    return this.apply(operationId, { type: 'BEGIN_RESTORE' });
  }

  markCompleted(operationId: string, restoredFiles: string[]): boolean {
    const ok = this.apply(operationId, { type: 'RESTORE_COMPLETE' });
    if (ok) {
      const { operation } = this.getEntry(operationId);
      operation.restoredFiles = [...restoredFiles];
      operation.completedAt = operation.updatedAt;
    }
    return ok;
  }

  markFailed(operationId: string, error: string): boolean {
    const ok = this.apply(operationId, { type: 'FAIL' });
    if (ok) {
      const { operation } = this.getEntry(operationId);
      operation.error = error;
      operation.completedAt = operation.updatedAt;
    }
    return ok;
  }

  /**
   * Run `fn` while holding the lock for one operation id. Calls for the
   * same id run one after another; different ids do not block each other.
   */
  async runExclusive<T>(operationId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(operationId) ?? Promise.resolve();
    const result = previous.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(operationId, tail);

    try {
      return await result;
    } finally {
      if (this.locks.get(operationId) === tail) {
        this.locks.delete(operationId);
      }
    }
  }

  delete(operationId: string): boolean {
    return this.entries.delete(operationId);
  }

  get size(): number {
    return this.entries.size;
  }

  private apply(operationId: string, event: OperationEvent): boolean {
    const entry = this.getEntry(operationId);
    const result = entry.stateMachine.transition(event);
    if (!result.success) {
      return false;
    }

    entry.operation.status = result.newStatus;
    entry.operation.updatedAt = new Date().toISOString();
    return true;
  }

  private getEntry(operationId: string): Entry {
    const entry = this.entries.get(operationId);
    if (!entry) {
      throw new UnknownOperationError(operationId);
    }
    return entry;
  }
}
