import type { OperationStatus, TransferOperation } from '../types/transfer.js';

// ========== Transition Table ==========

const OPERATION_TRANSITIONS: Record<OperationStatus, OperationStatus[]> = {
  uploading: ['restoring', 'failed'],
  restoring: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminalStatus(status: OperationStatus): boolean {
  return OPERATION_TRANSITIONS[status].length === 0;
}

export function isValidStatusTransition(from: OperationStatus, to: OperationStatus): boolean {
  return OPERATION_TRANSITIONS[from].includes(to);
}

// ========== Events ==========

export type OperationEvent =
  | { type: 'BEGIN_RESTORE' }
  | { type: 'RESTORE_COMPLETE' }
  | { type: 'FAIL' };

export interface OperationTransitionResult {
  success: boolean;
  newStatus: OperationStatus;
  error?: string;
}

// ========== State Machine ==========

export class OperationStateMachine {
  private status: OperationStatus = 'uploading';

  constructor(initialStatus?: OperationStatus) {
    if (initialStatus) {
      this.status = initialStatus;
    }
  }

  getStatus(): OperationStatus {
    return this.status;
  }

  isTerminal(): boolean {
    return isTerminalStatus(this.status);
  }

  transition(event: OperationEvent): OperationTransitionResult {
    const target = this.getTargetStatus(event);

    if (!target) {
      return {
        success: false,
        newStatus: this.status,
        error: `Invalid event ${event.type} for status ${this.status}`,
      };
    }

    if (!isValidStatusTransition(this.status, target)) {
      return {
        success: false,
        newStatus: this.status,
        error: `Invalid transition from ${this.status} to ${target}`,
      };
    }

    this.status = target;
    return { success: true, newStatus: this.status };
  }

  private getTargetStatus(event: OperationEvent): OperationStatus | null {
    switch (event.type) {
      case 'BEGIN_RESTORE':
        return this.status === 'uploading' ? 'restoring' : null;

      case 'RESTORE_COMPLETE':
        return this.status === 'restoring' ? 'completed' : null;

      case 'FAIL':
        return isTerminalStatus(this.status) ? null : 'failed';

      default:
        return null;
    }
  }
}

// ========== Factory ==========

export function createOperation(params: {
  id: string;
  totalChunks: number;
  stagingDir: string;
}): TransferOperation {
  const now = new Date().toISOString();
  return {
    id: params.id,
    kind: 'restore',
    status: 'uploading',
    createdAt: now,
    updatedAt: now,
    chunksReceived: 0,
    totalChunks: params.totalChunks,
    receivedChunks: [],
    stagingDir: params.stagingDir,
  };
}
