/**
 * Wire types for the transfer HTTP API. Field names are snake_case on the
 * wire; the in-process model in @snapferry/core is camelCase.
 */

import type { ErrorCode, OperationKind, OperationStatus, TransferOperation } from '@snapferry/core';

export interface ManagedFileView {
  path: string;
  exists: boolean;
  size_bytes: number;
  size_formatted: string;
}

export interface BackupStatusResponse {
  databases: ManagedFileView[];
  total_size_bytes: number;
  total_size_formatted: string;
  all_files_exist: boolean;
}

export type VerifyResponse =
  | { verified: true }
  | { verified: false; expected: string; received: string };

export interface RestoreProgressResponse {
  success: true;
  upload_id: string;
  message: string;
  chunks_received: number;
  total_chunks: number;
}

export interface RestoreCompletedResponse {
  success: true;
  message: string;
  restored_files: string[];
  upload_id: string;
}

export type RestoreResponse = RestoreProgressResponse | RestoreCompletedResponse;

export interface ChunkStatusResponse {
  upload_id: string;
  received: number[];
  missing: number[];
  complete: boolean;
}

export interface OperationView {
  upload_id: string;
  type: OperationKind;
  status: OperationStatus;
  created_at: string;
  updated_at: string;
  completed_at?: string;
  chunks_received: number;
  total_chunks: number;
  received_chunks: number[];
  restored_files?: string[];
  error?: string;
}

export interface ErrorResponse {
  error: string;
  code?: ErrorCode | string;
  hint?: string;
  upload_id?: string;
  expected?: string;
  calculated?: string;
}

export const RESTORE_COMPLETED_MESSAGE = 'Database restore completed successfully';

export function isRestoreCompleted(response: RestoreResponse): response is RestoreCompletedResponse {
  return 'restored_files' in response;
}

export function toOperationView(operation: TransferOperation): OperationView {
  const view: OperationView = {
    upload_id: operation.id,
    type: operation.kind,
    status: operation.status,
    created_at: operation.createdAt,
    updated_at: operation.updatedAt,
    chunks_received: operation.chunksReceived,
    total_chunks: operation.totalChunks,
    received_chunks: operation.receivedChunks,
  };
  if (operation.completedAt) view.completed_at = operation.completedAt;
  if (operation.restoredFiles) view.restored_files = operation.restoredFiles;
  if (operation.error) view.error = operation.error;
  return view;
}
