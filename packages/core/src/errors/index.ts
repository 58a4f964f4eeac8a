/**
 * Transfer Error Codes
 */
export const ErrorCodes = {
  SOURCE_MISSING: 'SOURCE_MISSING',
  CORRUPT_ARCHIVE: 'CORRUPT_ARCHIVE',
  RANGE_NOT_SATISFIABLE: 'RANGE_NOT_SATISFIABLE',
  INVALID_RANGE: 'INVALID_RANGE',
  UNKNOWN_OPERATION: 'UNKNOWN_OPERATION',
  MISSING_CHUNK: 'MISSING_CHUNK',
  INVALID_CHUNK: 'INVALID_CHUNK',
  CHECKSUM_MISMATCH: 'CHECKSUM_MISMATCH',
  NOTHING_TO_RESTORE: 'NOTHING_TO_RESTORE',
  OPERATION_CONFLICT: 'OPERATION_CONFLICT',
  IO_FAILURE: 'IO_FAILURE',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

const HTTP_STATUS: Record<ErrorCode, number> = {
  SOURCE_MISSING: 404,
  CORRUPT_ARCHIVE: 400,
  RANGE_NOT_SATISFIABLE: 416,
  INVALID_RANGE: 400,
  UNKNOWN_OPERATION: 404,
  MISSING_CHUNK: 400,
  INVALID_CHUNK: 400,
  CHECKSUM_MISMATCH: 400,
  NOTHING_TO_RESTORE: 400,
  OPERATION_CONFLICT: 409,
  IO_FAILURE: 500,
};

export interface TransferErrorBody {
  error: string;
  code: ErrorCode;
  hint?: string;
  upload_id?: string;
}

/**
 * Base class for transfer errors
 */
export class TransferError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
    /** Set by callers that know which operation the failure belongs to */
    public operationId?: string,
  ) {
    super(message);
    this.name = 'TransferError';
  }

  get httpStatus(): number {
    return HTTP_STATUS[this.code];
  }

  toErrorBody(): TransferErrorBody {
    const body: TransferErrorBody = {
      error: this.message,
      code: this.code,
    };
    if (this.hint) body.hint = this.hint;
    if (this.operationId) body.upload_id = this.operationId;
    return body;
  }
}

export function httpStatusForError(error: unknown): number {
  return error instanceof TransferError ? error.httpStatus : 500;
}

/**
 * Error: A managed file required for the archive does not exist
 */
export class SourceMissingError extends TransferError {
  constructor(public readonly sourcePath: string) {
    super(
      ErrorCodes.SOURCE_MISSING,
      `Database file ${sourcePath} not found`,
      'Check the managed file paths and the data directory',
    );
    this.name = 'SourceMissingError';
  }
}

/**
 * Error: The container's structure is not a readable ZIP archive
 */
export class CorruptArchiveError extends TransferError {
  constructor(reason: string, operationId?: string) {
    super(
      ErrorCodes.CORRUPT_ARCHIVE,
      `Invalid zip file provided: ${reason}`,
      'Upload a ZIP archive produced by GET /backup',
      operationId,
    );
    this.name = 'CorruptArchiveError';
  }
}

export class RangeNotSatisfiableError extends TransferError {
  constructor(
    public readonly start: number,
    public readonly total: number,
  ) {
    super(
      ErrorCodes.RANGE_NOT_SATISFIABLE,
      `Range not satisfiable: start ${start} is beyond total length ${total}`,
    );
    this.name = 'RangeNotSatisfiableError';
  }
}

export class InvalidRangeError extends TransferError {
  constructor(header: string) {
    super(
      ErrorCodes.INVALID_RANGE,
      `Invalid range header: ${header}`,
      'Use the form "bytes=<start>-<end>"',
    );
    this.name = 'InvalidRangeError';
  }
}

export class UnknownOperationError extends TransferError {
  constructor(operationId: string) {
    super(
      ErrorCodes.UNKNOWN_OPERATION,
      `Upload session not found: ${operationId}`,
      'Start a new upload with chunk 0',
      operationId,
    );
    this.name = 'UnknownOperationError';
  }
}

export class MissingChunkError extends TransferError {
  constructor(
    public readonly missing: number[],
    operationId?: string,
  ) {
    super(
      ErrorCodes.MISSING_CHUNK,
      `Missing chunks: ${missing.join(', ')}`,
      'Resend the missing chunks',
      operationId,
    );
    this.name = 'MissingChunkError';
  }
}

export class InvalidChunkError extends TransferError {
  constructor(reason: string, operationId?: string) {
    super(ErrorCodes.INVALID_CHUNK, `Invalid chunk: ${reason}`, undefined, operationId);
    this.name = 'InvalidChunkError';
  }
}

export class ChecksumMismatchError extends TransferError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
    operationId?: string,
  ) {
    super(
      ErrorCodes.CHECKSUM_MISMATCH,
      'Checksum verification failed',
      `Expected ${expected}, calculated ${actual}`,
      operationId,
    );
    this.name = 'ChecksumMismatchError';
  }
}

export class NothingToRestoreError extends TransferError {
  constructor(operationId?: string) {
    super(
      ErrorCodes.NOTHING_TO_RESTORE,
      'No valid database files found in the backup',
      undefined,
      operationId,
    );
    this.name = 'NothingToRestoreError';
  }
}

/**
 * Error: The operation is not in a state that allows the requested action
 */
export class OperationConflictError extends TransferError {
  constructor(reason: string, operationId?: string) {
    super(ErrorCodes.OPERATION_CONFLICT, reason, undefined, operationId);
    this.name = 'OperationConflictError';
  }
}

export class IoFailureError extends TransferError {
  constructor(reason: string, operationId?: string) {
    super(ErrorCodes.IO_FAILURE, reason, undefined, operationId);
    this.name = 'IoFailureError';
  }
}
