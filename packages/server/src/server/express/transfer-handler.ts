/**
 * Transfer Express Handler
 *
 * Express router exposing backup download, verification, status and
 * chunked restore upload.
 */

import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { Router, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import type { ArchiveInfo, RequestedRange } from '@snapferry/core';
import { ChecksumMismatchError, InvalidChunkError, TransferError } from '@snapferry/core';
import {
  createRangeStream,
  formatContentRange,
  parseRangeHeader,
  resolveRange,
  windowLength,
} from '@snapferry/archive';
import type { ServerConfig } from '../../config.js';
import { TransferService } from '../../transfer-service.js';
import {
  RESTORE_COMPLETED_MESSAGE,
  toOperationView,
  type BackupStatusResponse,
  type ChunkStatusResponse,
  type ErrorResponse,
  type RestoreResponse,
} from '../../types.js';

export interface TransferHandlerOptions {
  config: ServerConfig;
}

export interface TransferHandlerResult {
  /** Express router to mount */
  router: Router;
  /** Service instance; call initialize() before serving */
  service: TransferService;
}

const restoreFieldsSchema = z.object({
  chunk: z.string().regex(/^\d+$/, 'must be a non-negative integer').transform(Number).optional(),
  upload_id: z.string().min(1).optional(),
  total_chunks: z.string().regex(/^[1-9]\d*$/, 'must be a positive integer').transform(Number).optional(),
  checksum: z.string().min(1).optional(),
});

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof TransferError) {
    const status = error.httpStatus;
    const log = status >= 500 ? console.error : console.warn;
    log(`[Snapferry:Transfer] ${context}: ${error.message}`);

    const body: ErrorResponse = error.toErrorBody();
    if (error instanceof ChecksumMismatchError) {
      body.expected = error.expected;
      body.calculated = error.actual;
    }
    res.status(status).json(body);
    return;
  }

  console.error(`[Snapferry:Transfer] ${context}:`, error);
  const body: ErrorResponse = {
    error: error instanceof Error ? error.message : 'Internal error',
  };
  res.status(500).json(body);
}

/**
 * Create an Express router for the transfer endpoints
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { transferHandler } from '@snapferry/server';
 *
 * const app = express();
 * const { router, service } = transferHandler({
 *   config: { dataDir: '/srv/app', managedFiles: ['database/app_data.db'] },
 * });
 *
 * await service.initialize();
 * app.use(router);
 * ```
 */
export function transferHandler(options: TransferHandlerOptions): TransferHandlerResult {
  const router = Router();
  const service = new TransferService({ config: options.config });
  const { transfer } = service.config;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: transfer.maxUploadBytes, files: 1 },
  });

  /**
   * GET /backup - Stream a fresh archive, honoring Range
   */
  router.get('/backup', async (req, res) => {
    let chunkSize = transfer.defaultChunkSize;
    let requested: RequestedRange | undefined;

    try {
      const rawChunkSize = queryString(req.query.chunk_size);
      if (rawChunkSize !== undefined) {
        const parsed = Number(rawChunkSize);
        if (!Number.isInteger(parsed) || parsed <= 0 || parsed > transfer.maxChunkSize) {
          throw new InvalidChunkError(`chunk_size must be an integer between 1 and ${transfer.maxChunkSize}`);
        }
        chunkSize = parsed;
      }

      const rangeHeader = req.headers.range;
      requested = rangeHeader ? parseRangeHeader(rangeHeader) : undefined;
    } catch (error) {
      sendError(res, error, 'Rejected backup request');
      return;
    }

    let info: ArchiveInfo;
    try {
      info = await service.prepareBackup();
    } catch (error) {
      sendError(res, error, 'Backup failed');
      return;
    }

    const archive = info;
    if (res.destroyed) {
      service.releaseBackup(archive);
      return;
    }
    res.on('close', () => service.releaseBackup(archive));

    try {
      const window = resolveRange(requested, archive.totalSize);

      res.status(window.partial ? 206 : 200);
      res.set({
        'Content-Type': 'application/zip',
        'Content-Disposition': `attachment; filename=${archive.fileName}`,
        'Accept-Ranges': 'bytes',
        'Cache-Control': 'no-cache',
        'Content-Length': String(windowLength(window)),
        'X-Checksum': archive.checksum,
        'X-Total-Size': String(archive.totalSize),
      });
      if (window.partial) {
        res.set('Content-Range', formatContentRange(window));
      }

      await pipeline(Readable.from(createRangeStream(archive.archivePath, window, chunkSize)), res);
    } catch (error) {
      if (res.headersSent) {
        console.warn(
          `[Snapferry:Transfer] Stream of ${archive.fileName} ended early:`,
          error instanceof Error ? error.message : error,
        );
        return;
      }
      sendError(res, error, 'Backup failed');
    }
  });

  /**
   * GET /backup/status - Existence and size of each managed file
   */
  router.get('/backup/status', async (_req, res) => {
    try {
      const summary = await service.getBackupStatus();
      const body: BackupStatusResponse = {
        databases: summary.files.map((file) => ({
          path: file.path,
          exists: file.exists,
          size_bytes: file.sizeBytes,
          size_formatted: file.sizeFormatted,
        })),
        total_size_bytes: summary.totalSizeBytes,
        total_size_formatted: summary.totalSizeFormatted,
        all_files_exist: summary.allFilesExist,
      };
      res.json(body);
    } catch (error) {
      sendError(res, error, 'Status check failed');
    }
  });

  /**
   * GET /backup/verify - Compare a checksum with a temp archive
   */
  router.get('/backup/verify', async (req, res) => {
    const checksum = queryString(req.query.checksum);
    const filename = queryString(req.query.filename);

    if (!checksum || !filename) {
      res.status(400).json({ error: 'Missing checksum or filename' });
      return;
    }

    try {
      const result = await service.verifyBackup(filename, checksum);
      if (!result) {
        res.status(404).json({ error: 'Backup file not found' });
        return;
      }
      res.json(result);
    } catch (error) {
      sendError(res, error, 'Verify failed');
    }
  });

  /**
   * POST /restore - Single-shot or chunked restore upload
   */
  router.post(
    '/restore',
    (req: Request, res: Response, next: NextFunction) => {
      upload.single('backup_file')(req, res, (err: unknown) => {
        if (err instanceof multer.MulterError) {
          console.warn(`[Snapferry:Transfer] Upload rejected: ${err.message}`);
          const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
          res.status(status).json({ error: err.message, code: err.code });
          return;
        }
        next(err);
      });
    },
    async (req: Request, res: Response) => {
      if (!req.file) {
        res.status(400).json({ error: 'No backup file provided' });
        return;
      }
      if (!req.file.originalname) {
        res.status(400).json({ error: 'No backup file selected' });
        return;
      }

      const fields = restoreFieldsSchema.safeParse(req.body);
      if (!fields.success) {
        const issue = fields.error.issues[0];
        sendError(
          res,
          new InvalidChunkError(issue ? `${issue.path.join('.')}: ${issue.message}` : 'malformed form fields'),
          'Rejected restore upload',
        );
        return;
      }

      try {
        const result = await service.handleRestoreUpload({
          data: req.file.buffer,
          chunk: fields.data.chunk,
          uploadId: fields.data.upload_id,
          totalChunks: fields.data.total_chunks,
          checksum: fields.data.checksum,
        });

        const body: RestoreResponse =
          result.type === 'progress'
            ? {
                success: true,
                upload_id: result.operationId,
                message: `Chunk ${result.chunk} received successfully`,
                chunks_received: result.chunksReceived,
                total_chunks: result.totalChunks,
              }
            : {
                success: true,
                message: RESTORE_COMPLETED_MESSAGE,
                restored_files: result.restoredFiles,
                upload_id: result.operationId,
              };
        res.json(body);
      } catch (error) {
        sendError(res, error, 'Restore failed');
      }
    },
  );

  /**
   * GET /restore/chunks/:uploadId - Received and missing chunk indices
   */
  router.get('/restore/chunks/:uploadId', (req, res) => {
    try {
      const status = service.getChunkStatus(req.params.uploadId);
      const body: ChunkStatusResponse = { upload_id: req.params.uploadId, ...status };
      res.json(body);
    } catch (error) {
      sendError(res, error, 'Chunk status failed');
    }
  });

  /**
   * GET /operation/status/:uploadId - Operation record
   */
  router.get('/operation/status/:uploadId', (req, res) => {
    const operation = service.getOperation(req.params.uploadId);
    if (!operation) {
      res.status(404).json({ error: 'Operation not found' });
      return;
    }
    res.json(toOperationView(operation));
  });

  /**
   * GET /health - Health check
   */
  router.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return { router, service };
}
