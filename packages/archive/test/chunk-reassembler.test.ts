import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  OperationRegistry,
  InvalidChunkError,
  MissingChunkError,
  OperationConflictError,
  UnknownOperationError,
} from '@snapferry/core';
import { ChunkReassembler, ASSEMBLED_ARCHIVE_NAME } from '../src/chunk-reassembler.js';

const IDLE_TIMEOUT_MS = 60_000;

describe('ChunkReassembler', () => {
  let tempDir: string;
  let registry: OperationRegistry;
  let reassembler: ChunkReassembler;
  let onIdleTimeout: Mock<(operationId: string) => void>;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'snapferry-test-'));
    registry = new OperationRegistry();
    onIdleTimeout = vi.fn<(operationId: string) => void>();
    reassembler = new ChunkReassembler(registry, {
      uploadsDir: tempDir,
      idleTimeoutMs: IDLE_TIMEOUT_MS,
      onIdleTimeout,
    });
  });

  afterEach(async () => {
    reassembler.shutdown();
    vi.useRealTimers();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  describe('begin', () => {
    it('should mint an id and create the staging directory', async () => {
      const id = await reassembler.begin(undefined, 3);

      expect(id).toMatch(/^op_[a-f0-9]{32}$/);
      const stat = await fs.promises.stat(path.join(tempDir, id));
      expect(stat.isDirectory()).toBe(true);
      expect(registry.require(id)).toMatchObject({ status: 'uploading', totalChunks: 3, chunksReceived: 0 });
    });

    it('should keep a client-supplied id', async () => {
      expect(await reassembler.begin('client-upload_1', 2)).toBe('client-upload_1');
    });

    it('should reject an id that could escape the uploads directory', async () => {
      await expect(reassembler.begin('../escape', 2)).rejects.toBeInstanceOf(InvalidChunkError);
      expect(registry.size).toBe(0);
    });

    it('should reject a non-positive chunk count', async () => {
      await expect(reassembler.begin('upload-1', 0)).rejects.toBeInstanceOf(InvalidChunkError);
    });

    it('should reject a duplicate id', async () => {
      await reassembler.begin('upload-1', 2);
      await expect(reassembler.begin('upload-1', 2)).rejects.toBeInstanceOf(OperationConflictError);
    });
  });

  describe('accept', () => {
    it('should fail for an unknown operation', async () => {
      await expect(reassembler.accept('nope', 0, Buffer.from('x'))).rejects.toBeInstanceOf(UnknownOperationError);
    });

    it('should reject an index outside the declared range', async () => {
      const id = await reassembler.begin(undefined, 2);

      await expect(reassembler.accept(id, 2, Buffer.from('x'))).rejects.toBeInstanceOf(InvalidChunkError);
      await expect(reassembler.accept(id, -1, Buffer.from('x'))).rejects.toBeInstanceOf(InvalidChunkError);
    });

    it('should report progress and readiness', async () => {
      const id = await reassembler.begin(undefined, 2);

      expect(await reassembler.accept(id, 0, Buffer.from('a'))).toEqual({
        type: 'more_expected',
        chunksReceived: 1,
        totalChunks: 2,
      });
      expect(await reassembler.accept(id, 1, Buffer.from('b'))).toEqual({
        type: 'ready_to_assemble',
        chunksReceived: 2,
        totalChunks: 2,
      });
    });

    it('should refuse chunks once the restore was claimed', async () => {
      const id = await reassembler.begin(undefined, 1);
      await reassembler.accept(id, 0, Buffer.from('a'));
      registry.markRestoring(id);

      await expect(reassembler.accept(id, 0, Buffer.from('a'))).rejects.toBeInstanceOf(OperationConflictError);
    });
  });

  describe('assemble', () => {
    const payload = Buffer.from('0123456789abcdefghijklmnopqrstuvwxyz');
    const parts = [payload.subarray(0, 12), payload.subarray(12, 24), payload.subarray(24)];

    it('should concatenate chunks in index order regardless of arrival order', async () => {
      const id = await reassembler.begin(undefined, 3);

      for (const index of [2, 0, 2, 1]) {
        await reassembler.accept(id, index, parts[index] ?? Buffer.alloc(0));
      }

      expect(registry.require(id).chunksReceived).toBe(3);
      const archivePath = await reassembler.assemble(id);
      expect(path.basename(archivePath)).toBe(ASSEMBLED_ARCHIVE_NAME);
      expect((await fs.promises.readFile(archivePath)).equals(payload)).toBe(true);
    });

    it('should list missing chunks', async () => {
      const id = await reassembler.begin(undefined, 3);
      await reassembler.accept(id, 0, parts[0] ?? Buffer.alloc(0));
      await reassembler.accept(id, 2, parts[2] ?? Buffer.alloc(0));

      const error = await reassembler.assemble(id).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MissingChunkError);
      if (error instanceof MissingChunkError) {
        expect(error.missing).toEqual([1]);
        expect(error.message).toBe('Missing chunks: 1');
      }
    });
  });

  describe('getStatus', () => {
    it('should report received and missing indices', async () => {
      const id = await reassembler.begin(undefined, 4);
      await reassembler.accept(id, 3, Buffer.from('d'));
      await reassembler.accept(id, 1, Buffer.from('b'));

      expect(reassembler.getStatus(id)).toEqual({ received: [1, 3], missing: [0, 2], complete: false });
    });
  });

  describe('idle timeout', () => {
    it('should fail an upload that stops sending chunks', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      const id = await reassembler.begin(undefined, 2);

      vi.advanceTimersByTime(IDLE_TIMEOUT_MS);

      expect(registry.require(id)).toMatchObject({ status: 'failed', error: 'Upload idle timeout' });
      expect(onIdleTimeout).toHaveBeenCalledWith(id);
    });

    it('should restart the timer on every chunk', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      const id = await reassembler.begin(undefined, 2);

      vi.advanceTimersByTime(IDLE_TIMEOUT_MS - 1);
      await reassembler.accept(id, 0, Buffer.from('a'));
      vi.advanceTimersByTime(IDLE_TIMEOUT_MS - 1);

      expect(registry.require(id).status).toBe('uploading');
      expect(onIdleTimeout).not.toHaveBeenCalled();
    });

    it('should stop watching a released upload', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      const id = await reassembler.begin(undefined, 2);

      reassembler.release(id);
      vi.advanceTimersByTime(IDLE_TIMEOUT_MS * 2);

      expect(registry.require(id).status).toBe('uploading');
    });
  });
});
