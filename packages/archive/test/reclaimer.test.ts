import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { OperationRegistry } from '@snapferry/core';
import { DeferredReclaimer } from '../src/reclaimer.js';

async function exists(target: string): Promise<boolean> {
  return fs.promises.access(target).then(() => true).catch(() => false);
}

describe('DeferredReclaimer', () => {
  let tempDir: string;
  let registry: OperationRegistry;
  let reclaimer: DeferredReclaimer;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'snapferry-test-'));
    registry = new OperationRegistry();
    reclaimer = new DeferredReclaimer(registry);
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
  });

  afterEach(async () => {
    reclaimer.shutdown();
    vi.useRealTimers();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should remove a file only after the delay', async () => {
    const filePath = path.join(tempDir, 'backup.zip');
    await fs.promises.writeFile(filePath, 'zip');

    reclaimer.schedule({ kind: 'file', path: filePath }, 600_000);

    vi.advanceTimersByTime(599_999);
    await reclaimer.settle();
    expect(await exists(filePath)).toBe(true);

    vi.advanceTimersByTime(1);
    await reclaimer.settle();
    expect(await exists(filePath)).toBe(false);
    expect(reclaimer.pendingCount).toBe(0);
  });

  it('should remove an operation record with its staging directory', async () => {
    const stagingDir = path.join(tempDir, 'op-1');
    await fs.promises.mkdir(stagingDir);
    await fs.promises.writeFile(path.join(stagingDir, 'chunk_0'), 'a');
    registry.create({ id: 'op-1', totalChunks: 1, stagingDir });

    reclaimer.schedule({ kind: 'operation', operationId: 'op-1', stagingDir }, 1000);
    vi.advanceTimersByTime(1000);
    await reclaimer.settle();

    expect(await exists(stagingDir)).toBe(false);
    expect(registry.has('op-1')).toBe(false);
  });

  it('should report completion only after the removal ran', async () => {
    const dirPath = path.join(tempDir, 'staging');
    await fs.promises.mkdir(dirPath);
    const onReclaimed = vi.fn();

    reclaimer.schedule({ kind: 'directory', path: dirPath }, 1000, onReclaimed);
    vi.advanceTimersByTime(999);
    await reclaimer.settle();
    expect(onReclaimed).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    await reclaimer.settle();
    expect(onReclaimed).toHaveBeenCalledTimes(1);
    expect(await exists(dirPath)).toBe(false);
  });

  it('should not remove a cancelled target', async () => {
    const dirPath = path.join(tempDir, 'staging');
    await fs.promises.mkdir(dirPath);

    const handle = reclaimer.schedule({ kind: 'directory', path: dirPath }, 1000);
    handle.cancel();
    vi.advanceTimersByTime(5000);
    await reclaimer.settle();

    expect(await exists(dirPath)).toBe(true);
    expect(reclaimer.pendingCount).toBe(0);
  });

  it('should tolerate targets that are already gone', async () => {
    await expect(
      reclaimer.reclaimNow({ kind: 'file', path: path.join(tempDir, 'missing.zip') }),
    ).resolves.toBeUndefined();
    await expect(
      reclaimer.reclaimNow({ kind: 'operation', operationId: 'unknown', stagingDir: path.join(tempDir, 'gone') }),
    ).resolves.toBeUndefined();
  });

  it('should drop every scheduled removal on shutdown', async () => {
    const filePath = path.join(tempDir, 'backup.zip');
    await fs.promises.writeFile(filePath, 'zip');
    reclaimer.schedule({ kind: 'file', path: filePath }, 1000);
    reclaimer.schedule({ kind: 'directory', path: path.join(tempDir, 'x') }, 1000);
    expect(reclaimer.pendingCount).toBe(2);

    reclaimer.shutdown();
    vi.advanceTimersByTime(1000);
    await reclaimer.settle();

    expect(reclaimer.pendingCount).toBe(0);
    expect(await exists(filePath)).toBe(true);
  });
});
