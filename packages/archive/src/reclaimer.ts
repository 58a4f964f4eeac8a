/**
 * Deferred Reclaimer
 *
 * Removes temporary archives, staging directories and finished operation
 * records after a grace period. Removal is best effort; failures are
 * logged and never thrown.
 */

import * as fs from 'node:fs';
import type { ReclaimableRegistry } from '@snapferry/core';

export type ReclaimTarget =
  | { kind: 'file'; path: string }
  | { kind: 'directory'; path: string }
  | { kind: 'operation'; operationId: string; stagingDir: string };

export interface ReclaimHandle {
  readonly target: ReclaimTarget;
  readonly dueAt: number;
  cancel(): void;
}

export class DeferredReclaimer {
  private pending = new Map<ReclaimHandle, ReturnType<typeof setTimeout>>();
  private inFlight = new Set<Promise<void>>();

  constructor(private registry: ReclaimableRegistry) {}

  /**
   * Remove `target` no sooner than `delayMs` from now. `onReclaimed` runs
   * once the removal has finished; it does not run for a cancelled handle.
   */
  schedule(target: ReclaimTarget, delayMs: number, onReclaimed?: () => void): ReclaimHandle {
    const handle: ReclaimHandle = {
      target,
      dueAt: Date.now() + delayMs,
      cancel: () => {
        const timer = this.pending.get(handle);
        if (timer) {
          clearTimeout(timer);
          this.pending.delete(handle);
        }
      },
    };

    const timer = setTimeout(() => {
      this.pending.delete(handle);
      this.track(this.reclaim(target).then(() => onReclaimed?.()));
    }, delayMs);
    timer.unref();

    this.pending.set(handle, timer);
    return handle;
  }

  /**
   * Remove `target` right away.
   */
  async reclaimNow(target: ReclaimTarget): Promise<void> {
    const task = this.reclaim(target);
    this.track(task);
    await task;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Wait for removals that have already started.
   */
  async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  /**
   * Cancel every scheduled removal. Removals already running finish.
   */
  shutdown(): void {
    for (const timer of this.pending.values()) {
      clearTimeout(timer);
    }
    this.pending.clear();
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.then(() => this.inFlight.delete(task));
  }

  private async reclaim(target: ReclaimTarget): Promise<void> {
    switch (target.kind) {
      case 'file':
        await removePath(target.path);
        break;

      case 'directory':
        await removePath(target.path);
        break;

      case 'operation':
        await removePath(target.stagingDir);
        this.registry.delete(target.operationId);
        break;
    }
  }
}

async function removePath(targetPath: string): Promise<void> {
  try {
    await fs.promises.rm(targetPath, { recursive: true, force: true });
  } catch (error) {
    console.warn(
      `[Snapferry:Reclaimer] Failed to remove ${targetPath}:`,
      error instanceof Error ? error.message : error,
    );
  }
}
