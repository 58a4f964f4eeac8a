/**
 * Restore Engine
 *
 * Replaces managed files with the entries of a validated archive. Current
 * files are always copied aside to a timestamped `.bak` before anything is
 * overwritten; a failed restore leaves those copies for manual recovery.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { OperationRegistry } from '@snapferry/core';
import { formatTimestamp, NothingToRestoreError, OperationConflictError } from '@snapferry/core';
import { extractArchiveEntries, listArchiveEntries } from './utils/index.js';

export interface RestoreTarget {
  /** Path reported back to clients (the configured relative path) */
  label: string;
  /** Absolute destination path */
  path: string;
}

export interface RestoreEngineConfig {
  targets: RestoreTarget[];
  /** Clock for snapshot names */
  now?: () => Date;
}

export interface RestoreResult {
  restoredFiles: string[];
  snapshots: string[];
}

export class RestoreEngine {
  private targets: RestoreTarget[];
  private now: () => Date;

  constructor(
    private registry: OperationRegistry,
    config: RestoreEngineConfig,
  ) {
    this.targets = config.targets;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Restore from `archivePath` for an operation already claimed as
   * `restoring`. Marks the operation completed or failed.
   */
  async restore(archivePath: string, operationId: string): Promise<RestoreResult> {
    const operation = this.registry.require(operationId);
    if (operation.status !== 'restoring') {
      throw new OperationConflictError(
        `Operation ${operationId} is ${operation.status}, expected restoring`,
        operationId,
      );
    }

    try {
      const entries = await listArchiveEntries(archivePath);
      const snapshots = await this.snapshotCurrentFiles();

      const destinations = new Map<string, string>();
      for (const target of this.targets) {
        await fs.promises.mkdir(path.dirname(target.path), { recursive: true });
        const name = path.basename(target.path);
        if (entries.has(name)) {
          destinations.set(name, target.path);
        }
      }

      const written = new Set(await extractArchiveEntries(archivePath, destinations));
      const restoredFiles = this.targets
        .filter((target) => written.has(target.path))
        .map((target) => target.label);

      if (restoredFiles.length === 0) {
        throw new NothingToRestoreError(operationId);
      }

      this.registry.markCompleted(operationId, restoredFiles);
      console.log(
        `[Snapferry:RestoreEngine] Operation ${operationId} restored ${restoredFiles.join(', ')}` +
          (snapshots.length > 0 ? ` (previous files kept as ${snapshots.join(', ')})` : ''),
      );

      return { restoredFiles, snapshots };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.registry.markFailed(operationId, message);
      console.error(`[Snapferry:RestoreEngine] Operation ${operationId} failed: ${message}`);
      throw error;
    }
  }

  /**
   * Copy every existing target to `<path>.<YYYYMMDD_HHMMSS>.bak`. An
   * existing snapshot is never replaced; later ones in the same second
   * get a `-<n>` suffix.
   */
  async snapshotCurrentFiles(): Promise<string[]> {
    const timestamp = formatTimestamp(this.now());
    const snapshots: string[] = [];

    for (const target of this.targets) {
      const exists = await fs.promises.stat(target.path).then(() => true).catch(() => false);
      if (!exists) continue;

      snapshots.push(await copyExclusive(target.path, `${target.path}.${timestamp}`));
    }

    return snapshots;
  }
}

async function copyExclusive(sourcePath: string, base: string): Promise<string> {
  for (let attempt = 0; ; attempt++) {
    const snapshotPath = attempt === 0 ? `${base}.bak` : `${base}-${attempt}.bak`;
    try {
      await fs.promises.copyFile(sourcePath, snapshotPath, fs.constants.COPYFILE_EXCL);
      return snapshotPath;
    } catch (error) {
      if (!isAlreadyExists(error)) throw error;
    }
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}
