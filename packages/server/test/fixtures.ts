import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { createHash } from 'node:crypto';
import { buildArchive } from '@snapferry/archive';
import type { ServerConfig } from '../src/config.js';

export interface Workspace {
  root: string;
  dataDir: string;
  aPath: string;
  bPath: string;
  config: ServerConfig;
  cleanup: () => Promise<void>;
}

export const MANAGED_FILES = ['database/a.db', 'database/b.db'];

/**
 * Temp data directory holding a.db (100 bytes) and b.db (50 bytes), with
 * uploads and backups roots beside it.
 */
export async function createWorkspace(overrides: ServerConfig = {}): Promise<Workspace> {
  const root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'snapferry-test-'));
  const dataDir = path.join(root, 'data');
  const aPath = path.join(dataDir, 'database', 'a.db');
  const bPath = path.join(dataDir, 'database', 'b.db');

  await fs.promises.mkdir(path.dirname(aPath), { recursive: true });
  await fs.promises.writeFile(aPath, Buffer.alloc(100, 'a'));
  await fs.promises.writeFile(bPath, Buffer.alloc(50, 'b'));

  return {
    root,
    dataDir,
    aPath,
    bPath,
    config: {
      dataDir,
      managedFiles: MANAGED_FILES,
      uploadsDir: path.join(root, 'uploads'),
      backupsDir: path.join(root, 'backups'),
      ...overrides,
    },
    cleanup: () => fs.promises.rm(root, { recursive: true, force: true }),
  };
}

/**
 * Build a restore archive from `entries` (entry name to content).
 */
export async function createRestoreArchive(
  root: string,
  entries: Record<string, string>,
  name = 'restore.zip',
): Promise<string> {
  const sourceDir = await fs.promises.mkdtemp(path.join(root, 'source-'));
  const sources = [];
  for (const [entryName, content] of Object.entries(entries)) {
    const sourcePath = path.join(sourceDir, entryName);
    await fs.promises.writeFile(sourcePath, content);
    sources.push({ name: entryName, path: sourcePath });
  }

  const archivePath = path.join(root, name);
  await buildArchive(sources, archivePath);
  return archivePath;
}

export function md5(data: Buffer): string {
  return createHash('md5').update(data).digest('hex');
}

export function splitBuffer(data: Buffer, parts: number): Buffer[] {
  const size = Math.ceil(data.length / parts);
  return Array.from({ length: parts }, (_, i) => data.subarray(i * size, (i + 1) * size));
}
