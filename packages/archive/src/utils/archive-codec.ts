/**
 * ZIP archive codec: builds a container from named files and reads
 * selected entries back out.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { pipeline } from 'node:stream/promises';
import archiver from 'archiver';
import * as yauzl from 'yauzl-promise';
import { CorruptArchiveError, IoFailureError, SourceMissingError } from '@snapferry/core';
import type { ArchiveSource } from '@snapferry/core';
import { type BuildArchiveOptions, DEFAULT_COMPRESSION_LEVEL } from '../types.js';

type ZipArchive = Awaited<ReturnType<typeof yauzl.open>>;

async function pathExists(filePath: string): Promise<boolean> {
  return fs.promises.stat(filePath).then(() => true).catch(() => false);
}

/**
 * Write every source into a new ZIP at `archivePath`, each under its own
 * entry name. All sources are checked before the archive is opened.
 */
export async function buildArchive(
  sources: ArchiveSource[],
  archivePath: string,
  options: BuildArchiveOptions = {},
): Promise<void> {
  for (const source of sources) {
    if (!(await pathExists(source.path))) {
      throw new SourceMissingError(source.path);
    }
  }

  await fs.promises.mkdir(path.dirname(archivePath), { recursive: true });

  const output = fs.createWriteStream(archivePath);
  const archive = archiver('zip', { zlib: { level: options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL } });

  const written = new Promise<void>((resolve, reject) => {
    output.on('finish', resolve);
    output.on('error', reject);
    archive.on('error', reject);
    archive.on('warning', reject);
  });

  archive.pipe(output);
  for (const source of sources) {
    archive.file(source.path, { name: source.name });
  }

  try {
    await archive.finalize();
    await written;
  } catch (error) {
    output.destroy();
    await fs.promises.rm(archivePath, { force: true });
    throw new IoFailureError(
      `Failed to build archive: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

async function openArchive(archivePath: string): Promise<ZipArchive> {
  try {
    return await yauzl.open(archivePath);
  } catch (error) {
    throw new CorruptArchiveError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * List the entry names of a ZIP archive.
 */
export async function listArchiveEntries(archivePath: string): Promise<Set<string>> {
  const zip = await openArchive(archivePath);
  const names = new Set<string>();

  try {
    for await (const entry of zip) {
      names.add(entry.filename);
    }
  } catch (error) {
    throw new CorruptArchiveError(error instanceof Error ? error.message : String(error));
  } finally {
    await zip.close();
  }

  return names;
}

/**
 * Extract only the entries named in `destinations` (entry name -> target
 * path), overwriting targets in place. Unrecognized entries are skipped.
 *
 * @returns target paths actually written, in `destinations` order
 */
export async function extractArchiveEntries(
  archivePath: string,
  destinations: ReadonlyMap<string, string>,
): Promise<string[]> {
  const zip = await openArchive(archivePath);
  const extracted = new Set<string>();

  try {
    for await (const entry of zip) {
      const target = destinations.get(entry.filename);
      if (!target || entry.filename.endsWith('/')) {
        continue;
      }

      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      const readStream = await entry.openReadStream();
      await pipeline(readStream, fs.createWriteStream(target));
      extracted.add(entry.filename);
    }
  } finally {
    await zip.close();
  }

  return Array.from(destinations)
    .filter(([name]) => extracted.has(name))
    .map(([, target]) => target);
}
