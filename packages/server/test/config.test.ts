import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  resolveServerConfig,
  loadServerConfig,
  DEFAULT_TRANSFER,
  DEFAULT_RETENTION,
} from '../src/config.js';
import { parseArgs } from '../src/bin/daemon.js';

describe('resolveServerConfig', () => {
  it('should fill in defaults', () => {
    const config = resolveServerConfig({ dataDir: '/srv/app' });

    expect(config.dataDir).toBe(path.resolve('/srv/app'));
    expect(config.managedFiles).toEqual([
      {
        relativePath: 'database/app_data.db',
        absolutePath: path.resolve('/srv/app', 'database/app_data.db'),
        entryName: 'app_data.db',
      },
      {
        relativePath: 'database/app_static.db',
        absolutePath: path.resolve('/srv/app', 'database/app_static.db'),
        entryName: 'app_static.db',
      },
    ]);
    expect(config.uploadsDir).toBe(path.join(os.tmpdir(), 'snapferry', 'uploads'));
    expect(config.backupsDir).toBe(path.join(os.tmpdir(), 'snapferry', 'backups'));
    expect(config.archivePrefix).toBe('db_backup');
    expect(config.transfer).toEqual({ ...DEFAULT_TRANSFER });
    expect(config.retention).toEqual({ ...DEFAULT_RETENTION });
    expect(config.cleanupOnInitialize).toBe(true);
  });

  it('should merge partial nested settings', () => {
    const config = resolveServerConfig({
      transfer: { checksumAlgorithm: 'sha256' },
      retention: { uploadIdleTimeoutMs: 1000 },
    });

    expect(config.transfer.checksumAlgorithm).toBe('sha256');
    expect(config.transfer.defaultChunkSize).toBe(1024 * 1024);
    expect(config.retention.uploadIdleTimeoutMs).toBe(1000);
    expect(config.retention.backupRetentionMs).toBe(10 * 60 * 1000);
  });

  it('should reject managed files that share a base name', () => {
    expect(() => resolveServerConfig({ managedFiles: ['a/data.db', 'b/data.db'] })).toThrow(/data\.db/);
  });

  it('should reject a default chunk size above the maximum', () => {
    expect(() =>
      resolveServerConfig({ transfer: { defaultChunkSize: 2048, maxChunkSize: 1024 } }),
    ).toThrow('transfer.defaultChunkSize must not exceed transfer.maxChunkSize');
  });
});

describe('loadServerConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'snapferry-test-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should resolve relative directories against the file', async () => {
    const configPath = path.join(tempDir, 'snapferry.json');
    await fs.promises.writeFile(
      configPath,
      JSON.stringify({ dataDir: './data', backupsDir: '/var/tmp/backups', retention: { operationRetentionMs: 5000 } }),
    );

    const config = await loadServerConfig(configPath);

    expect(config).toEqual({
      dataDir: path.join(tempDir, 'data'),
      backupsDir: path.resolve('/var/tmp/backups'),
      retention: { operationRetentionMs: 5000 },
    });
  });

  it('should reject unknown keys and bad values', async () => {
    const configPath = path.join(tempDir, 'bad.json');
    await fs.promises.writeFile(configPath, JSON.stringify({ transfer: { maxChunkSize: -1 }, extra: true }));

    await expect(loadServerConfig(configPath)).rejects.toThrow(/^Invalid config .*bad\.json: /);
  });
});

describe('parseArgs', () => {
  it('should default to port 5000 on all interfaces', () => {
    expect(parseArgs([])).toEqual({ port: 5000, host: '0.0.0.0' });
  });

  it('should read every flag', () => {
    expect(parseArgs(['--port', '8080', '--host', '127.0.0.1', '--config', 'server.json'])).toEqual({
      port: 8080,
      host: '127.0.0.1',
      configPath: 'server.json',
    });
  });

  it('should reject unknown flags and bad ports', () => {
    expect(parseArgs(['--verbose'])).toBeUndefined();
    expect(parseArgs(['--port', 'abc'])).toBeUndefined();
    expect(parseArgs(['--port'])).toBeUndefined();
  });
});
