/**
 * Transfer Daemon Process
 *
 * Runs the transfer endpoints as a standalone HTTP server.
 */

import { createServer } from 'node:http';
import express from 'express';
import type { ServerConfig } from '../config.js';
import { loadServerConfig } from '../config.js';
import { transferHandler } from '../server/express/index.js';
import type { TransferService } from '../transfer-service.js';

/**
 * Daemon configuration
 */
export interface DaemonConfig {
  port?: number;
  host?: string;
  server?: ServerConfig;
}

/**
 * Running daemon instance
 */
export interface DaemonInstance {
  shutdown: () => Promise<void>;
  service: TransferService;
  url: string;
}

export const DEFAULT_PORT = 5000;
export const DEFAULT_HOST = '0.0.0.0';

/**
 * Start the transfer daemon. Port 0 picks a free port; `url` reports the
 * one actually bound.
 */
export async function startTransferDaemon(config: DaemonConfig = {}): Promise<DaemonInstance> {
  const port = config.port ?? DEFAULT_PORT;
  const host = config.host ?? DEFAULT_HOST;

  const app = express();
  const { router, service } = transferHandler({ config: config.server ?? {} });
  await service.initialize();
  app.use(router);

  const server = createServer(app);

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const boundPort = typeof address === 'object' && address ? address.port : port;
  const baseUrl = `http://${host}:${boundPort}`;
  console.log(`[Snapferry:Daemon] Listening on ${baseUrl}`);

  return {
    shutdown: async () => {
      await service.shutdown();
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      console.log('[Snapferry:Daemon] Stopped');
    },
    service,
    url: baseUrl,
  };
}

interface ParsedArgs {
  port: number;
  host: string;
  configPath?: string;
}

export function parseArgs(args: string[]): ParsedArgs | undefined {
  const parsed: ParsedArgs = { port: DEFAULT_PORT, host: DEFAULT_HOST };

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    switch (args[i]) {
      case '--port':
        if (value === undefined) return undefined;
        parsed.port = parseInt(value, 10);
        if (!Number.isInteger(parsed.port) || parsed.port < 0 || parsed.port > 65535) return undefined;
        i++;
        break;
      case '--host':
        if (value === undefined) return undefined;
        parsed.host = value;
        i++;
        break;
      case '--config':
        if (value === undefined) return undefined;
        parsed.configPath = value;
        i++;
        break;
      default:
        return undefined;
    }
  }

  return parsed;
}

/**
 * CLI entry point
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const parsed = parseArgs(argv);
  if (!parsed) {
    console.error('Usage: snapferry-server [--port 5000] [--host 0.0.0.0] [--config <config.json>]');
    process.exit(1);
  }

  const serverConfig = parsed.configPath ? await loadServerConfig(parsed.configPath) : {};

  const daemon = await startTransferDaemon({
    port: parsed.port,
    host: parsed.host,
    server: serverConfig,
  });

  const stop = (signal: string) => {
    console.log(`\n[Snapferry:Daemon] ${signal} received, shutting down...`);
    daemon.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[Snapferry:Daemon] Shutdown failed:', error);
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));

  console.log(`[Snapferry:Daemon] Ready. API available at ${daemon.url}`);
}
