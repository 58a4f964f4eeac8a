#!/usr/bin/env node
/**
 * Snapferry Server CLI
 */

import { main } from './daemon.js';

main().catch((error: unknown) => {
  console.error('[Snapferry:Daemon] Fatal error:', error);
  process.exit(1);
});
