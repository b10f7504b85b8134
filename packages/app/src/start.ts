#!/usr/bin/env node

/**
 * Daemon entry point
 */

import 'dotenv/config';
import { runDaemon } from './daemon.js';

runDaemon().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
