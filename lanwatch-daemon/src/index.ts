#!/usr/bin/env node
import { runCli } from './cli.js';

try {
  process.exitCode = await runCli(process.argv.slice(2));
} catch (err) {
  console.error('[lanwatch] Fatal error:', err);
  process.exitCode = 1;
}
