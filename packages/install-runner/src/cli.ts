#!/usr/bin/env node

/**
 * CLI for the install runner
 *
 * Usage: install-runner [options]
 */

import { runCli } from './run.js';
import { errorMessage } from './shared/errors.js';

async function main(): Promise<void> {
  const exitCode = await runCli(process.argv.slice(2), process.env, process.cwd());
  process.exit(exitCode);
}

main().catch((error: unknown) => {
  console.error(`[ERROR] ${errorMessage(error)}`);
  process.exit(1);
});
