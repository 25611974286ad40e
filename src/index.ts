#!/usr/bin/env node
/**
 * Main entry point for the fits-archiver daemon.
 */

import { createProgram } from './cli.js';
import { runDaemon } from './daemon.js';
import { errorMessage } from './errors.js';

async function main(): Promise<void> {
  const program = createProgram();

  // Usage errors exit through Commander before the loop is built
  await program.parseAsync(process.argv);

  const config = program.watchConfig;
  if (!config) {
    program.help({ error: true });
    return;
  }

  process.exitCode = await runDaemon(config);
}

main().catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
