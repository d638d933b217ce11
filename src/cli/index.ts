#!/usr/bin/env node
/**
 * @fileoverview ui-audit CLI
 *
 * Commands:
 *   ui-audit audit <path>   - Audit UI source code against the rule corpus
 *   ui-audit rules          - List and validate the rule corpus
 *   ui-audit help [command] - Show help
 *
 * The first SIGINT cancels the audit; files already finished are still
 * reported, flagged as truncated. A second SIGINT exits immediately.
 *
 * @packageDocumentation
 */

import { EXIT_ERROR, classifyError, formatError } from './errors.js';
import { processIo } from './io.js';
import { runCli } from './run.js';

async function main(): Promise<void> {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    controller.abort();
  });

  process.exitCode = await runCli(process.argv.slice(2), {
    io: processIo,
    signal: controller.signal,
    env: process.env,
  });
}

main().catch((error: unknown) => {
  processIo.stderr(`${formatError(classifyError(error))}\n`);
  process.exitCode = EXIT_ERROR;
});
