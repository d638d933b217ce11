/**
 * @fileoverview Command dispatch
 *
 * Resolves the command, runs it and maps every failure to exit code 2 with a
 * formatted error on stderr. Kept apart from the bin entry so it can be
 * driven in-process.
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { UI_AUDIT_VERSION } from '../version.js';
import { auditCommand } from './commands/audit.js';
import { rulesCommand } from './commands/rules.js';
import { EXIT_ERROR, EXIT_OK, classifyError, createError, formatError } from './errors.js';
import { getHelpText } from './help.js';
import type { CliIo } from './io.js';

const COMMANDS = ['audit', 'rules', 'help'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  const known: readonly string[] = COMMANDS;
  return known.includes(value);
}

export interface RunCliOptions {
  io: CliIo;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

export async function runCli(args: string[], options: RunCliOptions): Promise<number> {
  const { io } = options;

  // Global flags only; each command parses its own options strictly.
  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version === true) {
    io.stdout(`ui-audit ${UI_AUDIT_VERSION.string}\n`);
    return EXIT_OK;
  }

  const command = positionals[0];
  if (values.help === true || command === undefined || command === 'help') {
    const topic = command === 'help' ? positionals[1] : command;
    io.stdout(getHelpText(topic));
    return EXIT_OK;
  }

  const commandArgs = args.slice(args.indexOf(command) + 1);

  try {
    if (!isCommand(command)) {
      throw createError('UNKNOWN_COMMAND', `Unknown command: ${command}`, { available: [...COMMANDS] });
    }
    switch (command) {
      case 'audit':
        return await auditCommand({ args: commandArgs, io, signal: options.signal, env: options.env });
      case 'rules':
        return await rulesCommand({ args: commandArgs, io });
      case 'help':
        io.stdout(getHelpText());
        return EXIT_OK;
    }
  } catch (error: unknown) {
    io.stderr(`${formatError(classifyError(error))}\n`);
    return EXIT_ERROR;
  }
}
