/**
 * @fileoverview CLI error handling with helpful suggestions
 *
 * Every fatal failure leaves the CLI with exit code 2; exit code 1 is
 * reserved for "findings at or above the threshold".
 */

import { ConfigError, EngineError, RuleCompileError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export const EXIT_OK = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_ERROR = 2;

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'UNKNOWN_COMMAND'
  | 'CORPUS_INVALID'
  | 'CORPUS_MISSING'
  | 'CONFIG_INVALID'
  | 'ROOT_UNREADABLE'
  | 'INTERNAL';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `ui-audit help <command>` for usage information.',
  UNKNOWN_COMMAND: 'Run `ui-audit help` to list the available commands.',
  CORPUS_INVALID: 'Fix the rule named above; `ui-audit rules --corpus=<file>` validates a corpus without auditing.',
  CORPUS_MISSING: 'Check the --corpus path, or drop it to use the bundled corpus.',
  CONFIG_INVALID: 'Fix the configuration file or pass a different one with --config.',
  ROOT_UNREADABLE: 'Check that the path exists and is readable.',
  INTERNAL: 'This is a bug in ui-audit; rerun with --verbose and report the output.',
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * Map any thrown value to a CliError with a code and a suggestion.
 */
export function classifyError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof RuleCompileError) {
    return createError('CORPUS_INVALID', error.message, { ruleId: error.ruleId });
  }
  if (error instanceof ConfigError) {
    return createError('CONFIG_INVALID', error.message, { configPath: error.configPath });
  }
  if (error instanceof EngineError) {
    switch (error.reason) {
      case 'corpus_missing':
        return createError('CORPUS_MISSING', error.message);
      case 'root_unreadable':
        return createError('ROOT_UNREADABLE', error.message);
      case 'invariant':
        return createError('INTERNAL', error.message);
    }
  }
  return createError('INTERNAL', getErrorMessage(error));
}

export function formatError(error: CliError): string {
  const suggestion = error.suggestion ? `\n\nSuggestion: ${error.suggestion}` : '';
  return `Error [${error.code}]: ${error.message}${suggestion}`;
}
