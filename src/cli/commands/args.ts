/**
 * @fileoverview Shared argument parsing for commands
 */

import { parseArgs, type ParseArgsConfig } from 'node:util';
import { isPlatform, type Platform } from '../../types.js';
import { getErrorMessage } from '../../utils/errors.js';
import { createError } from '../errors.js';

export type OutputFormat = 'text' | 'json';

type OptionsConfig = NonNullable<ParseArgsConfig['options']>;

/**
 * Strict parse: unknown flags and missing values become INVALID_ARGUMENT.
 */
export function parseCommandArgs<O extends OptionsConfig>(
  args: string[],
  options: O,
): ReturnType<typeof parseArgs<{ args: string[]; options: O; allowPositionals: true; strict: true }>> {
  try {
    return parseArgs({ args, options, allowPositionals: true, strict: true });
  } catch (error: unknown) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

export function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'text') return 'text';
  if (value === 'json') return 'json';
  throw createError('INVALID_ARGUMENT', `--format must be text or json, got "${value}"`);
}

/**
 * `ios,ipados` -> ['ios', 'ipados']; an empty list means every platform.
 */
export function parsePlatforms(value: string): Platform[] {
  const platforms: Platform[] = [];
  for (const part of value.split(',')) {
    const name = part.trim().toLowerCase();
    if (name.length === 0) continue;
    if (!isPlatform(name)) {
      throw createError('INVALID_ARGUMENT', `unknown platform "${part.trim()}"`);
    }
    if (!platforms.includes(name)) platforms.push(name);
  }
  return platforms;
}
