/**
 * @fileoverview YAML / JSON document parsing
 *
 * Corpus and configuration files may be YAML or JSON; JSON may carry
 * comments. Parsing never throws; callers turn the error into their own
 * typed failure.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import YAML from 'yaml';
import stripJsonComments from 'strip-json-comments';
import { safeSync, type Result } from '../core/result.js';

export type DocumentFormat = 'json' | 'yaml';

export function documentFormatForPath(filePath: string): DocumentFormat {
  return path.extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml';
}

export function parseStructuredText(text: string, format: DocumentFormat): Result<unknown, Error> {
  if (format === 'json') {
    return safeSync((): unknown => JSON.parse(stripJsonComments(text)));
  }
  return safeSync((): unknown => YAML.parse(text));
}
