/**
 * @fileoverview Rule Corpus
 *
 * Loads the declarative rule file once per run, validates every record,
 * compiles each pattern and freezes the result. Any invalid record fails the
 * whole load: a partially loaded corpus would silently drop checks.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { EngineError, RuleCompileError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import type { CompiledRule, RuleCorpus } from '../types.js';
import { computeChecksum16 } from '../utils/checksums.js';
import { getErrorCode, getErrorMessage, toError } from '../utils/errors.js';
import { documentFormatForPath, parseStructuredText, type DocumentFormat } from '../utils/structured_text.js';
import { compileRule } from './compile.js';
import { CorpusDocumentSchema, RuleDefinitionSchema, formatIssues } from './schema.js';

export const DEFAULT_CORPUS_PATH = fileURLToPath(new URL('../../corpus/ui_rules.yaml', import.meta.url));

export interface CorpusSource {
  /** Where the corpus came from, for messages. */
  source: string;
  /** Content hash identifying this corpus revision. */
  version: string;
}

function ruleIdOf(raw: unknown): string | null {
  if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string') {
    return raw.id;
  }
  return null;
}

/**
 * Validate and compile an already-parsed corpus document.
 */
export function compileRuleCorpus(document: unknown, { source, version }: CorpusSource): RuleCorpus {
  const parsed = CorpusDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new RuleCompileError(null, `${source}: ${formatIssues(parsed.error).join('; ')}`);
  }

  const rules: CompiledRule[] = [];
  const byId = new Map<string, CompiledRule>();

  parsed.data.rules.forEach((raw, index) => {
    const result = RuleDefinitionSchema.safeParse(raw);
    if (!result.success) {
      const id = ruleIdOf(raw) ?? `#${index + 1}`;
      throw new RuleCompileError(id, formatIssues(result.error).join('; '));
    }
    const definition = result.data;
    if (byId.has(definition.id)) {
      throw new RuleCompileError(definition.id, 'duplicate rule id');
    }
    const compiled = compileRule(definition);
    rules.push(compiled);
    byId.set(definition.id, compiled);
  });

  return Object.freeze({
    version,
    source,
    rules: Object.freeze(rules),
    get: (ruleId: string) => byId.get(ruleId),
  });
}

export function parseRuleCorpus(text: string, source: string, format: DocumentFormat = documentFormatForPath(source)): RuleCorpus {
  const document = parseStructuredText(text, format);
  if (!document.ok) {
    throw new RuleCompileError(null, `cannot parse ${source}: ${document.error.message}`);
  }
  return compileRuleCorpus(document.value, { source, version: computeChecksum16(text) });
}

/**
 * Read and compile a corpus file (the bundled corpus by default).
 *
 * @throws EngineError when the file cannot be read
 * @throws RuleCompileError when any record is invalid
 */
export async function loadRuleCorpus(filePath: string = DEFAULT_CORPUS_PATH): Promise<RuleCorpus> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    const detail = getErrorCode(error) === 'ENOENT' ? 'file not found' : getErrorMessage(error);
    throw new EngineError('corpus_missing', `Cannot load rule corpus ${filePath}: ${detail}`, toError(error));
  }

  const corpus = parseRuleCorpus(text, filePath);
  logDebug('[ui-audit] loaded rule corpus', { source: filePath, rules: corpus.rules.length, version: corpus.version });
  return corpus;
}
