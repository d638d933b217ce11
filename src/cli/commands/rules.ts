/**
 * @fileoverview Rules Command
 *
 * Lists the rules of a corpus. Loading the corpus runs the full validation,
 * so the command doubles as a corpus lint.
 *
 * Usage:
 *   ui-audit rules [--corpus=<file>] [--format=text|json]
 *
 * @packageDocumentation
 */

import { loadRuleCorpus } from '../../rules/corpus.js';
import type { CompiledRule, RuleCorpus } from '../../types.js';
import { createError, EXIT_OK } from '../errors.js';
import type { CliIo } from '../io.js';
import { parseCommandArgs, parseFormat } from './args.js';

export interface RulesCommandOptions {
  args: string[];
  io: CliIo;
}

interface RuleSummary {
  id: string;
  title: string;
  kind: CompiledRule['kind'];
  severity: string;
  perspectives: string[];
  platforms: string[];
  languages: string[];
  accessibility: boolean;
}

function summarize(rule: CompiledRule): RuleSummary {
  const { definition } = rule;
  return {
    id: definition.id,
    title: definition.title,
    kind: rule.kind,
    severity: definition.severity,
    perspectives: [...definition.perspectives],
    platforms: [...definition.platforms],
    languages: [...definition.languages],
    accessibility: definition.accessibility,
  };
}

export function renderRulesText(corpus: RuleCorpus): string {
  const lines = [`Rule corpus ${corpus.source} (version ${corpus.version}, ${corpus.rules.length} rules)`, ''];
  const idWidth = Math.max(0, ...corpus.rules.map((rule) => rule.definition.id.length));

  for (const rule of corpus.rules) {
    const { definition } = rule;
    const platforms = definition.platforms.length > 0 ? definition.platforms.join(',') : 'all platforms';
    const tags = [definition.severity, definition.perspectives.join(','), platforms];
    if (definition.accessibility) tags.push('accessibility');
    lines.push(`  ${definition.id.padEnd(idWidth)}  ${tags.join('  ')}`);
    lines.push(`  ${' '.repeat(idWidth)}  ${definition.title}`);
  }

  return `${lines.join('\n')}\n`;
}

export async function rulesCommand(options: RulesCommandOptions): Promise<number> {
  const { values, positionals } = parseCommandArgs(options.args, {
    corpus: { type: 'string' },
    format: { type: 'string', default: 'text' },
  });

  if (positionals.length > 0) {
    throw createError('INVALID_ARGUMENT', `rules takes no positional arguments, got ${positionals.join(' ')}`);
  }
  const format = parseFormat(values.format);

  const corpus = await loadRuleCorpus(values.corpus);

  if (format === 'json') {
    const payload = { source: corpus.source, version: corpus.version, rules: corpus.rules.map(summarize) };
    options.io.stdout(`${JSON.stringify(payload, null, 2)}\n`);
  } else {
    options.io.stdout(renderRulesText(corpus));
  }

  return EXIT_OK;
}
