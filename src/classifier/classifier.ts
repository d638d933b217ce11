/**
 * @fileoverview Classifier
 *
 * Resolves each raw finding against its rule and the suppression directives
 * of its file. A finding's severity only ever differs from its rule's declared
 * severity through an explicit `as=` directive, and every such override is
 * logged and returned.
 *
 * @packageDocumentation
 */

import { EngineError } from '../core/errors.js';
import { logInfo } from '../telemetry/logger.js';
import type {
  Finding,
  RawFinding,
  RuleCorpus,
  RunWarning,
  SeverityOverride,
  SuppressionDirective,
} from '../types.js';
import { compareStrings } from '../utils/sort.js';

export type DirectivesByFile = ReadonlyMap<string, readonly SuppressionDirective[]>;

export interface Classification {
  findings: Finding[];
  overrides: SeverityOverride[];
  warnings: RunWarning[];
}

export function findingKey(finding: Pick<RawFinding, 'ruleId' | 'file' | 'lineStart' | 'lineEnd'>): string {
  return `${finding.ruleId}|${finding.file}|${finding.lineStart}|${finding.lineEnd}`;
}

/**
 * Drop findings that repeat (rule, file, line span); the first one kept
 * absorbs the occurrence count of the rest.
 */
export function dedupeFindings(raw: readonly RawFinding[]): RawFinding[] {
  const byKey = new Map<string, RawFinding>();
  for (const finding of raw) {
    const key = findingKey(finding);
    const existing = byKey.get(key);
    if (existing) {
      existing.occurrences += finding.occurrences;
      continue;
    }
    byKey.set(key, { ...finding });
  }
  return [...byKey.values()];
}

export function directiveApplies(directive: SuppressionDirective, finding: RawFinding): boolean {
  if (directive.invalidOverride !== undefined) return false;
  if (directive.targetLine < finding.lineStart || directive.targetLine > finding.lineEnd) return false;
  return directive.ruleIds.length === 0 || directive.ruleIds.includes(finding.ruleId);
}

export function compareFindings(a: RawFinding, b: RawFinding): number {
  return compareStrings(a.file, b.file)
    || a.lineStart - b.lineStart
    || a.column - b.column
    || compareStrings(a.ruleId, b.ruleId)
    || a.lineEnd - b.lineEnd;
}

export function classify(raw: readonly RawFinding[], directivesByFile: DirectivesByFile, corpus: RuleCorpus): Classification {
  const findings: Finding[] = [];
  const overrides: SeverityOverride[] = [];
  const used = new Set<SuppressionDirective>();
  const superseded = new Map<SuppressionDirective, SuppressionDirective>();

  for (const finding of dedupeFindings(raw).sort(compareFindings)) {
    const rule = corpus.get(finding.ruleId);
    if (!rule) {
      throw new EngineError('invariant', `Finding at ${finding.file}:${finding.lineStart} references unknown rule ${finding.ruleId}`);
    }
    const declared = rule.definition.severity;
    const base: Finding = {
      ...finding,
      severity: declared,
      declaredSeverity: declared,
      perspectives: [...rule.definition.perspectives],
      accessibility: rule.definition.accessibility,
      fixHint: rule.definition.fix_hint,
      suppressed: false,
    };

    const applicable = (directivesByFile.get(finding.file) ?? []).filter((d) => directiveApplies(d, finding));
    const suppressing = applicable.find((d) => d.override === undefined);
    const overriding = applicable.find((d) => d.override !== undefined);

    if (suppressing) {
      used.add(suppressing);
      if (overriding) superseded.set(overriding, suppressing);
      findings.push({
        ...base,
        suppressed: true,
        suppression: { line: suppressing.line, justification: suppressing.justification },
      });
      continue;
    }

    if (overriding?.override) {
      used.add(overriding);
      const override: SeverityOverride = {
        ruleId: finding.ruleId,
        file: finding.file,
        line: overriding.line,
        from: declared,
        to: overriding.override,
        justification: overriding.justification,
      };
      overrides.push(override);
      logInfo('[ui-audit] severity override', { ...override });
      findings.push({
        ...base,
        severity: overriding.override,
        suppression: { line: overriding.line, override: overriding.override, justification: overriding.justification },
      });
      continue;
    }

    findings.push(base);
  }

  return { findings, overrides, warnings: directiveWarnings(directivesByFile, used, superseded, corpus) };
}

function directiveWarnings(
  directivesByFile: DirectivesByFile,
  used: ReadonlySet<SuppressionDirective>,
  superseded: ReadonlyMap<SuppressionDirective, SuppressionDirective>,
  corpus: RuleCorpus,
): RunWarning[] {
  const warnings: RunWarning[] = [];

  for (const directives of directivesByFile.values()) {
    for (const directive of directives) {
      const where = `${directive.file}:${directive.line}`;
      if (directive.invalidOverride !== undefined) {
        warnings.push({
          kind: 'suppression',
          file: directive.file,
          line: directive.line,
          message: `Suppression at ${where} has unknown severity "${directive.invalidOverride}"; directive ignored`,
        });
        continue;
      }
      if (used.has(directive)) continue;

      const winner = superseded.get(directive);
      if (winner) {
        warnings.push({
          kind: 'suppression',
          file: directive.file,
          line: directive.line,
          message: `Severity override at ${where} is superseded by the suppression at ${winner.file}:${winner.line}`,
        });
        continue;
      }

      const unknown = directive.ruleIds.filter((id) => !corpus.get(id));
      const scope = directive.ruleIds.length > 0 ? ` for ${directive.ruleIds.join(', ')}` : '';
      const detail = unknown.length > 0 ? ` (unknown rule ${unknown.join(', ')})` : '';
      warnings.push({
        kind: 'suppression',
        file: directive.file,
        line: directive.line,
        message: `Unused suppression at ${where}${scope}${detail}`,
      });
    }
  }

  return warnings.sort((a, b) => compareStrings(a.file, b.file) || (a.line ?? 0) - (b.line ?? 0));
}
