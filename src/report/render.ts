/**
 * @fileoverview Report renderers
 *
 * JSON output is the stable machine contract: snake_case keys, no timestamps,
 * so two runs over the same tree and corpus print identical bytes. The text
 * renderer is for terminals and may change freely.
 *
 * @packageDocumentation
 */

import { PERSPECTIVES } from '../types.js';
import type { Finding, Perspective, Report, Severity } from '../types.js';

export interface RenderOptions {
  includeSuppressed?: boolean;
}

export const FAIL_ON_LEVELS = ['critical', 'important', 'minor'] as const;
export type FailOn = (typeof FAIL_ON_LEVELS)[number];

export function isFailOn(value: string): value is FailOn {
  const known: readonly string[] = FAIL_ON_LEVELS;
  return known.includes(value);
}

// ============================================================================
// JSON
// ============================================================================

interface JsonFinding {
  rule_id: string;
  file: string;
  line_start: number;
  line_end: number;
  severity: Severity;
  message: string;
}

interface JsonSuppressedFinding extends JsonFinding {
  justification: string;
}

function toJsonFinding(finding: Finding): JsonFinding {
  return {
    rule_id: finding.ruleId,
    file: finding.file,
    line_start: finding.lineStart,
    line_end: finding.lineEnd,
    severity: finding.severity,
    message: finding.message,
  };
}

export function toJsonReport(report: Report, options: RenderOptions = {}): Record<string, unknown> {
  const perspectives: Record<Perspective, JsonFinding[]> = {
    clarity: report.perspectives.clarity.issues.map((entry) => toJsonFinding(entry.finding)),
    consistency: report.perspectives.consistency.issues.map((entry) => toJsonFinding(entry.finding)),
    deference: report.perspectives.deference.issues.map((entry) => toJsonFinding(entry.finding)),
  };

  const payload: Record<string, unknown> = {
    summary: {
      critical: report.summary.critical,
      important: report.summary.important,
      context_dependent: report.summary.contextDependent,
      minor: report.summary.minor,
      total: report.summary.total,
      suppressed: report.summary.suppressed,
    },
    perspectives,
    truncated: report.truncated,
    profile: { category: report.profile.category, platforms: [...report.profile.platforms] },
    corpus_version: report.corpusVersion,
    files_scanned: report.filesScanned,
    files_skipped: report.filesSkipped,
    overrides: report.overrides.map((override) => ({
      rule_id: override.ruleId,
      file: override.file,
      line: override.line,
      from: override.from,
      to: override.to,
      justification: override.justification,
    })),
  };

  if (options.includeSuppressed) {
    payload.suppressed = report.suppressed.map((finding): JsonSuppressedFinding => ({
      ...toJsonFinding(finding),
      justification: finding.suppression?.justification ?? '',
    }));
  }

  return payload;
}

export function renderJson(report: Report, options: RenderOptions = {}): string {
  return `${JSON.stringify(toJsonReport(report, options), null, 2)}\n`;
}

// ============================================================================
// TEXT
// ============================================================================

const PERSPECTIVE_TITLES: Record<Perspective, string> = {
  clarity: 'Clarity',
  consistency: 'Consistency',
  deference: 'Deference',
};

export function formatLocation(finding: Pick<Finding, 'file' | 'lineStart' | 'lineEnd'>): string {
  const lines = finding.lineEnd > finding.lineStart ? `${finding.lineStart}-${finding.lineEnd}` : `${finding.lineStart}`;
  return `${finding.file}:${lines}`;
}

export function renderText(report: Report, options: RenderOptions = {}): string {
  const { summary, profile } = report;
  const lines: string[] = [
    'UI audit report',
    `Profile: ${profile.category} (platforms: ${profile.platforms.length > 0 ? profile.platforms.join(', ') : 'all'})`,
    `Files: ${report.filesScanned} scanned, ${report.filesSkipped} skipped`,
    `Summary: ${summary.critical} critical, ${summary.important} important, `
      + `${summary.contextDependent} context-dependent, ${summary.minor} minor `
      + `(${summary.total} total, ${summary.suppressed} suppressed)`,
  ];

  for (const perspective of PERSPECTIVES) {
    const section = report.perspectives[perspective];
    const status = section.status === 'issues_found' ? 'issues found' : 'no issues';
    lines.push('', `${PERSPECTIVE_TITLES[perspective]} (weight ${section.weight.toFixed(2)}): ${status}`);
    for (const { finding } of section.issues) {
      lines.push(`  ${finding.severity}  ${formatLocation(finding)}  ${finding.ruleId}`);
      lines.push(`    ${finding.message}`);
      if (finding.fixHint) lines.push(`    Fix: ${finding.fixHint}`);
    }
  }

  if (report.overrides.length > 0) {
    lines.push('', 'Severity overrides:');
    for (const override of report.overrides) {
      const note = override.justification ? `: ${override.justification}` : '';
      lines.push(`  ${override.file}:${override.line}  ${override.ruleId} ${override.from} -> ${override.to}${note}`);
    }
  }

  if (options.includeSuppressed && report.suppressed.length > 0) {
    lines.push('', 'Suppressed:');
    for (const finding of report.suppressed) {
      const note = finding.suppression?.justification ? `: ${finding.suppression.justification}` : '';
      lines.push(`  ${formatLocation(finding)}  ${finding.ruleId}${note}`);
    }
  }

  if (report.truncated) {
    lines.push('', 'Run cancelled before every file was audited; results are partial.');
  }

  return `${lines.join('\n')}\n`;
}

// ============================================================================
// THRESHOLD
// ============================================================================

/**
 * `minor` fails on any visible finding, context-dependent ones included.
 */
export function exceedsThreshold(report: Report, failOn: FailOn): boolean {
  const { summary } = report;
  switch (failOn) {
    case 'critical':
      return summary.critical > 0;
    case 'important':
      return summary.critical + summary.important > 0;
    case 'minor':
      return summary.total > 0;
  }
}
