/**
 * @fileoverview Core types shared across the audit pipeline.
 *
 * The pipeline runs: corpus + indexer -> matcher -> classifier -> weighter ->
 * aggregator. Each stage consumes the previous stage's output types and never
 * mutates them.
 *
 * @packageDocumentation
 */

// ============================================================================
// VOCABULARY
// ============================================================================

export const SEVERITIES = ['critical', 'important', 'context-dependent', 'minor'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const PERSPECTIVES = ['clarity', 'consistency', 'deference'] as const;
export type Perspective = (typeof PERSPECTIVES)[number];

export const PLATFORMS = ['ios', 'ipados', 'macos', 'watchos', 'tvos', 'visionos', 'android', 'web'] as const;
export type Platform = (typeof PLATFORMS)[number];

export const LANGUAGES = ['swift', 'kotlin', 'java', 'dart', 'javascript', 'objc'] as const;
export type Language = (typeof LANGUAGES)[number];

/** Higher rank = more severe. */
export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 4,
  important: 3,
  'context-dependent': 2,
  minor: 1,
};

export function isSeverity(value: string): value is Severity {
  const known: readonly string[] = SEVERITIES;
  return known.includes(value);
}

export function isPlatform(value: string): value is Platform {
  const known: readonly string[] = PLATFORMS;
  return known.includes(value);
}

// ============================================================================
// SOURCE UNITS
// ============================================================================

export type TokenKind = 'identifier' | 'number' | 'string' | 'punct';

export interface Token {
  kind: TokenKind;
  text: string;
  line: number;
  column: number;
  endLine: number;
  endColumn: number;
}

export interface SourceComment {
  text: string;
  line: number;
  endLine: number;
  /** True when code precedes the comment on its first line. */
  trailing: boolean;
}

export type ScopeKind = 'declaration' | 'call' | 'block';

export interface Scope {
  id: number;
  name: string;
  kind: ScopeKind;
  parent: number | null;
  startLine: number;
  endLine: number;
}

export interface SourceUnit {
  /** POSIX path relative to the scanned root. */
  path: string;
  language: Language;
  contentHash: string;
  lineCount: number;
  tokens: Token[];
  comments: SourceComment[];
  scopes: Scope[];
  /** Innermost scope id per token, -1 at file level. */
  tokenScope: number[];
  /** Index of the innermost unclosed `(` around each token, -1 if none. */
  innermostParen: number[];
  /** Index of the matching bracket for `(`, `)`, `[`, `]`, `{`, `}`; -1 otherwise. */
  matching: number[];
}

// ============================================================================
// RULES
// ============================================================================

export type ArgumentKind = 'number' | 'string' | 'null' | 'boolean' | 'identifier';

export interface ShapeArgument {
  label?: string;
  position?: number;
  unlabeled?: boolean;
  kind: ArgumentKind;
  units?: string[];
  below?: number;
  above?: number;
}

export interface ScopeConstraint {
  inside?: string[];
  not_inside?: string[];
}

export interface SequencePattern extends ScopeConstraint {
  sequence: string;
  max_gap?: number;
}

export interface RegexPattern extends ScopeConstraint {
  regex: string;
  flags?: string;
}

export interface ShapePattern extends ScopeConstraint {
  shape: {
    call: string[];
    receiver?: string[];
    argument?: ShapeArgument;
    not_within_calls?: string[];
    chain_lacks?: string[];
  };
}

export type RulePattern = SequencePattern | RegexPattern | ShapePattern;

/** A rule record as written in the corpus file. */
export interface RuleDefinition {
  id: string;
  title: string;
  pattern: RulePattern;
  severity: Severity;
  perspectives: Perspective[];
  platforms: Platform[];
  languages: Language[];
  accessibility: boolean;
  message: string;
  fix_hint: string;
}

/** One located occurrence of a pattern inside a unit. */
export interface PatternMatch {
  lineStart: number;
  lineEnd: number;
  column: number;
  text: string;
  captures: Record<string, string>;
}

export type PatternKind = 'sequence' | 'regex' | 'shape';

/** A compiled pattern, independent of the rule that owns it. */
export interface PatternMatcher {
  readonly kind: PatternKind;
  /** Placeholder names a message template may reference. */
  readonly placeholders: ReadonlySet<string>;
  find(unit: SourceUnit): PatternMatch[];
}

export interface CompiledRule {
  readonly definition: RuleDefinition;
  readonly kind: PatternKind;
  readonly languages: ReadonlySet<Language>;
  readonly platforms: ReadonlySet<Platform>;
  find(unit: SourceUnit): PatternMatch[];
  render(captures: Record<string, string>): string;
}

export interface RuleCorpus {
  /** Stable content hash of the corpus document. */
  readonly version: string;
  readonly source: string;
  readonly rules: readonly CompiledRule[];
  get(ruleId: string): CompiledRule | undefined;
}

// ============================================================================
// FINDINGS
// ============================================================================

export interface RawFinding {
  ruleId: string;
  file: string;
  lineStart: number;
  lineEnd: number;
  column: number;
  text: string;
  message: string;
  /** Number of same-rule matches merged into this finding. */
  occurrences: number;
}

export interface SuppressionDirective {
  file: string;
  /** Line of the comment carrying the directive. */
  line: number;
  /** Line the directive applies to. */
  targetLine: number;
  ruleIds: string[];
  override?: Severity;
  /** Raw `as=` value when it names no known severity. */
  invalidOverride?: string;
  justification: string;
}

export interface AppliedSuppression {
  line: number;
  override?: Severity;
  justification: string;
}

export interface Finding extends RawFinding {
  severity: Severity;
  declaredSeverity: Severity;
  perspectives: Perspective[];
  accessibility: boolean;
  fixHint: string;
  suppressed: boolean;
  suppression?: AppliedSuppression;
}

export interface SeverityOverride {
  ruleId: string;
  file: string;
  line: number;
  from: Severity;
  to: Severity;
  justification: string;
}

// ============================================================================
// PROFILES & WEIGHTING
// ============================================================================

export interface ProjectProfile {
  category: string;
  /** Empty = every platform is relevant. */
  platforms: Platform[];
}

export type PerspectiveWeights = Record<Perspective, number>;

export interface WeightedFinding {
  finding: Finding;
  perspective: Perspective;
  weight: number;
  score: number;
}

// ============================================================================
// RUN OUTPUT
// ============================================================================

export type RunWarningKind = 'index' | 'suppression';

export interface RunWarning {
  kind: RunWarningKind;
  file: string;
  line?: number;
  message: string;
}

export interface SeverityCounts {
  critical: number;
  important: number;
  contextDependent: number;
  minor: number;
}

export type SectionStatus = 'issues_found' | 'no_issues';

export interface PerspectiveSection {
  perspective: Perspective;
  weight: number;
  status: SectionStatus;
  counts: SeverityCounts;
  issues: WeightedFinding[];
}

export interface Report {
  summary: SeverityCounts & { total: number; suppressed: number };
  perspectives: Record<Perspective, PerspectiveSection>;
  suppressed: Finding[];
  overrides: SeverityOverride[];
  warnings: RunWarning[];
  profile: ProjectProfile;
  corpusVersion: string;
  filesScanned: number;
  filesSkipped: number;
  truncated: boolean;
}
