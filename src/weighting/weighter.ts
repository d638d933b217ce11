/**
 * @fileoverview Context Weighter
 *
 * Applies the project profile to classified findings: drops findings whose
 * rule targets none of the profile's platforms, then places every visible
 * finding in each perspective group it is tagged with, scored by
 * severity rank times the perspective weight.
 *
 * @packageDocumentation
 */

import { EngineError } from '../core/errors.js';
import { SEVERITY_RANK } from '../types.js';
import type {
  CompiledRule,
  Finding,
  Perspective,
  PerspectiveWeights,
  Platform,
  ProjectProfile,
  RuleCorpus,
  WeightedFinding,
} from '../types.js';
import { compareStrings } from '../utils/sort.js';
import { resolveWeights } from './profiles.js';

export interface WeightingResult {
  weights: PerspectiveWeights;
  weighted: WeightedFinding[];
  /** Unique visible findings after platform filtering. */
  visible: Finding[];
  /** Suppressed findings after platform filtering, sorted by location. */
  suppressed: Finding[];
  /** Findings removed because their rule targets other platforms. */
  dropped: number;
}

/**
 * An empty platform set on either side means "all platforms".
 */
export function isRelevantToProfile(rule: CompiledRule, platforms: readonly Platform[]): boolean {
  if (rule.platforms.size === 0 || platforms.length === 0) return true;
  return platforms.some((platform) => rule.platforms.has(platform));
}

export function perspectiveWeight(finding: Finding, perspective: Perspective, weights: PerspectiveWeights): number {
  return finding.accessibility ? 1 : weights[perspective];
}

export function compareWeighted(a: WeightedFinding, b: WeightedFinding): number {
  return b.score - a.score
    || compareStrings(a.finding.file, b.finding.file)
    || a.finding.lineStart - b.finding.lineStart
    || compareStrings(a.finding.ruleId, b.finding.ruleId)
    || a.finding.column - b.finding.column
    || a.finding.lineEnd - b.finding.lineEnd
    || compareStrings(a.perspective, b.perspective);
}

export function compareLocation(a: Finding, b: Finding): number {
  return compareStrings(a.file, b.file)
    || a.lineStart - b.lineStart
    || a.column - b.column
    || compareStrings(a.ruleId, b.ruleId);
}

export function weight(findings: readonly Finding[], profile: ProjectProfile, corpus: RuleCorpus): WeightingResult {
  const weights = resolveWeights(profile.category);
  const weighted: WeightedFinding[] = [];
  const visible: Finding[] = [];
  const suppressed: Finding[] = [];
  let dropped = 0;

  for (const finding of findings) {
    const rule = corpus.get(finding.ruleId);
    if (!rule) {
      throw new EngineError('invariant', `Finding at ${finding.file}:${finding.lineStart} references unknown rule ${finding.ruleId}`);
    }
    if (!isRelevantToProfile(rule, profile.platforms)) {
      dropped++;
      continue;
    }
    if (finding.suppressed) {
      suppressed.push(finding);
      continue;
    }

    visible.push(finding);
    for (const perspective of finding.perspectives) {
      const w = perspectiveWeight(finding, perspective, weights);
      weighted.push({ finding, perspective, weight: w, score: SEVERITY_RANK[finding.severity] * w });
    }
  }

  return {
    weights,
    weighted: weighted.sort(compareWeighted),
    visible: visible.sort(compareLocation),
    suppressed: suppressed.sort(compareLocation),
    dropped,
  };
}
