/**
 * @fileoverview Aggregator
 *
 * Folds weighted findings into the Report: one section per perspective,
 * severity counts per section and for the run as a whole. Never fails on
 * empty input; an empty run produces three `no_issues` sections.
 *
 * @packageDocumentation
 */

import type {
  Finding,
  Perspective,
  PerspectiveSection,
  ProjectProfile,
  Report,
  RunWarning,
  SeverityCounts,
  SeverityOverride,
} from '../types.js';
import type { WeightingResult } from '../weighting/weighter.js';

export interface ReportMeta {
  profile: ProjectProfile;
  corpusVersion: string;
  overrides: SeverityOverride[];
  warnings: RunWarning[];
  filesScanned: number;
  filesSkipped: number;
  truncated: boolean;
}

export function emptyCounts(): SeverityCounts {
  return { critical: 0, important: 0, contextDependent: 0, minor: 0 };
}

export function countSeverities(findings: Iterable<Finding>): SeverityCounts {
  const counts = emptyCounts();
  for (const finding of findings) {
    switch (finding.severity) {
      case 'critical':
        counts.critical++;
        break;
      case 'important':
        counts.important++;
        break;
      case 'context-dependent':
        counts.contextDependent++;
        break;
      case 'minor':
        counts.minor++;
        break;
    }
  }
  return counts;
}

function section(weighting: WeightingResult, perspective: Perspective): PerspectiveSection {
  const issues = weighting.weighted.filter((entry) => entry.perspective === perspective);
  return {
    perspective,
    weight: weighting.weights[perspective],
    status: issues.length > 0 ? 'issues_found' : 'no_issues',
    counts: countSeverities(issues.map((entry) => entry.finding)),
    issues,
  };
}

export function aggregate(weighting: WeightingResult, meta: ReportMeta): Report {
  const perspectives: Record<Perspective, PerspectiveSection> = {
    clarity: section(weighting, 'clarity'),
    consistency: section(weighting, 'consistency'),
    deference: section(weighting, 'deference'),
  };

  return {
    summary: {
      ...countSeverities(weighting.visible),
      total: weighting.visible.length,
      suppressed: weighting.suppressed.length,
    },
    perspectives,
    suppressed: weighting.suppressed,
    overrides: meta.overrides,
    warnings: meta.warnings,
    profile: meta.profile,
    corpusVersion: meta.corpusVersion,
    filesScanned: meta.filesScanned,
    filesSkipped: meta.filesSkipped,
    truncated: meta.truncated,
  };
}
