/**
 * @fileoverview Audit Engine
 *
 * Runs one audit: discover files, then per file (bounded pool) read, hash,
 * consult the cache, otherwise tokenize, match and collect suppression
 * directives. Per-file results are kept by file index so the report never
 * depends on completion order. Classification, weighting and aggregation run
 * once over the collected results.
 *
 * @packageDocumentation
 */

import * as os from 'node:os';
import { IndexError } from '../core/errors.js';
import { classify } from '../classifier/classifier.js';
import { parseSuppressions } from '../classifier/suppressions.js';
import { discoverSourceFiles, buildSourceUnit, indexWarning, readSourceText } from '../indexer/source_indexer.js';
import type { DiscoveryOptions, IndexFileOptions } from '../indexer/source_indexer.js';
import { languageForPath } from '../indexer/languages.js';
import { matchUnit } from '../matcher/engine.js';
import { aggregate } from '../report/aggregator.js';
import type { CachedFileResult, FindingsCache } from '../storage/findings_cache.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type {
  ProjectProfile,
  RawFinding,
  Report,
  RuleCorpus,
  RunWarning,
  SuppressionDirective,
} from '../types.js';
import { runWithConcurrency } from '../utils/async.js';
import { computeContentHash } from '../utils/checksums.js';
import { getErrorMessage } from '../utils/errors.js';
import { compareStrings } from '../utils/sort.js';
import { isRelevantToProfile, weight } from '../weighting/weighter.js';

// ============================================================================
// TYPES
// ============================================================================

export interface AuditEngineOptions extends DiscoveryOptions, IndexFileOptions {
  /** Worker pool size; defaults to the number of available CPUs */
  concurrency?: number;
  cache?: FindingsCache;
}

export interface AuditProgress {
  completed: number;
  total: number;
  file: string;
}

export interface AuditRunOptions {
  /** Aborting stops new files from starting; the report comes back truncated. */
  signal?: AbortSignal;
  onProgress?: (progress: AuditProgress) => void;
  /** Called once the file list is known */
  onStart?: (total: number) => void;
}

type FileOutcome =
  | { kind: 'audited'; result: CachedFileResult; cached: boolean }
  | { kind: 'skipped'; warning: RunWarning };

export function defaultConcurrency(): number {
  return Math.max(1, os.availableParallelism());
}

// ============================================================================
// ENGINE
// ============================================================================

export class AuditEngine {
  private readonly corpus: RuleCorpus;
  private readonly options: AuditEngineOptions;

  constructor(corpus: RuleCorpus, options: AuditEngineOptions = {}) {
    this.corpus = corpus;
    this.options = options;
  }

  /**
   * Audit `rootPath` (a directory or a single file) under `profile`.
   *
   * @throws EngineError when the root cannot be read or an internal invariant breaks
   */
  async run(rootPath: string, profile: ProjectProfile, runOptions: AuditRunOptions = {}): Promise<Report> {
    const tree = await discoverSourceFiles(rootPath, this.options);
    const total = tree.files.length;
    runOptions.onStart?.(total);

    let completed = 0;
    const { results, skipped } = await runWithConcurrency(
      tree.files,
      this.options.concurrency ?? defaultConcurrency(),
      async (relativePath) => {
        const outcome = await this.auditFile(tree.root, relativePath);
        completed++;
        runOptions.onProgress?.({ completed, total, file: relativePath });
        return outcome;
      },
      { signal: runOptions.signal },
    );

    const rawFindings: RawFinding[] = [];
    const directivesByFile = new Map<string, SuppressionDirective[]>();
    const indexWarnings: RunWarning[] = [];
    let filesScanned = 0;
    let cacheHits = 0;

    for (const outcome of results) {
      if (!outcome) continue;
      if (outcome.kind === 'skipped') {
        indexWarnings.push(outcome.warning);
        continue;
      }
      filesScanned++;
      if (outcome.cached) cacheHits++;
      rawFindings.push(...outcome.result.rawFindings);
      for (const directive of outcome.result.directives) {
        const list = directivesByFile.get(directive.file) ?? [];
        list.push(directive);
        directivesByFile.set(directive.file, list);
      }
    }

    const classification = classify(rawFindings, directivesByFile, this.corpus);
    const weighting = weight(classification.findings, profile, this.corpus);
    const overrides = classification.overrides.filter((override) => {
      const rule = this.corpus.get(override.ruleId);
      return rule !== undefined && isRelevantToProfile(rule, profile.platforms);
    });

    logDebug('[ui-audit] audit finished', {
      root: tree.root,
      files: total,
      scanned: filesScanned,
      skipped: indexWarnings.length,
      notStarted: skipped,
      cacheHits,
      findings: weighting.visible.length,
    });

    return aggregate(weighting, {
      profile: { category: profile.category, platforms: [...profile.platforms] },
      corpusVersion: this.corpus.version,
      overrides,
      warnings: sortWarnings([...indexWarnings, ...classification.warnings]),
      filesScanned,
      filesSkipped: indexWarnings.length,
      truncated: skipped > 0,
    });
  }

  private async auditFile(root: string, relativePath: string): Promise<FileOutcome> {
    const language = languageForPath(relativePath);
    if (!language) {
      return { kind: 'skipped', warning: indexWarning(new IndexError(relativePath, 'read', 'no language is registered for this extension')) };
    }

    let text: string;
    try {
      text = await readSourceText(root, relativePath, this.options);
    } catch (error: unknown) {
      if (error instanceof IndexError) {
        return { kind: 'skipped', warning: indexWarning(error) };
      }
      throw error;
    }

    const contentHash = computeContentHash(text);
    const cache = this.options.cache;
    const hit = await cache?.get(relativePath, contentHash);
    if (hit) {
      return { kind: 'audited', result: hit, cached: true };
    }

    const unit = buildSourceUnit(relativePath, text, language);
    const result: CachedFileResult = {
      rawFindings: matchUnit(unit, this.corpus.rules),
      directives: parseSuppressions(unit),
    };

    if (cache) {
      try {
        await cache.set(relativePath, contentHash, result);
      } catch (error: unknown) {
        logWarning('[ui-audit] could not write cache entry', { file: relativePath, error: getErrorMessage(error) });
      }
    }

    return { kind: 'audited', result, cached: false };
  }
}

/**
 * Sort run warnings by file then line, index warnings first on ties.
 */
export function sortWarnings(warnings: readonly RunWarning[]): RunWarning[] {
  return [...warnings].sort((a, b) =>
    compareStrings(a.file, b.file)
    || (a.line ?? 0) - (b.line ?? 0)
    || compareStrings(a.kind, b.kind));
}
