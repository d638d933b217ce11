/**
 * @fileoverview ui-audit public API
 *
 * @example
 * ```typescript
 * import { AuditEngine, loadRuleCorpus, renderJson } from 'ui-audit';
 *
 * const corpus = await loadRuleCorpus();
 * const engine = new AuditEngine(corpus, { concurrency: 4 });
 * const report = await engine.run('./ios/App', { category: 'productivity', platforms: ['ios'] });
 * process.stdout.write(renderJson(report));
 * ```
 *
 * @packageDocumentation
 */

// Types
export * from './types.js';

// Errors
export {
  AuditError,
  ConfigError,
  EngineError,
  IndexError,
  RuleCompileError,
  isAuditError,
  isFatalError,
  type EngineErrorReason,
  type ErrorJSON,
  type IndexFailureReason,
} from './core/errors.js';

// Rule corpus
export { DEFAULT_CORPUS_PATH, compileRuleCorpus, loadRuleCorpus, parseRuleCorpus } from './rules/corpus.js';
export { compileRule, renderTemplate } from './rules/compile.js';
export { CorpusDocumentSchema, RuleDefinitionSchema, type RuleDefinitionInput } from './rules/schema.js';

// Indexing & matching
export {
  DEFAULT_EXCLUDES,
  buildSourceUnit,
  discoverSourceFiles,
  indexFile,
  indexSourceTree,
  type FileReader,
  type IndexedTree,
  type SourceTree,
} from './indexer/source_indexer.js';
export { DEFAULT_EXTENSIONS, languageForPath } from './indexer/languages.js';
export { matchUnit } from './matcher/engine.js';

// Classification, weighting, reporting
export { classify, type Classification } from './classifier/classifier.js';
export { DIRECTIVE_MARKER, parseSuppressions } from './classifier/suppressions.js';
export { CATEGORY_WEIGHTS, PROJECT_CATEGORIES, isProjectCategory, resolveWeights, type ProjectCategory } from './weighting/profiles.js';
export { weight, type WeightingResult } from './weighting/weighter.js';
export { aggregate, type ReportMeta } from './report/aggregator.js';
export { exceedsThreshold, renderJson, renderText, type FailOn, type RenderOptions } from './report/render.js';

// Engine
export {
  AuditEngine,
  type AuditEngineOptions,
  type AuditProgress,
  type AuditRunOptions,
} from './engine/audit_engine.js';
export {
  InMemoryFindingsCache,
  JsonFindingsCache,
  openFindingsCache,
  type CachedFileResult,
  type FindingsCache,
} from './storage/findings_cache.js';

// Configuration & logging
export { loadAuditConfig, type AuditConfig } from './config/index.js';
export { setLogLevel, type LogLevel } from './telemetry/logger.js';

export { UI_AUDIT_VERSION } from './version.js';
