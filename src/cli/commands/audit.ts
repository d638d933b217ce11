/**
 * @fileoverview Audit Command
 *
 * Usage:
 *   ui-audit audit <path> [--profile=<category>] [--platforms=p1,p2]
 *     [--format=text|json] [--fail-on=critical|important|minor]
 *     [--corpus=<file>] [--config=<file>] [--include-suppressed]
 *     [--concurrency=<n|auto>] [--cache] [--progress] [--verbose]
 *
 * Exit code 1 when any visible finding reaches the --fail-on severity,
 * 0 otherwise. Errors propagate to the dispatcher, which exits with 2.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  loadAuditConfig,
  mergeConfigs,
  parseConcurrency,
  readEnvConfig,
  type AuditConfig,
  type Concurrency,
} from '../../config/audit_config.js';
import { AuditEngine, defaultConcurrency } from '../../engine/audit_engine.js';
import { exceedsThreshold, isFailOn, renderJson, renderText, type FailOn } from '../../report/render.js';
import { loadRuleCorpus } from '../../rules/corpus.js';
import { DEFAULT_CACHE_FILE, openFindingsCache, type FindingsCache } from '../../storage/findings_cache.js';
import { logDebug, logWarning, setLogLevel } from '../../telemetry/logger.js';
import type { ProjectProfile, Report } from '../../types.js';
import { getErrorMessage } from '../../utils/errors.js';
import { DEFAULT_CATEGORY, PROJECT_CATEGORIES, isProjectCategory } from '../../weighting/profiles.js';
import { createError, EXIT_FINDINGS, EXIT_OK } from '../errors.js';
import type { CliIo } from '../io.js';
import { createProgressBar, formatDuration, type ProgressBarHandle } from '../progress.js';
import { parseCommandArgs, parseFormat, parsePlatforms } from './args.js';

// ============================================================================
// Types
// ============================================================================

export interface AuditCommandOptions {
  args: string[];
  io: CliIo;
  /** Aborted on SIGINT; the partial report is still printed */
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_FAIL_ON: FailOn = 'critical';

// ============================================================================
// Helpers
// ============================================================================

export function resolveConcurrency(value: Concurrency | undefined): number {
  return value === undefined || value === 'auto' ? defaultConcurrency() : value;
}

async function directoryOf(target: string): Promise<string> {
  const resolved = path.resolve(target);
  try {
    const stats = await fs.stat(resolved);
    return stats.isDirectory() ? resolved : path.dirname(resolved);
  } catch {
    // The engine reports the unreadable root.
    return resolved;
  }
}

/** Write failures are logged and leave the report unchanged. */
async function closeCache(cache: FindingsCache | undefined): Promise<void> {
  try {
    await cache?.close();
  } catch (error) {
    logWarning('[ui-audit] could not write cache', { error: getErrorMessage(error) });
  }
}

function buildProfile(config: AuditConfig): ProjectProfile {
  return {
    category: config.profile?.category ?? DEFAULT_CATEGORY,
    platforms: config.profile?.platforms ?? [],
  };
}

// ============================================================================
// Command
// ============================================================================

export async function auditCommand(options: AuditCommandOptions): Promise<number> {
  const { io } = options;
  const { values, positionals } = parseCommandArgs(options.args, {
    profile: { type: 'string' },
    platforms: { type: 'string' },
    format: { type: 'string' },
    'fail-on': { type: 'string' },
    corpus: { type: 'string' },
    config: { type: 'string' },
    'include-suppressed': { type: 'boolean' },
    concurrency: { type: 'string' },
    cache: { type: 'boolean' },
    progress: { type: 'boolean' },
    verbose: { type: 'boolean' },
  });

  const target = positionals[0];
  if (!target) {
    throw createError('INVALID_ARGUMENT', 'audit requires a source path');
  }
  if (positionals.length > 1) {
    throw createError('INVALID_ARGUMENT', `audit takes one source path, got ${positionals.length}`);
  }

  const format = parseFormat(values.format);
  const failOnFlag = values['fail-on'];
  if (failOnFlag !== undefined && !isFailOn(failOnFlag)) {
    throw createError('INVALID_ARGUMENT', `--fail-on must be critical, important or minor, got "${failOnFlag}"`);
  }
  if (values.profile !== undefined && !isProjectCategory(values.profile)) {
    throw createError(
      'INVALID_ARGUMENT',
      `unknown profile "${values.profile}"; expected one of ${PROJECT_CATEGORIES.join(', ')}`,
    );
  }
  if (values.verbose) {
    setLogLevel('debug');
  }

  // Layers: config file < environment < flags.
  const flags: AuditConfig = {};
  if (values.corpus !== undefined) flags.corpus = path.resolve(values.corpus);
  if (values.concurrency !== undefined) flags.concurrency = parseConcurrency(values.concurrency, '--concurrency');
  if (failOnFlag !== undefined) flags.failOn = failOnFlag;
  if (values.cache) flags.cache = { enabled: true };
  if (values.profile !== undefined || values.platforms !== undefined) {
    flags.profile = {};
    if (values.profile !== undefined) flags.profile.category = values.profile;
    if (values.platforms !== undefined) flags.profile.platforms = parsePlatforms(values.platforms);
  }

  const loaded = await loadAuditConfig(target, values.config);
  const config = mergeConfigs(loaded.config, readEnvConfig(options.env ?? process.env), flags);
  const profile = buildProfile(config);
  const failOn = config.failOn ?? DEFAULT_FAIL_ON;

  const corpus = await loadRuleCorpus(config.corpus);

  let cache: FindingsCache | undefined;
  if (config.cache?.enabled) {
    const cachePath = config.cache.path ?? path.join(await directoryOf(target), DEFAULT_CACHE_FILE);
    cache = await openFindingsCache(cachePath, corpus.version);
  }

  const engine = new AuditEngine(corpus, {
    extensions: config.extensions,
    exclude: config.exclude,
    fileTimeoutMs: config.fileTimeoutMs,
    maxFileBytes: config.maxFileBytes,
    concurrency: resolveConcurrency(config.concurrency),
    cache,
  });

  let bar: ProgressBarHandle | undefined;
  const started = Date.now();
  let report: Report;
  try {
    report = await engine.run(target, profile, {
      signal: options.signal,
      onStart: (total) => {
        if (values.progress) {
          bar = createProgressBar({ total, stream: io.progressStream });
        }
      },
      onProgress: ({ file }) => bar?.increment(1, { file }),
    });
  } finally {
    bar?.stop();
    await closeCache(cache);
  }
  logDebug(`[ui-audit] audit took ${formatDuration(Date.now() - started)}`);

  for (const warning of report.warnings) {
    io.stderr(`warning: ${warning.message}\n`);
  }
  if (report.truncated) {
    io.stderr('warning: audit cancelled; the report covers only the files finished so far\n');
  }

  const includeSuppressed = values['include-suppressed'] === true;
  io.stdout(format === 'json' ? renderJson(report, { includeSuppressed }) : renderText(report, { includeSuppressed }));

  return exceedsThreshold(report, failOn) ? EXIT_FINDINGS : EXIT_OK;
}
