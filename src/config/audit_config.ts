/**
 * @fileoverview Audit configuration
 *
 * Optional `ui-audit.config.yaml` (or `.yml` / `.json`) in the audited
 * directory, validated with zod. Paths inside the file resolve against the
 * file's own directory. Precedence, lowest first: defaults, config file,
 * environment, CLI flags.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { FAIL_ON_LEVELS } from '../report/render.js';
import { logDebug } from '../telemetry/logger.js';
import { PLATFORMS } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import { documentFormatForPath, parseStructuredText } from '../utils/structured_text.js';
import { PROJECT_CATEGORIES, isProjectCategory } from '../weighting/profiles.js';

// ============================================================================
// SCHEMA
// ============================================================================

export const CONFIG_FILE_NAMES = ['ui-audit.config.yaml', 'ui-audit.config.yml', 'ui-audit.config.json'] as const;

export const ConcurrencySchema = z.union([z.number().int().positive(), z.literal('auto')]);

export const AuditConfigSchema = z.object({
  extensions: z.array(z.string().regex(/^[A-Za-z0-9]+$/, 'extension without the leading dot')).min(1).optional()
    .describe('File extensions to audit'),
  exclude: z.array(z.string().min(1)).optional().describe('Glob patterns to skip, relative to the audited root'),
  corpus: z.string().min(1).optional().describe('Rule corpus file'),
  profile: z.object({
    category: z.string()
      .refine(isProjectCategory, { message: `unknown category; expected one of ${PROJECT_CATEGORIES.join(', ')}` })
      .optional(),
    platforms: z.array(z.enum(PLATFORMS)).optional(),
  }).strict().optional(),
  concurrency: ConcurrencySchema.optional().describe('Worker pool size or "auto"'),
  fileTimeoutMs: z.number().int().min(0).optional().describe('Per-file read timeout in ms (0 disables)'),
  maxFileBytes: z.number().int().positive().optional(),
  failOn: z.enum(FAIL_ON_LEVELS).optional(),
  cache: z.object({
    enabled: z.boolean().optional(),
    path: z.string().min(1).optional(),
  }).strict().optional(),
}).strict();

export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type Concurrency = z.infer<typeof ConcurrencySchema>;

export interface LoadedConfig {
  config: AuditConfig;
  /** Absolute path of the file read, null when none was found */
  path: string | null;
}

function issuesOf(error: z.ZodError): string[] {
  return error.errors.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

// ============================================================================
// PARSE & LOAD
// ============================================================================

/**
 * Parse and validate configuration text. Relative `corpus` and `cache.path`
 * values resolve against the directory of `source`.
 */
export function parseAuditConfig(text: string, source: string): AuditConfig {
  const parsed = parseStructuredText(text, documentFormatForPath(source));
  if (!parsed.ok) {
    throw new ConfigError(source, [`cannot parse: ${parsed.error.message}`]);
  }

  // An empty YAML file is an empty configuration.
  const document = parsed.value ?? {};
  const result = AuditConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigError(source, issuesOf(result.error));
  }

  const config = result.data;
  const baseDir = path.dirname(path.resolve(source));
  return {
    ...config,
    ...(config.corpus ? { corpus: path.resolve(baseDir, config.corpus) } : {}),
    ...(config.cache?.path ? { cache: { ...config.cache, path: path.resolve(baseDir, config.cache.path) } } : {}),
  };
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Look for a configuration file in `rootPath` (or, when it names a file, in
 * that file's directory).
 */
export async function findConfigFile(rootPath: string): Promise<string | null> {
  const resolved = path.resolve(rootPath);
  const dir = (await fileExists(resolved)) ? path.dirname(resolved) : resolved;
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(dir, name);
    if (await fileExists(candidate)) return candidate;
  }
  return null;
}

/**
 * Load the configuration for an audit of `rootPath`. An explicit path must
 * exist; a discovered one is optional.
 */
export async function loadAuditConfig(rootPath: string, explicitPath?: string): Promise<LoadedConfig> {
  const configPath = explicitPath ? path.resolve(explicitPath) : await findConfigFile(rootPath);
  if (!configPath) {
    return { config: {}, path: null };
  }

  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf8');
  } catch (error: unknown) {
    throw new ConfigError(configPath, [`cannot read: ${getErrorMessage(error)}`]);
  }

  const config = parseAuditConfig(text, configPath);
  logDebug('[ui-audit] loaded configuration', { path: configPath, keys: Object.keys(config) });
  return { config, path: configPath };
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

export const ENV_CONCURRENCY = 'UI_AUDIT_CONCURRENCY';

export function parseConcurrency(raw: string, source: string): Concurrency {
  const trimmed = raw.trim();
  if (trimmed === 'auto') return 'auto';
  const value = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  const result = ConcurrencySchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(source, [`concurrency must be a positive integer or "auto", got "${raw}"`]);
  }
  return result.data;
}

/**
 * Configuration values taken from the environment.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): AuditConfig {
  const raw = env[ENV_CONCURRENCY];
  if (raw === undefined || raw.trim() === '') return {};
  return { concurrency: parseConcurrency(raw, ENV_CONCURRENCY) };
}

/**
 * Merge layers, later ones winning key by key. Nested `profile` and `cache`
 * objects merge field by field.
 */
export function mergeConfigs(...layers: AuditConfig[]): AuditConfig {
  let merged: AuditConfig = {};
  for (const layer of layers) {
    merged = {
      ...merged,
      ...layer,
      ...(layer.profile || merged.profile ? { profile: { ...merged.profile, ...layer.profile } } : {}),
      ...(layer.cache || merged.cache ? { cache: { ...merged.cache, ...layer.cache } } : {}),
    };
  }
  return merged;
}
