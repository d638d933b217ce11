/**
 * @fileoverview Findings cache
 *
 * Stores the per-file output of the matcher (raw findings plus suppression
 * directives) keyed by file path, content hash and corpus version. A changed
 * file or a changed corpus is always a miss, so a cached run reports exactly
 * what a cold run would.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getErrorCode, getErrorMessage } from '../utils/errors.js';
import { SEVERITIES } from '../types.js';
import type { RawFinding, SuppressionDirective } from '../types.js';

// ============================================================================
// TYPES
// ============================================================================

/** Everything the engine derives from one file before classification. */
export interface CachedFileResult {
  rawFindings: RawFinding[];
  directives: SuppressionDirective[];
}

export interface FindingsCacheStats {
  entries: number;
  hits: number;
  misses: number;
}

export interface FindingsCache {
  get(filePath: string, contentHash: string): Promise<CachedFileResult | undefined>;
  set(filePath: string, contentHash: string, result: CachedFileResult): Promise<void>;
  getStats(): Promise<FindingsCacheStats>;
  clear(): Promise<number>;
  close(): Promise<void>;
}

export const DEFAULT_CACHE_FILE = '.ui-audit/cache.json';

// ============================================================================
// PAYLOAD VALIDATION
// ============================================================================

const RawFindingSchema = z.object({
  ruleId: z.string(),
  file: z.string(),
  lineStart: z.number().int(),
  lineEnd: z.number().int(),
  column: z.number().int(),
  text: z.string(),
  message: z.string(),
  occurrences: z.number().int(),
});

const DirectiveSchema = z.object({
  file: z.string(),
  line: z.number().int(),
  targetLine: z.number().int(),
  ruleIds: z.array(z.string()),
  override: z.enum(SEVERITIES).optional(),
  invalidOverride: z.string().optional(),
  justification: z.string(),
});

const PayloadSchema = z.object({
  rawFindings: z.array(RawFindingSchema),
  directives: z.array(DirectiveSchema),
});

export function decodePayload(payload: string): CachedFileResult | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return undefined;
  }
  const result = PayloadSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

// ============================================================================
// JSON DOCUMENT IMPLEMENTATION
// ============================================================================

const CACHE_DOCUMENT_VERSION = 1;

// Entries are checked against PayloadSchema on read, so one bad entry never discards the rest.
const CacheDocumentSchema = z.object({
  version: z.literal(CACHE_DOCUMENT_VERSION),
  corpusVersion: z.string(),
  savedAt: z.string().optional(),
  entries: z.record(z.object({ contentHash: z.string(), result: z.unknown() })),
});

interface CacheEntry {
  contentHash: string;
  result: unknown;
}

export interface JsonFindingsCacheOptions {
  corpusVersion: string;
}

/**
 * Cache persisted as one JSON document. `load()` reads it once; `close()`
 * writes it back when anything changed.
 */
export class JsonFindingsCache implements FindingsCache {
  private readonly filePath: string;
  private readonly corpusVersion: string;
  private readonly entries = new Map<string, CacheEntry>();
  private dirty = false;
  private hits = 0;
  private misses = 0;

  constructor(filePath: string, options: JsonFindingsCacheOptions) {
    this.filePath = filePath;
    this.corpusVersion = options.corpusVersion;
  }

  /**
   * Load entries from disk. A missing file starts an empty cache, as does a
   * document written for another corpus version or in an unknown shape.
   */
  async load(): Promise<void> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (getErrorCode(error) !== 'ENOENT') {
        logWarning('[ui-audit] could not read cache, starting empty', { file: this.filePath, error: getErrorMessage(error) });
      }
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      logWarning('[ui-audit] cache is not valid JSON, starting empty', { file: this.filePath, error: getErrorMessage(error) });
      this.dirty = true;
      return;
    }

    const document = CacheDocumentSchema.safeParse(parsed);
    if (!document.success) {
      logDebug('[ui-audit] cache document has an unknown shape, starting empty', { file: this.filePath });
      this.dirty = true;
      return;
    }
    if (document.data.corpusVersion !== this.corpusVersion) {
      logDebug('[ui-audit] dropped cache entries of another corpus version', {
        removed: Object.keys(document.data.entries).length,
      });
      this.dirty = true;
      return;
    }

    for (const [filePath, entry] of Object.entries(document.data.entries)) {
      this.entries.set(filePath, { contentHash: entry.contentHash, result: entry.result });
    }
  }

  async get(filePath: string, contentHash: string): Promise<CachedFileResult | undefined> {
    const entry = this.entries.get(filePath);
    if (!entry || entry.contentHash !== contentHash) {
      this.misses++;
      return undefined;
    }

    // Parsing builds fresh objects, so callers never share state with the cache.
    const decoded = PayloadSchema.safeParse(entry.result);
    if (!decoded.success) {
      // Corrupted entry
      this.entries.delete(filePath);
      this.dirty = true;
      this.misses++;
      return undefined;
    }

    this.hits++;
    return decoded.data;
  }

  async set(filePath: string, contentHash: string, result: CachedFileResult): Promise<void> {
    this.entries.set(filePath, { contentHash, result: PayloadSchema.parse(result) });
    this.dirty = true;
  }

  async getStats(): Promise<FindingsCacheStats> {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }

  async clear(): Promise<number> {
    const count = this.entries.size;
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.dirty = true;
    return count;
  }

  /** Write the document if anything changed since `load()`. */
  async flush(): Promise<void> {
    if (!this.dirty) return;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const document = {
      version: CACHE_DOCUMENT_VERSION,
      corpusVersion: this.corpusVersion,
      savedAt: new Date().toISOString(),
      entries: Object.fromEntries(this.entries),
    };

    await fs.writeFile(this.filePath, JSON.stringify(document, null, 2));
    this.dirty = false;
  }

  async close(): Promise<void> {
    await this.flush();
  }
}

// ============================================================================
// IN-MEMORY IMPLEMENTATION
// ============================================================================

/**
 * Map-backed cache for a single run against a single corpus. Entries are stored as JSON so
 * callers never share mutable objects with the cache.
 */
export class InMemoryFindingsCache implements FindingsCache {
  private readonly entries = new Map<string, { contentHash: string; payload: string }>();
  private hits = 0;
  private misses = 0;

  async get(filePath: string, contentHash: string): Promise<CachedFileResult | undefined> {
    const entry = this.entries.get(filePath);
    const decoded = entry && entry.contentHash === contentHash ? decodePayload(entry.payload) : undefined;
    if (!decoded) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    return decoded;
  }

  async set(filePath: string, contentHash: string, result: CachedFileResult): Promise<void> {
    this.entries.set(filePath, { contentHash, payload: JSON.stringify(result) });
  }

  async getStats(): Promise<FindingsCacheStats> {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }

  async clear(): Promise<number> {
    const count = this.entries.size;
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    return count;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}

// ============================================================================
// FACTORY
// ============================================================================

/** Open the JSON cache at `filePath`. The file and its directory are created on close. */
export async function openFindingsCache(filePath: string, corpusVersion: string): Promise<JsonFindingsCache> {
  const cache = new JsonFindingsCache(filePath, { corpusVersion });
  await cache.load();
  return cache;
}
