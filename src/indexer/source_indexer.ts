/**
 * @fileoverview Source Indexer
 *
 * Turns a source tree into SourceUnits: discovers files by extension, reads
 * each one under a timeout, decodes strict UTF-8, tokenizes, and derives
 * scope/call structure. A file that cannot be indexed raises IndexError; the
 * tree-level entry point turns those into warnings and keeps going.
 *
 * @packageDocumentation
 */

import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { EngineError, IndexError } from '../core/errors.js';
import { TimeoutError, runWithConcurrency, withTimeout } from '../utils/async.js';
import { computeContentHash } from '../utils/checksums.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { compareStrings } from '../utils/sort.js';
import { logDebug } from '../telemetry/logger.js';
import type { Language, RunWarning, SourceUnit } from '../types.js';
import { DEFAULT_EXTENSIONS, languageForPath } from './languages.js';
import { analyzeStructure } from './scopes.js';
import { tokenize } from './tokenizer.js';

// ============================================================================
// TYPES
// ============================================================================

export type FileReader = (absolutePath: string, signal: AbortSignal) => Promise<Buffer>;

export interface DiscoveryOptions {
  /** Extensions without the leading dot */
  extensions?: string[];
  /** Glob patterns relative to the root */
  exclude?: string[];
}

export interface IndexFileOptions {
  /** Per-file read timeout in ms (0 disables) */
  fileTimeoutMs?: number;
  /** Files larger than this are skipped */
  maxFileBytes?: number;
  /** Injected reader, defaults to fs.readFile */
  readFile?: FileReader;
}

export interface IndexTreeOptions extends DiscoveryOptions, IndexFileOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

export interface SourceTree {
  /** Absolute directory the relative paths are resolved against */
  root: string;
  /** Sorted POSIX paths relative to `root` */
  files: string[];
}

export interface IndexedTree {
  units: SourceUnit[];
  warnings: RunWarning[];
  truncated: boolean;
}

export const DEFAULT_EXCLUDES = [
  '**/node_modules/**',
  '**/.git/**',
  '**/build/**',
  '**/.build/**',
  '**/dist/**',
  '**/Pods/**',
  '**/DerivedData/**',
  '**/.ui-audit/**',
];

export const DEFAULT_FILE_TIMEOUT_MS = 5000;
export const DEFAULT_MAX_FILE_BYTES = 1024 * 1024;

const defaultReader: FileReader = (absolutePath, signal) => fs.readFile(absolutePath, { signal });

// ============================================================================
// DISCOVERY
// ============================================================================

/**
 * Find the files to audit under `rootPath`. A path naming a single file is a
 * tree of one.
 */
export async function discoverSourceFiles(rootPath: string, options: DiscoveryOptions = {}): Promise<SourceTree> {
  const resolved = path.resolve(rootPath);
  const extensions = options.extensions ?? DEFAULT_EXTENSIONS;
  const exclude = options.exclude ?? DEFAULT_EXCLUDES;

  let stats: Stats;
  try {
    stats = await fs.stat(resolved);
  } catch (error: unknown) {
    throw new EngineError('root_unreadable', `Cannot read source path ${rootPath}: ${getErrorMessage(error)}`, toError(error));
  }

  if (stats.isFile()) {
    const name = path.basename(resolved);
    const wanted = extensions.includes(path.extname(name).slice(1).toLowerCase());
    return { root: path.dirname(resolved), files: wanted ? [name] : [] };
  }

  if (!stats.isDirectory()) {
    throw new EngineError('root_unreadable', `Source path ${rootPath} is neither a file nor a directory`);
  }
  if (extensions.length === 0) {
    return { root: resolved, files: [] };
  }

  const pattern = extensions.length === 1 ? `**/*.${extensions[0]}` : `**/*.{${extensions.join(',')}}`;
  let files: string[];
  try {
    files = await glob(pattern, {
      cwd: resolved,
      ignore: exclude,
      nodir: true,
      follow: false,
      posix: true,
    });
  } catch (error: unknown) {
    throw new EngineError('root_unreadable', `Cannot list ${rootPath}: ${getErrorMessage(error)}`, toError(error));
  }

  return { root: resolved, files: files.sort(compareStrings) };
}

// ============================================================================
// SINGLE FILE
// ============================================================================

/**
 * Build a SourceUnit from already-decoded text.
 */
export function buildSourceUnit(relativePath: string, text: string, language: Language): SourceUnit {
  const { tokens, comments, lineCount } = tokenize(text);
  const structure = analyzeStructure(tokens);
  return {
    path: relativePath,
    language,
    contentHash: computeContentHash(text),
    lineCount,
    tokens,
    comments,
    ...structure,
  };
}

/**
 * Read a file under the configured timeout and decode it as strict UTF-8.
 */
export async function readSourceText(root: string, relativePath: string, options: IndexFileOptions = {}): Promise<string> {
  const absolutePath = path.join(root, relativePath);
  const reader = options.readFile ?? defaultReader;
  const timeoutMs = options.fileTimeoutMs ?? DEFAULT_FILE_TIMEOUT_MS;
  const maxBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  const controller = new AbortController();

  let buffer: Buffer;
  try {
    buffer = await withTimeout(reader(absolutePath, controller.signal), timeoutMs, {
      context: `reading ${relativePath}`,
      onTimeout: () => controller.abort(),
    });
  } catch (error: unknown) {
    if (error instanceof TimeoutError) {
      throw new IndexError(relativePath, 'timeout', error.message);
    }
    throw new IndexError(relativePath, 'read', getErrorMessage(error));
  }

  if (buffer.length > maxBytes) {
    throw new IndexError(relativePath, 'too_large', `${buffer.length} bytes exceeds limit of ${maxBytes}`);
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch (error: unknown) {
    throw new IndexError(relativePath, 'encoding', `not valid UTF-8 (${getErrorMessage(error)})`);
  }
}

export async function indexFile(root: string, relativePath: string, options: IndexFileOptions = {}): Promise<SourceUnit> {
  const language = languageForPath(relativePath);
  if (!language) {
    throw new IndexError(relativePath, 'read', 'no language is registered for this extension');
  }
  const text = await readSourceText(root, relativePath, options);
  return buildSourceUnit(relativePath, text, language);
}

// ============================================================================
// TREE
// ============================================================================

export function indexWarning(error: IndexError): RunWarning {
  return { kind: 'index', file: error.filePath, message: error.message };
}

/**
 * Index every source file under `rootPath`. Per-file failures become warnings.
 */
export async function indexSourceTree(rootPath: string, options: IndexTreeOptions = {}): Promise<IndexedTree> {
  const tree = await discoverSourceFiles(rootPath, options);
  const warnings: RunWarning[] = [];

  const { results, skipped } = await runWithConcurrency(
    tree.files,
    options.concurrency ?? 4,
    async (relativePath) => {
      try {
        return await indexFile(tree.root, relativePath, options);
      } catch (error: unknown) {
        if (error instanceof IndexError) {
          warnings.push(indexWarning(error));
          return null;
        }
        throw error;
      }
    },
    { signal: options.signal },
  );

  const units = results.filter((unit): unit is SourceUnit => unit !== null && unit !== undefined);
  logDebug('[ui-audit] indexed source tree', { root: tree.root, files: tree.files.length, units: units.length });

  return {
    units,
    warnings: warnings.sort((a, b) => compareStrings(a.file, b.file)),
    truncated: skipped > 0,
  };
}
