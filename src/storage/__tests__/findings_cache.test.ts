import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  InMemoryFindingsCache,
  JsonFindingsCache,
  decodePayload,
  openFindingsCache,
  type CachedFileResult,
} from '../findings_cache.js';
import { resetLogLevel, setLogLevel } from '../../telemetry/logger.js';

const RESULT: CachedFileResult = {
  rawFindings: [
    {
      ruleId: 'heavy-shadow',
      file: 'Sources/Card.swift',
      lineStart: 4,
      lineEnd: 4,
      column: 9,
      text: 'shadow ( radius : 20 )',
      message: 'Shadow radius 20 is heavy',
      occurrences: 1,
    },
  ],
  directives: [
    {
      file: 'Sources/Card.swift',
      line: 7,
      targetLine: 8,
      ruleIds: ['hex-color-literal'],
      override: 'minor',
      justification: 'brand palette',
    },
  ],
};

describe('JsonFindingsCache', () => {
  let tempDir: string;
  let file: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'findings-cache-test-'));
    file = path.join(tempDir, 'nested', 'dir', 'cache.json');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeDocument(document: unknown): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(document));
  }

  it('returns what was stored for the same path and hash', async () => {
    const cache = new JsonFindingsCache(file, { corpusVersion: 'v1' });

    await cache.set('Sources/Card.swift', 'hash-a', RESULT);

    expect(await cache.get('Sources/Card.swift', 'hash-a')).toEqual(RESULT);
    expect(await cache.getStats()).toEqual({ entries: 1, hits: 1, misses: 0 });
  });

  it('misses when the content hash changed', async () => {
    const cache = new JsonFindingsCache(file, { corpusVersion: 'v1' });
    await cache.set('Sources/Card.swift', 'hash-a', RESULT);

    expect(await cache.get('Sources/Card.swift', 'hash-b')).toBeUndefined();
    expect((await cache.getStats()).misses).toBe(1);
  });

  it('replaces the entry of a path on write', async () => {
    const cache = new JsonFindingsCache(file, { corpusVersion: 'v1' });
    await cache.set('Sources/Card.swift', 'hash-a', RESULT);
    await cache.set('Sources/Card.swift', 'hash-b', { rawFindings: [], directives: [] });

    expect(await cache.get('Sources/Card.swift', 'hash-a')).toBeUndefined();
    expect(await cache.get('Sources/Card.swift', 'hash-b')).toEqual({ rawFindings: [], directives: [] });
    expect((await cache.getStats()).entries).toBe(1);
  });

  it('hands out copies of stored results', async () => {
    const cache = new JsonFindingsCache(file, { corpusVersion: 'v1' });
    const stored: CachedFileResult = { rawFindings: [...RESULT.rawFindings], directives: [] };
    await cache.set('A.swift', 'h1', stored);
    stored.rawFindings.pop();

    const hit = await cache.get('A.swift', 'h1');
    hit?.rawFindings.pop();

    expect((await cache.get('A.swift', 'h1'))?.rawFindings).toEqual(RESULT.rawFindings);
  });

  it('writes a versioned document on close and reads it back', async () => {
    const first = await openFindingsCache(file, 'v1');
    await first.set('A.swift', 'h1', RESULT);
    await first.close();

    const document = JSON.parse(fs.readFileSync(file, 'utf8'));
    expect(document.version).toBe(1);
    expect(document.corpusVersion).toBe('v1');
    expect(document.entries).toEqual({ 'A.swift': { contentHash: 'h1', result: RESULT } });

    const second = await openFindingsCache(file, 'v1');
    expect(await second.get('A.swift', 'h1')).toEqual(RESULT);
  });

  it('does not create the file when nothing was written', async () => {
    const cache = await openFindingsCache(file, 'v1');
    await cache.get('A.swift', 'h1');
    await cache.close();

    expect(fs.existsSync(file)).toBe(false);
  });

  it('drops entries written under another corpus version', async () => {
    writeDocument({ version: 1, corpusVersion: 'v1', entries: { 'A.swift': { contentHash: 'h1', result: RESULT } } });

    const cache = await openFindingsCache(file, 'v2');

    expect(await cache.get('A.swift', 'h1')).toBeUndefined();
    expect((await cache.getStats()).entries).toBe(0);
    await cache.close();
    expect(JSON.parse(fs.readFileSync(file, 'utf8')).corpusVersion).toBe('v2');
  });

  it('treats a corrupted entry as a miss and keeps the others', async () => {
    writeDocument({
      version: 1,
      corpusVersion: 'v1',
      entries: {
        'A.swift': { contentHash: 'h1', result: { rawFindings: 'nope' } },
        'B.swift': { contentHash: 'h2', result: RESULT },
      },
    });

    const cache = await openFindingsCache(file, 'v1');

    expect(await cache.get('A.swift', 'h1')).toBeUndefined();
    expect(await cache.get('B.swift', 'h2')).toEqual(RESULT);
    expect(await cache.getStats()).toEqual({ entries: 1, hits: 1, misses: 1 });
  });

  it('starts empty when the document is not valid JSON or has an unknown shape', async () => {
    writeDocument({ version: 7, entries: [] });
    const unknownShape = await openFindingsCache(file, 'v1');
    expect((await unknownShape.getStats()).entries).toBe(0);

    setLogLevel('warn');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    fs.writeFileSync(file, '{"version": 1,');
    const broken = await openFindingsCache(file, 'v1');
    expect((await broken.getStats()).entries).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe('[ui-audit] cache is not valid JSON, starting empty');
    warn.mockRestore();
    resetLogLevel();
  });

  it('clears every entry', async () => {
    const cache = new JsonFindingsCache(file, { corpusVersion: 'v1' });
    await cache.set('A.swift', 'h1', RESULT);
    await cache.set('B.swift', 'h2', RESULT);

    expect(await cache.clear()).toBe(2);
    expect(await cache.getStats()).toEqual({ entries: 0, hits: 0, misses: 0 });
  });
});

describe('InMemoryFindingsCache', () => {
  it('keys entries by path and hash and hands out copies', async () => {
    const cache = new InMemoryFindingsCache();
    await cache.set('A.swift', 'h1', RESULT);

    const hit = await cache.get('A.swift', 'h1');
    hit?.rawFindings.pop();

    expect(await cache.get('A.swift', 'h1')).toEqual(RESULT);
    expect(await cache.get('A.swift', 'h2')).toBeUndefined();
    expect(await cache.getStats()).toEqual({ entries: 1, hits: 2, misses: 1 });
  });
});

describe('decodePayload', () => {
  it('rejects invalid JSON and unknown severities', () => {
    expect(decodePayload('{')).toBeUndefined();
    expect(decodePayload(JSON.stringify({
      rawFindings: [],
      directives: [{ file: 'a', line: 1, targetLine: 2, ruleIds: [], override: 'urgent', justification: '' }],
    }))).toBeUndefined();
  });
});
