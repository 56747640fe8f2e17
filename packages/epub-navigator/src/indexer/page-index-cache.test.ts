import type { LoggerMethods } from '@codetable/logger';
import type { PageLocation } from '@codetable/model';

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { PageIndexCache } from './page-index-cache';

function location(fileId: string, anchor: string): PageLocation {
  return { fileId, filePath: `OEBPS/${fileId}.xhtml`, anchor };
}

describe('PageIndexCache', () => {
  let mockLogger: LoggerMethods;
  let dir: string;
  let epubPath: string;

  beforeEach(async () => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    dir = await mkdtemp(join(tmpdir(), 'page-index-cache-'));
    epubPath = join(dir, 'book.epub');
    await writeFile(epubPath, 'epub bytes');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('names the cache after the source file', () => {
    const cache = new PageIndexCache(mockLogger, epubPath);

    expect(cache.cachePath).toBe(`${epubPath}.pagemap.json`);
    expect(cache.metaPath).toBe(`${epubPath}.pagemap.meta.json`);
  });

  test('returns undefined when no cache exists', async () => {
    const cache = new PageIndexCache(mockLogger, epubPath);

    expect(await cache.load()).toBeUndefined();
  });

  test('round-trips an index', async () => {
    const index = new Map([
      [1, location('ch1', 'page_1')],
      [2, location('ch1', 'page_2')],
      [10, location('ch2', 'page_10')],
    ]);
    const cache = new PageIndexCache(mockLogger, epubPath);

    await cache.save(index);
    const loaded = await cache.load();

    expect(loaded).toEqual(index);
    expect([...(loaded?.keys() ?? [])]).toEqual([1, 2, 10]);
  });

  test('writes string-keyed JSON', async () => {
    const cache = new PageIndexCache(mockLogger, epubPath);

    await cache.save(new Map([[3, location('a', 'page_3')]]));

    expect(JSON.parse(await readFile(cache.cachePath, 'utf-8'))).toEqual({
      '3': { fileId: 'a', filePath: 'OEBPS/a.xhtml', anchor: 'page_3' },
    });
  });

  test('rejects unparseable cache files', async () => {
    const cache = new PageIndexCache(mockLogger, epubPath);
    await writeFile(cache.cachePath, '{not json');

    expect(await cache.load()).toBeUndefined();
    expect(mockLogger.warn).toHaveBeenCalledWith(
      `[PageIndexCache] Failed to load cache ${cache.cachePath}, rebuilding:`,
      expect.any(SyntaxError),
    );
  });

  test('rejects cache files with invalid records', async () => {
    const cache = new PageIndexCache(mockLogger, epubPath);
    await writeFile(
      cache.cachePath,
      JSON.stringify({ '1': { fileId: 'a' }, x: location('b', 'page_2') }),
    );

    expect(await cache.load()).toBeUndefined();
    expect(mockLogger.warn).toHaveBeenCalledWith(
      expect.stringContaining(
        `[PageIndexCache] Invalid cache ${cache.cachePath}, rebuilding:`,
      ),
    );
  });

  test('logs write failures without throwing', async () => {
    const cache = new PageIndexCache(
      mockLogger,
      join(dir, 'missing-dir', 'book.epub'),
    );

    await expect(cache.save(new Map())).resolves.toBeUndefined();
    expect(mockLogger.warn).toHaveBeenCalledWith(
      `[PageIndexCache] Could not save cache ${cache.cachePath}:`,
      expect.any(Error),
    );
  });

  describe('fingerprint validation', () => {
    test('uses the cache while the source is unchanged', async () => {
      const cache = new PageIndexCache(mockLogger, epubPath, {
        validation: 'fingerprint',
      });
      const index = new Map([[1, location('a', 'page_1')]]);

      await cache.save(index);

      expect(await cache.load()).toEqual(index);
    });

    test('rebuilds when the source size changes', async () => {
      const cache = new PageIndexCache(mockLogger, epubPath, {
        validation: 'fingerprint',
      });
      await cache.save(new Map([[1, location('a', 'page_1')]]));

      await writeFile(epubPath, 'a different, longer epub payload');

      expect(await cache.load()).toBeUndefined();
      expect(mockLogger.info).toHaveBeenCalledWith(
        `[PageIndexCache] Cache ${cache.cachePath} is stale, rebuilding`,
      );
    });

    test('rebuilds when no fingerprint was recorded', async () => {
      await new PageIndexCache(mockLogger, epubPath).save(
        new Map([[1, location('a', 'page_1')]]),
      );

      const cache = new PageIndexCache(mockLogger, epubPath, {
        validation: 'fingerprint',
      });

      expect(await cache.load()).toBeUndefined();
    });

    test('presence mode ignores a stale fingerprint', async () => {
      const index = new Map([[1, location('a', 'page_1')]]);
      await new PageIndexCache(mockLogger, epubPath, {
        validation: 'fingerprint',
      }).save(index);
      await writeFile(epubPath, 'a different, longer epub payload');

      const cache = new PageIndexCache(mockLogger, epubPath);

      expect(await cache.load()).toEqual(index);
    });
  });
});
