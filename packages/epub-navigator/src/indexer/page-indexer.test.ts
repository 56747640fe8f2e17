import type { LoggerMethods } from '@codetable/logger';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { createMemorySource, xhtml } from '../testing/memory-source';
import { PageIndexer } from './page-indexer';

describe('PageIndexer', () => {
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
  });

  test('maps page numbers to file, path and anchor', async () => {
    const source = createMemorySource([
      { id: 'cover', html: xhtml('<p>Cover</p>') },
      {
        id: 'ch1',
        html: xhtml('<span id="page_1"/><p>a</p><span id="page_2"/>'),
      },
      { id: 'ch2', html: xhtml('<span id="page_3"/><p>b</p>') },
    ]);

    const index = await new PageIndexer(mockLogger).build(source);

    expect([...index.entries()]).toEqual([
      [1, { fileId: 'ch1', filePath: 'OEBPS/ch1.xhtml', anchor: 'page_1' }],
      [2, { fileId: 'ch1', filePath: 'OEBPS/ch1.xhtml', anchor: 'page_2' }],
      [3, { fileId: 'ch2', filePath: 'OEBPS/ch2.xhtml', anchor: 'page_3' }],
    ]);
    expect(source.readText).toHaveBeenCalledTimes(3);
  });

  test('keeps the first location of a duplicated page', async () => {
    const source = createMemorySource([
      { id: 'a', html: xhtml('<span id="page_5"/>') },
      { id: 'b', html: xhtml('<span id="page_5"/><span id="page_6"/>') },
    ]);

    const index = await new PageIndexer(mockLogger).build(source);

    expect(index.get(5)?.fileId).toBe('a');
    expect(index.get(6)?.fileId).toBe('b');
    expect(mockLogger.debug).toHaveBeenCalledWith(
      '[PageIndexer] Duplicate marker for page 5 in b (first seen in a), ignoring',
    );
  });

  test('skips spine items missing from the manifest', async () => {
    const source = createMemorySource([
      { id: 'ghost', html: xhtml('<span id="page_1"/>'), unlisted: true },
      { id: 'real', html: xhtml('<span id="page_2"/>') },
    ]);

    const index = await new PageIndexer(mockLogger).build(source);

    expect([...index.keys()]).toEqual([2]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[PageIndexer] Spine item ghost is not in the manifest, skipping',
    );
  });

  test('logs unreadable files and continues the scan', async () => {
    const source = createMemorySource([
      { id: 'broken' },
      { id: 'ok', html: xhtml('<span id="page_9"/>') },
    ]);

    const index = await new PageIndexer(mockLogger).build(source);

    expect([...index.keys()]).toEqual([9]);
    expect(mockLogger.error).toHaveBeenCalledWith(
      '[PageIndexer] Error scanning OEBPS/broken.xhtml:',
      expect.any(Error),
    );
  });

  test('logs progress every 10 files', async () => {
    const files = Array.from({ length: 21 }, (_, i) => ({
      id: `f${i}`,
      html: xhtml(`<span id="page_${i + 1}"/>`),
    }));

    await new PageIndexer(mockLogger).build(createMemorySource(files));

    const progress = vi
      .mocked(mockLogger.info)
      .mock.calls.map(([message]) => message)
      .filter(
        (message) =>
          typeof message === 'string' && message.includes('Scanning file'),
      );
    expect(progress).toEqual([
      '[PageIndexer] Scanning file 1/21',
      '[PageIndexer] Scanning file 11/21',
      '[PageIndexer] Scanning file 21/21',
    ]);
    expect(mockLogger.info).toHaveBeenLastCalledWith(
      '[PageIndexer] Page index built: 21 pages',
    );
  });

  test('accepts a custom marker pattern, ignoring global flags', async () => {
    const source = createMemorySource([
      { id: 'a', html: xhtml('<a id="pg12"/><a id="pg13"/><a id="page_1"/>') },
    ]);

    const index = await new PageIndexer(mockLogger, {
      pageMarkerPattern: /^pg(\d+)$/g,
    }).build(source);

    expect([...index.keys()]).toEqual([12, 13]);
  });
});
