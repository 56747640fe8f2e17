import type { LoggerMethods } from '@codetable/logger';
import type { PageIndex, PageLocation } from '@codetable/model';

import type { CacheValidation } from '../types';

import { existsSync } from 'node:fs';
import { readFile, stat, writeFile } from 'node:fs/promises';
import { z } from 'zod';

const pageLocationSchema = z.object({
  fileId: z.string().min(1),
  filePath: z.string().min(1),
  anchor: z.string().min(1),
});

/**
 * Cache file layout: string-encoded page numbers → locations
 */
const pageIndexFileSchema = z.record(
  z.string().regex(/^[1-9]\d*$/),
  pageLocationSchema,
);

/**
 * Source fingerprint stored beside the cache in `fingerprint` mode
 */
const cacheMetaSchema = z.object({
  size: z.number().int().nonnegative(),
  mtimeMs: z.number(),
});

type CacheMeta = z.infer<typeof cacheMetaSchema>;

export interface PageIndexCacheOptions {
  /**
   * @default 'presence'
   */
  validation?: CacheValidation;
}

/**
 * PageIndexCache persists a page index as `<epubPath>.pagemap.json`
 *
 * A cache that cannot be read or validated is reported as absent so the
 * caller rebuilds it. Write failures are logged and never thrown.
 */
export class PageIndexCache {
  readonly cachePath: string;
  readonly metaPath: string;
  private readonly validation: CacheValidation;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly epubPath: string,
    options: PageIndexCacheOptions = {},
  ) {
    this.cachePath = `${epubPath}.pagemap.json`;
    this.metaPath = `${epubPath}.pagemap.meta.json`;
    this.validation = options.validation ?? 'presence';
  }

  /**
   * Load the cached index, or undefined when it must be rebuilt
   */
  async load(): Promise<PageIndex | undefined> {
    if (!existsSync(this.cachePath)) {
      return undefined;
    }

    try {
      if (this.validation === 'fingerprint' && !(await this.isFresh())) {
        this.logger.info(
          `[PageIndexCache] Cache ${this.cachePath} is stale, rebuilding`,
        );
        return undefined;
      }

      const raw: unknown = JSON.parse(await readFile(this.cachePath, 'utf-8'));
      const parsed = pageIndexFileSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.warn(
          `[PageIndexCache] Invalid cache ${this.cachePath}, rebuilding: ${parsed.error.message}`,
        );
        return undefined;
      }

      const index = new Map<number, PageLocation>(
        Object.entries(parsed.data)
          .map(([page, location]): [number, PageLocation] => [
            Number(page),
            location,
          ])
          .sort(([a], [b]) => a - b),
      );

      this.logger.info(
        `[PageIndexCache] Loaded page index from cache: ${this.cachePath} (${index.size} pages)`,
      );
      return index;
    } catch (error) {
      this.logger.warn(
        `[PageIndexCache] Failed to load cache ${this.cachePath}, rebuilding:`,
        error,
      );
      return undefined;
    }
  }

  /**
   * Persist the index (and the source fingerprint in `fingerprint` mode)
   */
  async save(index: PageIndex): Promise<void> {
    const data: Record<string, PageLocation> = {};
    for (const [page, location] of [...index].sort(([a], [b]) => a - b)) {
      data[String(page)] = location;
    }

    try {
      await writeFile(this.cachePath, JSON.stringify(data), 'utf-8');
      if (this.validation === 'fingerprint') {
        await writeFile(
          this.metaPath,
          JSON.stringify(await this.fingerprint()),
          'utf-8',
        );
      }
      this.logger.info(
        `[PageIndexCache] Saved page index cache to ${this.cachePath}`,
      );
    } catch (error) {
      this.logger.warn(
        `[PageIndexCache] Could not save cache ${this.cachePath}:`,
        error,
      );
    }
  }

  private async fingerprint(): Promise<CacheMeta> {
    const stats = await stat(this.epubPath);
    return { size: stats.size, mtimeMs: stats.mtimeMs };
  }

  private async isFresh(): Promise<boolean> {
    if (!existsSync(this.metaPath)) {
      return false;
    }

    const stored = cacheMetaSchema.safeParse(
      JSON.parse(await readFile(this.metaPath, 'utf-8')),
    );
    if (!stored.success) {
      return false;
    }

    const current = await this.fingerprint();
    return (
      stored.data.size === current.size &&
      stored.data.mtimeMs === current.mtimeMs
    );
  }
}
