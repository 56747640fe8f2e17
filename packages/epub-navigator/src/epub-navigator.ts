import type { LoggerMethods } from '@codetable/logger';
import type {
  ChapterBoundary,
  HierarchyContext,
  Manifest,
  PageIndex,
  SpineEntry,
} from '@codetable/model';

import type {
  CacheValidation,
  DocumentNavigator,
  EpubSource,
  HierarchyStrictness,
  TextRangeResult,
} from './types';

import { EpubArchive } from './archive/epub-archive';
import { PageIndexCache } from './indexer/page-index-cache';
import { PageIndexer } from './indexer/page-indexer';
import { detectChapterBoundaries } from './navigation/chapter-boundaries';
import { HierarchyResolver } from './navigation/hierarchy-resolver';
import { RangeExtractor } from './navigation/range-extractor';

/**
 * Options for building a navigator over an already opened source
 */
export interface EpubNavigatorSourceOptions {
  logger: LoggerMethods;

  /**
   * Element id pattern of page markers; first capture group is the page number
   *
   * @default /^page_(\d+)$/
   */
  pageMarkerPattern?: RegExp;

  /**
   * @default 'file'
   */
  hierarchyStrictness?: HierarchyStrictness;
}

/**
 * Options for opening an EPUB file
 */
export interface EpubNavigatorOptions extends EpubNavigatorSourceOptions {
  /**
   * Read and write the `<epub>.pagemap.json` cache
   *
   * @default true
   */
  cache?: boolean;

  /**
   * @default 'presence'
   */
  cacheValidation?: CacheValidation;
}

/**
 * EpubNavigator answers page-addressed questions about a paginated EPUB
 *
 * Opening builds (or loads) the page index once; the index is read-only
 * afterwards.
 *
 * @example
 * ```typescript
 * const navigator = await EpubNavigator.open('book.epub', { logger });
 * const range = await navigator.getText(64, 65);
 * if (range.ok) {
 *   console.log(range.text);
 * }
 * navigator.close();
 * ```
 */
export class EpubNavigator implements DocumentNavigator {
  private readonly rangeExtractor: RangeExtractor;
  private readonly hierarchyResolver: HierarchyResolver;
  private boundaries?: ChapterBoundary[];

  private constructor(
    private readonly source: EpubSource,
    readonly pageIndex: PageIndex,
    logger: LoggerMethods,
    hierarchyStrictness: HierarchyStrictness,
  ) {
    this.rangeExtractor = new RangeExtractor(logger, source, pageIndex);
    this.hierarchyResolver = new HierarchyResolver(
      logger,
      source,
      pageIndex,
      hierarchyStrictness,
    );
  }

  /**
   * Open an EPUB file and build or load its page index
   *
   * @throws ArchiveOpenError when the archive or its package document is unusable
   */
  static async open(
    epubPath: string,
    options: EpubNavigatorOptions,
  ): Promise<EpubNavigator> {
    const { logger, cache = true, cacheValidation } = options;
    const archive = await EpubArchive.open(logger, epubPath);

    try {
      const pageCache = cache
        ? new PageIndexCache(logger, epubPath, { validation: cacheValidation })
        : undefined;

      let pageIndex = await pageCache?.load();
      if (!pageIndex) {
        pageIndex = await new PageIndexer(logger, {
          pageMarkerPattern: options.pageMarkerPattern,
        }).build(archive);
        await pageCache?.save(pageIndex);
      }

      return new EpubNavigator(
        archive,
        pageIndex,
        logger,
        options.hierarchyStrictness ?? 'file',
      );
    } catch (error) {
      archive.close();
      throw error;
    }
  }

  /**
   * Build a navigator over an already opened source (no caching)
   */
  static async fromSource(
    source: EpubSource,
    options: EpubNavigatorSourceOptions,
  ): Promise<EpubNavigator> {
    const pageIndex = await new PageIndexer(options.logger, {
      pageMarkerPattern: options.pageMarkerPattern,
    }).build(source);

    return new EpubNavigator(
      source,
      pageIndex,
      options.logger,
      options.hierarchyStrictness ?? 'file',
    );
  }

  get spine(): readonly SpineEntry[] {
    return this.source.spine;
  }

  get manifest(): Manifest {
    return this.source.manifest;
  }

  getText(startPage: number, endPage: number): Promise<TextRangeResult> {
    return this.rangeExtractor.getText(startPage, endPage);
  }

  getHierarchyContext(pageNumber: number): Promise<HierarchyContext> {
    return this.hierarchyResolver.resolve(pageNumber);
  }

  getChapterBoundaries(): ChapterBoundary[] {
    if (!this.boundaries) {
      this.boundaries = detectChapterBoundaries(this.spine, this.pageIndex);
    }
    return this.boundaries.map((boundary) => ({ ...boundary }));
  }

  close(): void {
    this.source.close();
  }
}
