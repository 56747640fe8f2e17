import type {
  ChapterBoundary,
  HierarchyContext,
  Manifest,
  SpineEntry,
} from '@codetable/model';

import type { PageNotFoundError } from './errors';

/**
 * Readable set of content files in reading order
 *
 * Implemented by the zip-backed `EpubArchive`; tests use in-memory sources.
 */
export interface EpubSource {
  /**
   * Content files in reading order
   */
  readonly spine: readonly SpineEntry[];

  /**
   * Manifest id → full archive path
   */
  readonly manifest: Manifest;

  /**
   * Read a content file as UTF-8 text
   *
   * @throws Error when the path does not exist in the source
   */
  readText(filePath: string): Promise<string>;

  /**
   * Release underlying resources (file handles)
   */
  close(): void;
}

/**
 * Result of a page range text request
 *
 * A missing start page is reported as a failed result, never thrown.
 */
export type TextRangeResult =
  | {
      ok: true;
      /**
       * Plain text of every file in the range, newline-joined
       */
      text: string;
      /**
       * Spine ids of the files the range covered, in reading order
       */
      fileIds: string[];
    }
  | { ok: false; error: PageNotFoundError };

/**
 * How closely the hierarchy resolver follows the page position
 *
 * - `file`: last heading of each level anywhere in the page's file
 * - `anchor`: in the page's own file, only headings before the page marker
 */
export type HierarchyStrictness = 'file' | 'anchor';

/**
 * How a persisted page index is trusted
 *
 * - `presence`: any readable cache file is used
 * - `fingerprint`: the cache is used only while the EPUB's size and
 *   modification time match the ones recorded beside it
 */
export type CacheValidation = 'presence' | 'fingerprint';

/**
 * Page-addressed view over a document, as consumed by the extraction pipeline
 */
export interface DocumentNavigator {
  getText(startPage: number, endPage: number): Promise<TextRangeResult>;
  getHierarchyContext(pageNumber: number): Promise<HierarchyContext>;
  getChapterBoundaries(): ChapterBoundary[];
}
