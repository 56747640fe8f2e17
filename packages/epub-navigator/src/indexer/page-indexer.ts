import type { LoggerMethods } from '@codetable/logger';
import type { PageIndex, PageLocation } from '@codetable/model';

import type { EpubSource } from '../types';

import { findPageMarkers } from '../html/content-html';

/**
 * Default page marker: elements such as `<span id="page_42"/>`
 */
export const DEFAULT_PAGE_MARKER_PATTERN = /^page_(\d+)$/;

const PROGRESS_INTERVAL = 10;

export interface PageIndexerOptions {
  /**
   * Element id pattern; the first capture group must hold the page number
   */
  pageMarkerPattern?: RegExp;
}

/**
 * PageIndexer scans every spine file once, in reading order, and maps each
 * page number to the first marker seen for it
 *
 * Later duplicates of a page number are ignored. Files that are missing from
 * the manifest or fail to read are skipped; the scan always completes.
 */
export class PageIndexer {
  private readonly pattern: RegExp;

  constructor(
    private readonly logger: LoggerMethods,
    options: PageIndexerOptions = {},
  ) {
    const pattern = options.pageMarkerPattern ?? DEFAULT_PAGE_MARKER_PATTERN;
    // exec() on a global or sticky pattern would carry lastIndex between ids
    this.pattern = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }

  async build(source: EpubSource): Promise<PageIndex> {
    const { spine, manifest } = source;
    const index = new Map<number, PageLocation>();

    this.logger.info(
      `[PageIndexer] Building page index (scanning ${spine.length} files)`,
    );

    for (const [position, entry] of spine.entries()) {
      if (position % PROGRESS_INTERVAL === 0) {
        this.logger.info(
          `[PageIndexer] Scanning file ${position + 1}/${spine.length}`,
        );
      }

      const filePath = manifest[entry.id];
      if (!filePath) {
        this.logger.warn(
          `[PageIndexer] Spine item ${entry.id} is not in the manifest, skipping`,
        );
        continue;
      }

      let html: string;
      try {
        html = await source.readText(filePath);
      } catch (error) {
        this.logger.error(`[PageIndexer] Error scanning ${filePath}:`, error);
        continue;
      }

      for (const marker of findPageMarkers(html, this.pattern)) {
        const existing = index.get(marker.pageNumber);
        if (existing) {
          this.logger.debug(
            `[PageIndexer] Duplicate marker for page ${marker.pageNumber} in ${entry.id} (first seen in ${existing.fileId}), ignoring`,
          );
          continue;
        }

        index.set(marker.pageNumber, {
          fileId: entry.id,
          filePath,
          anchor: marker.anchor,
        });
      }
    }

    this.logger.info(`[PageIndexer] Page index built: ${index.size} pages`);

    return index;
  }
}
