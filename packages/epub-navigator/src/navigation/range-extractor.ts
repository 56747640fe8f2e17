import type { LoggerMethods } from '@codetable/logger';
import type { PageIndex } from '@codetable/model';

import type { EpubSource, TextRangeResult } from '../types';

import { PageNotFoundError } from '../errors';
import { hasTextBeforeAnchor, toPlainText } from '../html/content-html';

/**
 * RangeExtractor returns the plain text of the files covering a page range
 *
 * Extraction is file-granular: the whole first and last files are included,
 * even content outside the requested pages. The range ends at the file
 * holding page `endPage + 1`; that file is included unless the next page's
 * marker opens it. When `endPage + 1` is not indexed, extraction runs to the
 * end of the spine.
 */
export class RangeExtractor {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly source: EpubSource,
    private readonly pageIndex: PageIndex,
  ) {}

  async getText(startPage: number, endPage: number): Promise<TextRangeResult> {
    const start = this.pageIndex.get(startPage);
    if (!start) {
      return { ok: false, error: new PageNotFoundError(startPage) };
    }

    const { spine, manifest } = this.source;
    const startPosition = spine.findIndex((entry) => entry.id === start.fileId);
    if (startPosition < 0) {
      this.logger.warn(
        `[RangeExtractor] Page ${startPage} points at ${start.fileId}, which is not in the spine`,
      );
      return { ok: false, error: new PageNotFoundError(startPage) };
    }

    const stop = this.pageIndex.get(endPage + 1);

    const texts: string[] = [];
    const fileIds: string[] = [];

    for (const entry of spine.slice(startPosition)) {
      const filePath = manifest[entry.id];
      if (!filePath) {
        this.logger.warn(
          `[RangeExtractor] Spine item ${entry.id} is not in the manifest, skipping`,
        );
        continue;
      }

      let html: string | undefined;
      try {
        html = await this.source.readText(filePath);
      } catch (error) {
        this.logger.error(`[RangeExtractor] Error reading ${filePath}:`, error);
      }

      const isStopFile = stop !== undefined && entry.id === stop.fileId;
      if (
        isStopFile &&
        entry.id !== start.fileId &&
        html !== undefined &&
        !hasTextBeforeAnchor(html, stop.anchor)
      ) {
        break;
      }

      fileIds.push(entry.id);
      if (html !== undefined) {
        texts.push(toPlainText(html));
      }

      if (isStopFile) {
        break;
      }
    }

    return { ok: true, text: texts.join('\n'), fileIds };
  }
}
