import type {
  ChapterBoundary,
  PageIndex,
  SpineEntry,
} from '@codetable/model';

import { groupBy } from 'es-toolkit';

/**
 * Page range owned by each spine file, in spine order
 *
 * Files without indexed pages are omitted, so every indexed page belongs to
 * exactly one boundary.
 */
export function detectChapterBoundaries(
  spine: readonly SpineEntry[],
  pageIndex: PageIndex,
): ChapterBoundary[] {
  const pagesByFile = groupBy(
    [...pageIndex].map(([page, location]) => ({
      page,
      fileId: location.fileId,
    })),
    (item) => item.fileId,
  );

  const boundaries: ChapterBoundary[] = [];
  for (const entry of spine) {
    const pages = pagesByFile[entry.id]?.map((item) => item.page);
    if (!pages || pages.length === 0) {
      continue;
    }

    boundaries.push({
      fileId: entry.id,
      startPage: Math.min(...pages),
      endPage: Math.max(...pages),
    });
  }

  return boundaries;
}
