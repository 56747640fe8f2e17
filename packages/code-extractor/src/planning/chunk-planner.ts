import type { ChapterBoundary, ExtractionChunk } from '@codetable/model';

import { ChunkPlanError } from '../errors';

/**
 * Requested page range and how to cut it
 */
export type ChunkPlanRequest =
  | {
      mode: 'fixed';
      startPage: number;
      endPage: number;
      chunkSize: number;
    }
  | {
      mode: 'chapter';
      startPage: number;
      endPage: number;
      boundaries: readonly ChapterBoundary[];
    };

function assertPageRange(startPage: number, endPage: number): void {
  if (!Number.isInteger(startPage) || !Number.isInteger(endPage)) {
    throw new ChunkPlanError(
      `Page numbers must be integers (got ${startPage}-${endPage})`,
    );
  }
  if (startPage < 1) {
    throw new ChunkPlanError(`Start page must be at least 1 (got ${startPage})`);
  }
  if (endPage < startPage) {
    throw new ChunkPlanError(
      `End page ${endPage} is before start page ${startPage}`,
    );
  }
}

/**
 * Consecutive ranges of `chunkSize` pages, the last one clipped to `endPage`
 *
 * @throws ChunkPlanError on invalid arguments
 */
export function planFixedChunks(
  startPage: number,
  endPage: number,
  chunkSize: number,
): ExtractionChunk[] {
  assertPageRange(startPage, endPage);
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ChunkPlanError(
      `Chunk size must be a positive integer (got ${chunkSize})`,
    );
  }

  const chunks: ExtractionChunk[] = [];
  for (let page = startPage; page <= endPage; page += chunkSize) {
    chunks.push({
      startPage: page,
      endPage: Math.min(page + chunkSize - 1, endPage),
    });
  }
  return chunks;
}

/**
 * One chunk per chapter overlapping the range, in spine order
 *
 * Chunks keep the chapter's own page range; they are not clipped to the
 * request, so a chapter that starts before `startPage` is processed whole.
 *
 * @throws ChunkPlanError on invalid arguments
 */
export function planChapterChunks(
  startPage: number,
  endPage: number,
  boundaries: readonly ChapterBoundary[],
): ExtractionChunk[] {
  assertPageRange(startPage, endPage);

  return boundaries
    .filter(
      (boundary) =>
        Math.max(boundary.startPage, startPage) <=
        Math.min(boundary.endPage, endPage),
    )
    .map((boundary) => ({
      startPage: boundary.startPage,
      endPage: boundary.endPage,
    }));
}

/**
 * Cut a page range into ordered extraction chunks
 */
export function planChunks(request: ChunkPlanRequest): ExtractionChunk[] {
  if (request.mode === 'fixed') {
    return planFixedChunks(
      request.startPage,
      request.endPage,
      request.chunkSize,
    );
  }
  return planChapterChunks(
    request.startPage,
    request.endPage,
    request.boundaries,
  );
}
