import type { LoggerMethods } from '@codetable/logger';
import type {
  HierarchyContext,
  HierarchyLevel,
  PageIndex,
} from '@codetable/model';

import type { EpubSource, HierarchyStrictness } from '../types';

import { HIERARCHY_LEVELS } from '@codetable/model';

import { findLastHeadings } from '../html/content-html';

/**
 * HierarchyResolver finds the heading active at each level as of a page
 *
 * Walks the spine backward from the page's file (inclusive). In each file,
 * every still-unresolved level takes the last heading of its tag; the walk
 * stops once all four levels are resolved. With `anchor` strictness the
 * page's own file only contributes headings that precede its page marker.
 */
export class HierarchyResolver {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly source: EpubSource,
    private readonly pageIndex: PageIndex,
    private readonly strictness: HierarchyStrictness = 'file',
  ) {}

  async resolve(pageNumber: number): Promise<HierarchyContext> {
    const context: HierarchyContext = {};

    const location = this.pageIndex.get(pageNumber);
    if (!location) {
      return context;
    }

    const { spine, manifest } = this.source;
    const startPosition = spine.findIndex(
      (entry) => entry.id === location.fileId,
    );

    for (let position = startPosition; position >= 0; position--) {
      const unresolved = this.unresolvedLevels(context);
      if (unresolved.length === 0) {
        break;
      }

      const entry = spine[position];
      const filePath = manifest[entry.id];
      if (!filePath) {
        continue;
      }

      let html: string;
      try {
        html = await this.source.readText(filePath);
      } catch (error) {
        this.logger.debug(
          `[HierarchyResolver] Skipping unreadable ${filePath}:`,
          error,
        );
        continue;
      }

      const anchor =
        this.strictness === 'anchor' && position === startPosition
          ? location.anchor
          : undefined;
      Object.assign(context, findLastHeadings(html, unresolved, anchor));
    }

    return context;
  }

  private unresolvedLevels(context: HierarchyContext): HierarchyLevel[] {
    return HIERARCHY_LEVELS.filter((level) => context[level] === undefined);
  }
}
