export {
  EpubArchive,
  parseContainer,
  parsePackageDocument,
  resolveHref,
} from './archive/epub-archive';
export {
  EpubNavigator,
  type EpubNavigatorOptions,
  type EpubNavigatorSourceOptions,
} from './epub-navigator';
export { ArchiveOpenError, PageNotFoundError } from './errors';
export {
  HEADING_TAGS,
  findLastHeadings,
  findPageMarkers,
  hasTextBeforeAnchor,
  toPlainText,
  type PageMarker,
} from './html/content-html';
export {
  PageIndexCache,
  type PageIndexCacheOptions,
} from './indexer/page-index-cache';
export {
  DEFAULT_PAGE_MARKER_PATTERN,
  PageIndexer,
  type PageIndexerOptions,
} from './indexer/page-indexer';
export { detectChapterBoundaries } from './navigation/chapter-boundaries';
export { HierarchyResolver } from './navigation/hierarchy-resolver';
export { RangeExtractor } from './navigation/range-extractor';
export type {
  CacheValidation,
  DocumentNavigator,
  EpubSource,
  HierarchyStrictness,
  TextRangeResult,
} from './types';
