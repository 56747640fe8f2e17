/**
 * Structural types for a paginated EPUB document
 *
 * Describes the reading order (spine), the id → path mapping (manifest),
 * and the page-number index built from in-content page markers.
 */

/**
 * One entry of the spine
 *
 * Spine order defines document reading order and is never re-sorted.
 */
export interface SpineEntry {
  /**
   * Manifest item id (`idref` of the OPF `<itemref>`)
   */
  id: string;
}

/**
 * Mapping from manifest item id to the content file's full path in the archive
 *
 * OPF hrefs are resolved against the OPF directory when the archive is opened.
 */
export type Manifest = Readonly<Record<string, string>>;

/**
 * Location of a page marker inside the archive
 */
export interface PageLocation {
  /**
   * Spine/manifest id of the content file holding the marker
   */
  fileId: string;

  /**
   * Full path of the content file inside the archive
   */
  filePath: string;

  /**
   * Element id of the page marker (e.g. `page_42`)
   */
  anchor: string;
}

/**
 * Page number → location
 *
 * Page numbers are positive integers and need not be contiguous
 * (front matter often has none). Each page maps to exactly one location.
 */
export type PageIndex = ReadonlyMap<number, PageLocation>;

/**
 * Contiguous page range owned by one spine file
 */
export interface ChapterBoundary {
  fileId: string;
  startPage: number;
  endPage: number;
}
