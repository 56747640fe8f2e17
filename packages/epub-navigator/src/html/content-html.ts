import type { HierarchyContext, HierarchyLevel } from '@codetable/model';
import type { CheerioAPI } from 'cheerio';

import { HIERARCHY_LEVELS } from '@codetable/model';
import * as cheerio from 'cheerio';

/**
 * Elements that end a line of plain text
 */
const BLOCK_ELEMENTS = [
  'address',
  'article',
  'aside',
  'blockquote',
  'caption',
  'dd',
  'div',
  'dl',
  'dt',
  'figcaption',
  'figure',
  'footer',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'hr',
  'li',
  'ol',
  'p',
  'pre',
  'section',
  'table',
  'td',
  'th',
  'tr',
  'ul',
].join(', ');

/**
 * Heading tag carrying each hierarchy level
 */
export const HEADING_TAGS: Readonly<Record<HierarchyLevel, string>> = {
  section: 'h1',
  subsection: 'h2',
  subheading: 'h3',
  topic: 'h4',
};

const LEVEL_BY_TAG = new Map<string, HierarchyLevel>(
  HIERARCHY_LEVELS.map((level) => [HEADING_TAGS[level], level]),
);

const BOUNDARY_MARKER = '[[PAGE-BOUNDARY]]';

/**
 * Page marker found in a content file
 */
export interface PageMarker {
  pageNumber: number;
  anchor: string;
}

/**
 * Parse a content document leniently
 *
 * HTML rules apply (void elements such as `<br>`, named entities) while
 * self-closing tags still close, so `<span id="page_1"/>` stays empty.
 */
function loadContent(html: string): CheerioAPI {
  return cheerio.load(html, {
    xml: { xmlMode: false, recognizeSelfClosing: true, decodeEntities: true },
  });
}

function normalizeLines(text: string): string {
  return text
    .split('\n')
    .map((line) => line.replace(/\u00a0/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function renderText($: CheerioAPI): string {
  $('script, style').remove();
  $('br').replaceWith('\n');
  $(BLOCK_ELEMENTS).after('\n');

  const body = $('body');
  return normalizeLines(body.length > 0 ? body.text() : $.root().text());
}

/**
 * Convert a content document to plain text
 *
 * Block-level elements end a line; lines are trimmed and blank lines dropped.
 * Script and style content is excluded.
 */
export function toPlainText(html: string): string {
  return renderText(loadContent(html));
}

/**
 * Whether any text precedes the element with the given id
 *
 * Returns true when no such element exists, so callers keep the file.
 */
export function hasTextBeforeAnchor(html: string, anchor: string): boolean {
  const $ = loadContent(html);
  const marker = $('[id]')
    .filter((_, element) => $(element).attr('id') === anchor)
    .first();

  if (marker.length === 0) {
    return true;
  }

  marker.before(BOUNDARY_MARKER);
  const text = renderText($);
  const [leadIn] = text.split(BOUNDARY_MARKER);

  return leadIn.trim().length > 0;
}

/**
 * Find every element whose id matches the page marker pattern
 *
 * The pattern's first capture group holds the page number. Markers are
 * returned in document order; ids that do not yield a positive integer are
 * ignored.
 */
export function findPageMarkers(html: string, pattern: RegExp): PageMarker[] {
  const $ = loadContent(html);
  const markers: PageMarker[] = [];

  $('[id]').each((_, element) => {
    const anchor = $(element).attr('id');
    if (!anchor) {
      return;
    }

    const match = pattern.exec(anchor);
    if (!match) {
      return;
    }

    const pageNumber = Number(match[1]);
    if (Number.isSafeInteger(pageNumber) && pageNumber > 0) {
      markers.push({ pageNumber, anchor });
    }
  });

  return markers;
}

/**
 * Last heading text for each requested level
 *
 * With `beforeAnchor`, only headings that start before the element carrying
 * that id are considered; a heading that contains the marker counts as
 * preceding it.
 */
export function findLastHeadings(
  html: string,
  levels: readonly HierarchyLevel[] = HIERARCHY_LEVELS,
  beforeAnchor?: string,
): HierarchyContext {
  const $ = loadContent(html);
  const wanted = new Set(levels);
  const context: HierarchyContext = {};

  $('h1, h2, h3, h4, [id]').each((_, element) => {
    const level = LEVEL_BY_TAG.get(element.tagName);
    if (level && wanted.has(level)) {
      const text = collapseWhitespace($(element).text());
      if (text) {
        context[level] = text;
      }
    }

    // stop at the marker
    return beforeAnchor === undefined || $(element).attr('id') !== beforeAnchor;
  });

  return context;
}
