/**
 * Heading levels tracked while reading a code table, outermost first
 */
export const HIERARCHY_LEVELS = [
  'section',
  'subsection',
  'subheading',
  'topic',
] as const;

export type HierarchyLevel = (typeof HIERARCHY_LEVELS)[number];

/**
 * Heading active at each level as of a given page
 *
 * A level that has no preceding heading is left absent.
 */
export type HierarchyContext = Partial<Record<HierarchyLevel, string>>;
