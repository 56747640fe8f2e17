/**
 * One extracted row of the code table
 *
 * Field names follow the NDJSON wire format produced by the generation
 * service, so records round-trip through artifacts unchanged.
 */
export interface CodeRecordFields {
  /**
   * Procedure code (e.g. "29804")
   */
  code: string;

  /**
   * Fully resolved description, with child continuations stitched to the parent
   */
  code_description?: string;

  /**
   * Short alias some responses use instead of `code_description`
   */
  code_desc?: string;

  code_type?: string;
  code_version?: string;

  section?: string;
  section_text?: string;
  subsection?: string;
  subsection_text?: string;
  subheading?: string;
  subheading_text?: string;
  topic?: string;
  topic_text?: string;
}

/**
 * Parsed record; keys the model adds beyond the known fields are preserved
 */
export type CodeRecord = Readonly<CodeRecordFields & Record<string, unknown>>;

/**
 * Fixed column order used when flattening records to a table
 */
export const CODE_RECORD_COLUMNS = [
  'code',
  'code_description',
  'code_type',
  'section',
  'section_text',
  'subsection',
  'subsection_text',
  'subheading',
  'subheading_text',
  'topic',
  'topic_text',
  'code_version',
] as const satisfies readonly (keyof CodeRecordFields)[];

export type CodeRecordColumn = (typeof CODE_RECORD_COLUMNS)[number];
