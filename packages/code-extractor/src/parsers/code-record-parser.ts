import type { LoggerMethods } from '@codetable/logger';
import type { CodeRecord, ParseStrategy } from '@codetable/model';

import { z } from 'zod';

/**
 * Tagged result of parsing one generation response
 */
export type ParseOutcome =
  | {
      kind: 'records';
      records: CodeRecord[];
      strategy: ParseStrategy;
      skippedLines: number;
      /**
       * Valid JSON objects rejected for lacking a code or a description
       */
      droppedRecords: number;
    }
  | {
      kind: 'unparseable';
      /**
       * Fence-stripped, trimmed response text
       */
      cleanedText: string;
      skippedLines: number;
      droppedRecords: number;
    };

/**
 * Any JSON value as text: strings unchanged, everything else serialized
 */
const optionalText = z
  .unknown()
  .transform((value) =>
    value == null
      ? undefined
      : typeof value === 'string'
        ? value
        : JSON.stringify(value),
  );

const codeRecordSchema = z
  .object({
    code: z
      .union([z.string(), z.number()])
      .transform((value) => String(value).trim())
      .refine((value) => value.length > 0, 'code must not be empty'),
    code_description: optionalText,
    code_desc: optionalText,
    code_type: optionalText,
    code_version: optionalText,
    section: optionalText,
    section_text: optionalText,
    subsection: optionalText,
    subsection_text: optionalText,
    subheading: optionalText,
    subheading_text: optionalText,
    topic: optionalText,
    topic_text: optionalText,
  })
  .passthrough()
  .refine(
    (record) =>
      record.code_description !== undefined || record.code_desc !== undefined,
    'code_description or code_desc is required',
  );

interface RecordBatch {
  /**
   * Whether the text was valid JSON at all
   */
  parsed: boolean;
  records: CodeRecord[];
  dropped: number;
}

/**
 * Strip one leading ```json (or ```) fence and one trailing ``` fence
 */
export function cleanResponseText(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice('```json'.length);
  } else if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice('```'.length);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -'```'.length);
  }
  return cleaned.trim();
}

/**
 * CodeRecordParser
 *
 * Turns a generation response into code records. The response is expected
 * to hold one JSON object per line but may be fenced, truncated mid-line or
 * returned as a single JSON array instead.
 *
 * 1. A multi-line text that parses as one JSON value is a document: an
 *    array is used as-is, an object becomes a single record.
 * 2. Otherwise line by line: every line holding a valid record (or an array
 *    of them) contributes; other lines are skipped.
 *
 * Only `code` and a description are required. Other fields pass through,
 * with non-string values serialized as JSON; objects lacking the required
 * fields are dropped and counted.
 */
export class CodeRecordParser {
  constructor(private readonly logger: LoggerMethods) {}

  parse(responseText: string): ParseOutcome {
    const cleanedText = cleanResponseText(responseText);

    const lines = cleanedText
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    const lineRecords: CodeRecord[] = [];
    let skippedLines = 0;
    let lineDropped = 0;
    for (const line of lines) {
      const batch = this.toRecords(this.tryParseJson(line));
      lineDropped += batch.dropped;
      if (batch.records.length === 0) {
        skippedLines++;
        continue;
      }
      lineRecords.push(...batch.records);
    }

    if (skippedLines > 0) {
      this.logger.debug(
        `[CodeRecordParser] Skipped ${skippedLines} unparseable line(s)`,
      );
    }

    // a multi-line text that is one JSON value is a pretty-printed document
    const document =
      lines.length > 1
        ? this.toRecords(this.tryParseJson(cleanedText))
        : undefined;

    if (document && document.records.length > 0) {
      this.reportDropped(document.dropped);
      return {
        kind: 'records',
        records: document.records,
        strategy: 'document',
        skippedLines,
        droppedRecords: document.dropped,
      };
    }

    const droppedRecords = document?.parsed ? document.dropped : lineDropped;
    this.reportDropped(droppedRecords);

    if (lineRecords.length > 0) {
      return {
        kind: 'records',
        records: lineRecords,
        strategy: 'lines',
        skippedLines,
        droppedRecords,
      };
    }

    return { kind: 'unparseable', cleanedText, skippedLines, droppedRecords };
  }

  private reportDropped(count: number): void {
    if (count > 0) {
      this.logger.warn(
        `[CodeRecordParser] Dropped ${count} record(s) without a code or description`,
      );
    }
  }

  private tryParseJson(text: string): unknown {
    if (text.length === 0) {
      return undefined;
    }
    try {
      const value: unknown = JSON.parse(text);
      return value;
    } catch {
      return undefined;
    }
  }

  private toRecords(value: unknown): RecordBatch {
    if (value === undefined) {
      return { parsed: false, records: [], dropped: 0 };
    }
    const candidates: unknown[] = Array.isArray(value) ? value : [value];
    const records: CodeRecord[] = [];
    let dropped = 0;
    for (const candidate of candidates) {
      const result = codeRecordSchema.safeParse(candidate);
      if (result.success) {
        records.push(result.data);
      } else if (typeof candidate === 'object' && candidate !== null) {
        dropped++;
      }
    }
    return { parsed: true, records, dropped };
  }
}
