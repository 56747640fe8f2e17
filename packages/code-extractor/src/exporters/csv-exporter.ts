import type { LoggerMethods } from '@codetable/logger';

import { CODE_RECORD_COLUMNS } from '@codetable/model';
import { existsSync } from 'node:fs';
import { readFile, readdir, stat, writeFile } from 'node:fs/promises';
import { extname, join } from 'node:path';

/**
 * Result of a CSV export
 */
export interface CsvExportResult {
  /**
   * Number of input files read
   */
  files: number;

  /**
   * Number of rows written
   */
  records: number;
}

type RecordObject = Record<string, unknown>;

function isRecordObject(value: unknown): value is RecordObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Quote a field when it holds a comma, quote or line break (RFC 4180)
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toCell(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Flatten one record to the fixed column order
 *
 * `code_desc` stands in for a missing `code_description`.
 */
export function toCsvRow(record: RecordObject): string {
  return CODE_RECORD_COLUMNS.map((column) => {
    const value =
      column === 'code_description'
        ? (record.code_description ?? record.code_desc)
        : record[column];
    return escapeCsvField(toCell(value));
  }).join(',');
}

/**
 * CsvExporter
 *
 * Flattens extraction artifacts into a single CSV table. Inputs may be files
 * or directories; a directory contributes its `*.jsonl` and `*.json` files
 * in name order.
 */
export class CsvExporter {
  constructor(private readonly logger: LoggerMethods) {}

  async export(
    inputPaths: readonly string[],
    outputPath: string,
  ): Promise<CsvExportResult> {
    const files = await this.collectFiles(inputPaths);
    if (files.length === 0) {
      this.logger.warn('[CsvExporter] No JSONL or JSON files found to export');
      return { files: 0, records: 0 };
    }
    this.logger.info(`[CsvExporter] Found ${files.length} file(s)`);

    const rows = [CODE_RECORD_COLUMNS.join(',')];
    for (const filePath of files) {
      const records = await this.readRecords(filePath);
      this.logger.info(
        `[CsvExporter] Added ${records.length} records from ${filePath}`,
      );
      rows.push(...records.map(toCsvRow));
    }

    await writeFile(outputPath, `${rows.join('\r\n')}\r\n`, 'utf-8');
    const recordCount = rows.length - 1;
    this.logger.info(
      `[CsvExporter] Wrote ${recordCount} records from ${files.length} file(s) to ${outputPath}`,
    );

    return { files: files.length, records: recordCount };
  }

  private async collectFiles(inputPaths: readonly string[]): Promise<string[]> {
    const files: string[] = [];
    for (const inputPath of inputPaths) {
      if (!existsSync(inputPath)) {
        this.logger.warn(
          `[CsvExporter] Input path ${inputPath} not found, skipping`,
        );
        continue;
      }

      if ((await stat(inputPath)).isDirectory()) {
        const names = (await readdir(inputPath))
          .filter((name) => ['.jsonl', '.json'].includes(extname(name)))
          .sort();
        files.push(...names.map((name) => join(inputPath, name)));
      } else {
        files.push(inputPath);
      }
    }
    return files;
  }

  private async readRecords(filePath: string): Promise<RecordObject[]> {
    const content = await readFile(filePath, 'utf-8');
    if (extname(filePath) === '.json') {
      return this.parseJsonDocument(filePath, content);
    }
    return this.parseJsonLines(filePath, content);
  }

  private parseJsonDocument(filePath: string, content: string): RecordObject[] {
    let value: unknown;
    try {
      value = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `[CsvExporter] Skipping invalid JSON file ${filePath}: ${message}`,
      );
      return [];
    }

    const candidates: unknown[] = Array.isArray(value) ? value : [value];
    return candidates.filter(isRecordObject);
  }

  private parseJsonLines(filePath: string, content: string): RecordObject[] {
    const records: RecordObject[] = [];
    content.split('\n').forEach((rawLine, index) => {
      const line = rawLine.trim();
      if (!line) {
        return;
      }

      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch {
        value = undefined;
      }
      if (isRecordObject(value)) {
        records.push(value);
      } else {
        this.logger.warn(
          `[CsvExporter] Skipping invalid JSON on line ${index + 1} of ${filePath}`,
        );
      }
    });
    return records;
  }
}
