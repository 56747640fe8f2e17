import type { LoggerMethods } from '@codetable/logger';
import type { CodeRecord, ExtractionChunk } from '@codetable/model';

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Serialize records as NDJSON, one record per line
 */
export function toJsonLines(records: readonly CodeRecord[]): string {
  return records.map((record) => `${JSON.stringify(record)}\n`).join('');
}

/**
 * ArtifactWriter
 *
 * Persists per-chunk results next to each other in one output directory:
 *
 * - `<prefix>_<start>_<end>_chunk.jsonl` parsed records of a chunk
 * - `<prefix>_<start>_<end>_raw_error.txt` cleaned response of a chunk that failed to parse
 * - `<prefix>_all_<firstStart>_<lastEnd>.jsonl` all records of a run
 *
 * Write failures propagate to the caller.
 */
export class ArtifactWriter {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly outputDir: string,
    private readonly prefix: string,
  ) {}

  chunkArtifactPath(chunk: ExtractionChunk): string {
    return join(
      this.outputDir,
      `${this.prefix}_${chunk.startPage}_${chunk.endPage}_chunk.jsonl`,
    );
  }

  rawErrorPath(chunk: ExtractionChunk): string {
    return join(
      this.outputDir,
      `${this.prefix}_${chunk.startPage}_${chunk.endPage}_raw_error.txt`,
    );
  }

  /**
   * @param range - First start page and last end page covered by the run
   */
  combinedPath(range: ExtractionChunk, combinedFileName?: string): string {
    if (combinedFileName) {
      return join(this.outputDir, combinedFileName);
    }
    return join(
      this.outputDir,
      `${this.prefix}_all_${range.startPage}_${range.endPage}.jsonl`,
    );
  }

  async writeChunk(
    chunk: ExtractionChunk,
    records: readonly CodeRecord[],
  ): Promise<string> {
    const filePath = this.chunkArtifactPath(chunk);
    await this.write(filePath, toJsonLines(records));
    this.logger.info(
      `[ArtifactWriter] Saved ${records.length} records to ${filePath}`,
    );
    return filePath;
  }

  async writeRawError(chunk: ExtractionChunk, text: string): Promise<string> {
    const filePath = this.rawErrorPath(chunk);
    await this.write(filePath, text);
    this.logger.warn(`[ArtifactWriter] Saved raw response to ${filePath}`);
    return filePath;
  }

  async writeCombined(
    records: readonly CodeRecord[],
    range: ExtractionChunk,
    combinedFileName?: string,
  ): Promise<string> {
    const filePath = this.combinedPath(range, combinedFileName);
    await this.write(filePath, toJsonLines(records));
    this.logger.info(
      `[ArtifactWriter] Saved ${records.length} records in total to ${filePath}`,
    );
    return filePath;
  }

  private async write(filePath: string, content: string): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
    await writeFile(filePath, content, 'utf-8');
  }
}
