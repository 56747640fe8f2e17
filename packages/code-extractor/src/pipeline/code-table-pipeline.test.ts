import type { DocumentNavigator } from '@codetable/epub-navigator';
import type { LoggerMethods } from '@codetable/logger';
import type { ChunkOutcome, HierarchyContext } from '@codetable/model';
import type { LanguageModel } from 'ai';

import type { PipelineState } from './pipeline-state';

import { PageNotFoundError } from '@codetable/epub-navigator';
import { LLMCaller } from '@codetable/shared';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { ChunkPlanError } from '../errors';
import { CodeTablePipeline } from './code-table-pipeline';

vi.mock('@codetable/shared', async (importOriginal) => {
  const original = await importOriginal<typeof import('@codetable/shared')>();
  return {
    ...original,
    LLMCaller: {
      callText: vi.fn(),
    },
  };
});

const PAGE_TEXT: Record<number, string> = {
  1: '29800 Arthroscopy, temporomandibular joint; diagnostic',
  2: '29804 ; surgical',
  3: '29805 Arthroscopy, shoulder, diagnostic',
  4: '29806 ; capsulorrhaphy',
};

function createNavigator(
  hierarchy: HierarchyContext = { section: 'Surgery' },
): DocumentNavigator {
  return {
    getText: vi.fn(async (startPage: number, endPage: number) => {
      if (!(startPage in PAGE_TEXT)) {
        return { ok: false as const, error: new PageNotFoundError(startPage) };
      }
      const lines: string[] = [];
      for (let page = startPage; page <= endPage; page++) {
        if (page in PAGE_TEXT) {
          lines.push(PAGE_TEXT[page]);
        }
      }
      return { ok: true as const, text: lines.join('\n'), fileIds: ['ch1'] };
    }),
    getHierarchyContext: vi.fn(async () => ({ ...hierarchy })),
    getChapterBoundaries: vi.fn(() => [
      { fileId: 'ch1', startPage: 1, endPage: 3 },
      { fileId: 'ch2', startPage: 4, endPage: 4 },
    ]),
  };
}

function respond(text: string) {
  return {
    text,
    usage: {
      component: 'CodeTableExtractor',
      phase: 'test',
      model: 'primary' as const,
      modelName: 'gemini-2.5-pro',
      inputTokens: 1000,
      outputTokens: 200,
      totalTokens: 1200,
    },
    usedFallback: false,
  };
}

function userPromptOfCall(index: number): string {
  return vi.mocked(LLMCaller.callText).mock.calls[index][0].userPrompt;
}

describe('CodeTablePipeline', () => {
  let mockLogger: LoggerMethods;
  let mockModel: LanguageModel;
  let outputDir: string;

  beforeEach(async () => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    mockModel = { modelId: 'gemini-2.5-pro' } as unknown as LanguageModel;
    outputDir = await mkdtemp(join(tmpdir(), 'code-table-pipeline-'));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  test('extracts every chunk and writes chunk and combined artifacts', async () => {
    vi.mocked(LLMCaller.callText)
      .mockResolvedValueOnce(
        respond(
          [
            '```json',
            '{"code": "29800", "code_description": "Arthroscopy, temporomandibular joint, diagnostic"}',
            '{"code": "29804", "code_description": "Arthroscopy, temporomandibular joint, surgical"}',
            '```',
          ].join('\n'),
        ),
      )
      .mockResolvedValueOnce(
        respond(
          '{"code": "29805", "code_description": "Arthroscopy, shoulder, diagnostic"}',
        ),
      );
    const navigator = createNavigator();
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 2,
    });

    const result = await pipeline.run(navigator, 1, 4);

    expect(result.aborted).toBe(false);
    expect(result.records.map((record) => record.code)).toEqual([
      '29800',
      '29804',
      '29805',
    ]);
    expect(result.records[0]).toEqual({
      code: '29800',
      code_description: 'Arthroscopy, temporomandibular joint, diagnostic',
      code_type: 'CPT',
      code_version: 'CPT 2024',
    });
    expect(
      result.chunks.map(({ chunk, status, recordCount, artifactPath }) => ({
        chunk,
        status,
        recordCount,
        artifactPath,
      })),
    ).toEqual([
      {
        chunk: { startPage: 1, endPage: 2 },
        status: 'parsed',
        recordCount: 2,
        artifactPath: join(outputDir, 'cpt_1_2_chunk.jsonl'),
      },
      {
        chunk: { startPage: 3, endPage: 4 },
        status: 'parsed',
        recordCount: 1,
        artifactPath: join(outputDir, 'cpt_3_4_chunk.jsonl'),
      },
    ]);

    const chunkLines = (
      await readFile(join(outputDir, 'cpt_1_2_chunk.jsonl'), 'utf-8')
    )
      .trim()
      .split('\n');
    expect(chunkLines).toHaveLength(2);
    expect(JSON.parse(chunkLines[1])).toEqual({
      code: '29804',
      code_description: 'Arthroscopy, temporomandibular joint, surgical',
      code_type: 'CPT',
      code_version: 'CPT 2024',
    });

    expect(result.combinedOutputPath).toBe(
      join(outputDir, 'cpt_all_1_4.jsonl'),
    );
    const combined = await readFile(join(outputDir, 'cpt_all_1_4.jsonl'), 'utf-8');
    expect(combined.trim().split('\n')).toHaveLength(3);

    expect(result.tokenUsage.total.totalTokens).toBe(2400);
    expect(result.chunks[0].usage?.modelName).toBe('gemini-2.5-pro');
    expect(result.chunks[0].estimatedCost).toBeCloseTo(0.00325, 10);
  });

  test('carries the last record of a chunk into the next prompt', async () => {
    vi.mocked(LLMCaller.callText)
      .mockResolvedValueOnce(
        respond('{"code": "29800", "code_description": "Arthroscopy"}'),
      )
      .mockResolvedValueOnce(
        respond('{"code": "29805", "code_description": "Shoulder"}'),
      );
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 2,
    });

    await pipeline.run(createNavigator(), 1, 4);

    expect(userPromptOfCall(0)).not.toContain('## Previous Code Context');
    expect(userPromptOfCall(1)).toContain('  "code": "29800",');
    expect(userPromptOfCall(1)).toContain('  "code_type": "CPT",');
  });

  test('keeps going after an unparseable chunk without moving the last record', async () => {
    vi.mocked(LLMCaller.callText)
      .mockResolvedValueOnce(
        respond('{"code": "29800", "code_description": "Arthroscopy"}'),
      )
      .mockResolvedValueOnce(respond('```\nI could not find any codes.\n```'))
      .mockResolvedValueOnce(
        respond('{"code": "29806", "code_description": "Capsulorrhaphy"}'),
      );
    const states: (string | undefined)[] = [];
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 1,
      onChunkComplete: (_outcome: ChunkOutcome, state: PipelineState) => {
        states.push(state.lastRecord?.code);
      },
    });

    const result = await pipeline.run(createNavigator(), 1, 3);

    expect(result.chunks.map((outcome) => outcome.status)).toEqual([
      'parsed',
      'parse-failed',
      'parsed',
    ]);
    expect(result.chunks[1].artifactPath).toBe(
      join(outputDir, 'cpt_2_2_raw_error.txt'),
    );
    expect(
      await readFile(join(outputDir, 'cpt_2_2_raw_error.txt'), 'utf-8'),
    ).toBe('I could not find any codes.');
    expect(states).toEqual(['29800', '29800', '29806']);
    expect(userPromptOfCall(2)).toContain('  "code": "29800",');
    expect(result.records.map((record) => record.code)).toEqual([
      '29800',
      '29806',
    ]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[CodeTablePipeline] Pages 2-2: no records could be parsed',
    );
  });

  test('treats a failed generation call as an unparseable chunk', async () => {
    vi.mocked(LLMCaller.callText).mockRejectedValueOnce(
      new Error('service unavailable'),
    );
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 4,
    });

    const result = await pipeline.run(createNavigator(), 1, 4);

    expect(result.chunks).toHaveLength(1);
    expect(result.chunks[0]).toMatchObject({
      status: 'parse-failed',
      recordCount: 0,
      estimatedCost: 0,
    });
    expect(result.chunks[0].usage).toBeUndefined();
    expect(
      await readFile(join(outputDir, 'cpt_1_4_raw_error.txt'), 'utf-8'),
    ).toBe('');
    expect(result.tokenUsage.total.totalTokens).toBe(0);
  });

  test('sends the error text when the start page is not indexed', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValueOnce(respond(''));
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 2,
    });

    const result = await pipeline.run(createNavigator(), 7, 8);

    expect(userPromptOfCall(0).endsWith('Error: Start page 7 not found.')).toBe(
      true,
    );
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[CodeTablePipeline] Error: Start page 7 not found. Sending the error text for pages 7-8',
    );
    expect(result.chunks[0].status).toBe('parse-failed');
  });

  test('stops before the next chunk once aborted', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValue(
      respond('{"code": "29800", "code_description": "Arthroscopy"}'),
    );
    const controller = new AbortController();
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 1,
      abortSignal: controller.signal,
      onChunkComplete: () => controller.abort(),
    });

    const result = await pipeline.run(createNavigator(), 1, 4);

    expect(result.aborted).toBe(true);
    expect(result.chunks).toHaveLength(1);
    expect(LLMCaller.callText).toHaveBeenCalledTimes(1);
    expect(result.combinedOutputPath).toBe(
      join(outputDir, 'cpt_all_1_1.jsonl'),
    );
    expect(existsSync(join(outputDir, 'cpt_all_1_1.jsonl'))).toBe(true);
  });

  test('leaves out a chunk whose call was cancelled', async () => {
    const controller = new AbortController();
    vi.mocked(LLMCaller.callText)
      .mockResolvedValueOnce(
        respond('{"code": "29800", "code_description": "Arthroscopy"}'),
      )
      .mockImplementationOnce(async () => {
        controller.abort();
        throw new Error('This operation was aborted');
      });
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 1,
      abortSignal: controller.signal,
    });

    const result = await pipeline.run(createNavigator(), 1, 4);

    expect(result.aborted).toBe(true);
    expect(result.chunks.map((outcome) => outcome.chunk)).toEqual([
      { startPage: 1, endPage: 1 },
    ]);
    expect(LLMCaller.callText).toHaveBeenCalledTimes(2);
    expect(existsSync(join(outputDir, 'cpt_2_2_raw_error.txt'))).toBe(false);
    expect(result.combinedOutputPath).toBe(
      join(outputDir, 'cpt_all_1_1.jsonl'),
    );
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[CodeTablePipeline] Aborted during pages 2-2 (1/4 chunks done)',
    );
    expect(mockLogger.error).not.toHaveBeenCalled();
  });

  test('plans chapter chunks from the navigator boundaries', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValue(
      respond('{"code": "1", "code_description": "one"}'),
    );
    const navigator = createNavigator();
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkingMode: 'chapter',
    });

    const result = await pipeline.run(navigator, 2, 4);

    expect(result.chunks.map((outcome) => outcome.chunk)).toEqual([
      { startPage: 1, endPage: 3 },
      { startPage: 4, endPage: 4 },
    ]);
    expect(navigator.getText).toHaveBeenCalledWith(1, 3);
  });

  test('skips hierarchy lookups when disabled', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValue(respond(''));
    const navigator = createNavigator();
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 4,
      useHierarchy: false,
    });

    const result = await pipeline.run(navigator, 1, 4);

    expect(navigator.getHierarchyContext).not.toHaveBeenCalled();
    expect(result.chunks[0].hierarchy).toEqual({});
    expect(userPromptOfCall(0)).toContain('- Current Section: Unknown');
  });

  test('records the resolved hierarchy on the outcome', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValue(respond(''));
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 4,
    });

    const result = await pipeline.run(
      createNavigator({ section: 'Surgery', subsection: 'Musculoskeletal' }),
      1,
      4,
    );

    expect(result.chunks[0].hierarchy).toEqual({
      section: 'Surgery',
      subsection: 'Musculoskeletal',
    });
    expect(userPromptOfCall(0)).toContain(
      '- Current Subsection: Musculoskeletal',
    );
  });

  test('honors combined output options', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValue(
      respond('{"code": "1", "code_description": "one"}'),
    );

    const skipped = await new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 4,
      skipCombinedOutput: true,
    }).run(createNavigator(), 1, 4);
    expect(skipped.combinedOutputPath).toBeUndefined();
    expect(existsSync(join(outputDir, 'cpt_all_1_4.jsonl'))).toBe(false);

    const named = await new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 4,
      outputPrefix: 'surgery',
      combinedFileName: 'surgery_codes.jsonl',
    }).run(createNavigator(), 1, 4);
    expect(named.combinedOutputPath).toBe(
      join(outputDir, 'surgery_codes.jsonl'),
    );
    expect(named.chunks[0].artifactPath).toBe(
      join(outputDir, 'surgery_1_4_chunk.jsonl'),
    );
  });

  test('resumes from an injected state', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValue(respond(''));
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 4,
    });

    await pipeline.run(createNavigator(), 1, 4, {
      lastRecord: { code: '29799', code_description: 'Unlisted procedure' },
    });

    expect(userPromptOfCall(0)).toContain('  "code": "29799",');
  });

  test('does not stamp tags in simple schema mode', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValue(
      respond('{"code": "1", "code_description": "one"}'),
    );
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 4,
      simpleSchema: true,
    });

    const result = await pipeline.run(createNavigator(), 1, 4);

    expect(result.records).toEqual([{ code: '1', code_description: 'one' }]);
  });

  test('reports cumulative usage after each chunk', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValue(respond(''));
    const totals: number[] = [];
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
      chunkSize: 2,
      onTokenUsage: (report) => totals.push(report.total.totalTokens),
    });

    await pipeline.run(createNavigator(), 1, 4);

    expect(totals).toEqual([1200, 2400]);
  });

  test('rejects invalid ranges before calling the model', async () => {
    const pipeline = new CodeTablePipeline({
      logger: mockLogger,
      model: mockModel,
      outputDir,
    });

    await expect(pipeline.run(createNavigator(), 5, 2)).rejects.toThrow(
      ChunkPlanError,
    );
    expect(LLMCaller.callText).not.toHaveBeenCalled();
  });
});
