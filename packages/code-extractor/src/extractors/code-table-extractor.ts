import type { LoggerMethods } from '@codetable/logger';
import type {
  CodeRecord,
  ExtractionChunk,
  HierarchyContext,
} from '@codetable/model';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
} from '@codetable/shared';
import type { LanguageModel } from 'ai';

import { LLMCaller } from '@codetable/shared';

export const DEFAULT_MAX_INPUT_CHARS = 350_000;
export const DEFAULT_CODE_TYPE = 'CPT';
export const DEFAULT_CODE_VERSION = 'CPT 2024';
export const DEFAULT_EXTRACTION_TEMPERATURE = 0.1;

const COMPONENT_NAME = 'CodeTableExtractor';

/**
 * CodeTableExtractor options
 */
export interface CodeTableExtractorOptions {
  logger: LoggerMethods;

  model: LanguageModel;

  /**
   * Model tried once when the primary model fails
   */
  fallbackModel?: LanguageModel;

  /**
   * Receives the token usage of every completed call
   */
  usageAggregator?: LLMTokenUsageAggregator;

  /**
   * Retry count handed to the AI SDK for each model (default: 0)
   */
  maxRetries?: number;

  /**
   * @default 0.1
   */
  temperature?: number;

  /**
   * Cancels the running call; a cancelled chunk is reported as aborted
   */
  abortSignal?: AbortSignal;

  /**
   * Ask only for `code` and `code_description` (default: false)
   */
  simpleSchema?: boolean;

  /**
   * Value requested for `code_type` (default: 'CPT')
   */
  codeType?: string;

  /**
   * Value requested for `code_version` (default: 'CPT 2024')
   */
  codeVersion?: string;

  /**
   * Source text beyond this many characters is cut off (default: 350000)
   */
  maxInputChars?: number;

  /**
   * Consume the response as a stream (default: false)
   */
  stream?: boolean;

  onTextDelta?: (text: string) => void;

  onReasoningDelta?: (text: string) => void;
}

/**
 * Everything the prompt is built from for one chunk
 */
export interface ExtractionPromptInput {
  text: string;
  hierarchy: HierarchyContext;

  /**
   * Last record of the previous chunk, used as the parent of a leading child code
   */
  previousRecord?: CodeRecord;
}

/**
 * Raw generation result for one chunk
 */
export interface ChunkGeneration {
  /**
   * Response text; empty when the call failed or was cancelled
   */
  text: string;

  truncated: boolean;

  /**
   * Absent when the call failed
   */
  usage?: ExtendedTokenUsage;

  usedFallback: boolean;

  /**
   * The abort signal fired while the call was running
   */
  aborted: boolean;
}

/**
 * CodeTableExtractor
 *
 * Sends one chunk of code table text to the LLM and returns the raw response,
 * which is expected to hold one JSON object per line. Parsing is left to
 * CodeRecordParser so malformed output can still be preserved.
 *
 * A failed call is logged and reported as empty text; it never throws.
 */
export class CodeTableExtractor {
  private readonly logger: LoggerMethods;
  private readonly model: LanguageModel;
  private readonly fallbackModel?: LanguageModel;
  private readonly usageAggregator?: LLMTokenUsageAggregator;
  private readonly maxRetries: number;
  private readonly temperature: number;
  private readonly abortSignal?: AbortSignal;
  private readonly simpleSchema: boolean;
  private readonly codeType: string;
  private readonly codeVersion: string;
  private readonly maxInputChars: number;
  private readonly stream: boolean;
  private readonly onTextDelta?: (text: string) => void;
  private readonly onReasoningDelta?: (text: string) => void;

  constructor(options: CodeTableExtractorOptions) {
    this.logger = options.logger;
    this.model = options.model;
    this.fallbackModel = options.fallbackModel;
    this.usageAggregator = options.usageAggregator;
    this.maxRetries = options.maxRetries ?? 0;
    this.temperature = options.temperature ?? DEFAULT_EXTRACTION_TEMPERATURE;
    this.abortSignal = options.abortSignal;
    this.simpleSchema = options.simpleSchema ?? false;
    this.codeType = options.codeType ?? DEFAULT_CODE_TYPE;
    this.codeVersion = options.codeVersion ?? DEFAULT_CODE_VERSION;
    this.maxInputChars = options.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS;
    this.stream = options.stream ?? false;
    this.onTextDelta = options.onTextDelta;
    this.onReasoningDelta = options.onReasoningDelta;
  }

  /**
   * Run the generation call for one chunk
   */
  async extract(
    chunk: ExtractionChunk,
    input: ExtractionPromptInput,
  ): Promise<ChunkGeneration> {
    const pages = `${chunk.startPage}-${chunk.endPage}`;
    const truncated = input.text.length > this.maxInputChars;
    if (truncated) {
      this.logger.warn(
        `[${COMPONENT_NAME}] Text for pages ${pages} truncated from ${input.text.length} to ${this.maxInputChars} characters`,
      );
    }

    const userPrompt = this.buildUserPrompt({
      ...input,
      text: truncated ? input.text.slice(0, this.maxInputChars) : input.text,
    });
    this.logger.info(
      `[${COMPONENT_NAME}] Sending pages ${pages} (${userPrompt.length} prompt characters)`,
    );

    try {
      const result = await LLMCaller.callText({
        systemPrompt: this.buildSystemPrompt(),
        userPrompt,
        primaryModel: this.model,
        fallbackModel: this.fallbackModel,
        maxRetries: this.maxRetries,
        temperature: this.temperature,
        abortSignal: this.abortSignal,
        stream: this.stream,
        onTextDelta: this.onTextDelta,
        onReasoningDelta: this.onReasoningDelta,
        component: COMPONENT_NAME,
        phase: `pages-${pages}`,
      });
      this.usageAggregator?.track(result.usage);

      return {
        text: result.text,
        truncated,
        usage: result.usage,
        usedFallback: result.usedFallback,
        aborted: false,
      };
    } catch (error) {
      if (this.abortSignal?.aborted) {
        this.logger.warn(
          `[${COMPONENT_NAME}] Generation for pages ${pages} cancelled`,
        );
        return { text: '', truncated, usedFallback: false, aborted: true };
      }

      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `[${COMPONENT_NAME}] Generation failed for pages ${pages}: ${message}`,
      );
      return { text: '', truncated, usedFallback: false, aborted: false };
    }
  }

  /**
   * Stamp the configured code tags on records that lack them
   *
   * Records from simple-schema runs are returned unchanged.
   */
  stampCodeTags(records: readonly CodeRecord[]): CodeRecord[] {
    if (this.simpleSchema) {
      return [...records];
    }
    return records.map((record) => ({
      ...record,
      code_type: record.code_type ?? this.codeType,
      code_version: record.code_version ?? this.codeVersion,
    }));
  }

  private buildSystemPrompt(): string {
    return `You are an expert Medical Coder and Data Analyst.
Your task is to extract ${this.codeType} codes from the provided text and return them as structured JSON Lines.

## Rules

1. **Semicolon Rule**: This is CRITICAL. Codes often use a parent-child relationship.
   - If a code description starts with a semicolon (e.g., "; surgical") or is indented and lowercase, it is a CHILD code.
   - Find the immediately preceding PARENT code (whose description usually contains a semicolon).
   - The full description of the child is: [Parent description up to the semicolon] + [Child description].
   - Example:
     - Parent: "29800 Arthroscopy, temporomandibular joint; diagnostic, with or without synovial biopsy (separate procedure)"
     - Child: "29804 ; surgical"
     - Result for 29804: "Arthroscopy, temporomandibular joint, surgical"

2. **Hierarchy Inheritance**:
   - Fill in "section", "subsection", "subheading" and "topic" for every code.
   - When the text introduces a new header (e.g., "Respiratory System"), apply it to the codes that follow.
   - Otherwise use the hierarchy context given with the input.

3. **Text Extraction**:
   - "section_text", "subsection_text", "subheading_text" and "topic_text" hold the introductory paragraphs under those headers.
   - If the text is not present in this input, use "See previous pages" or leave it empty. Do not invent text.

${this.buildSchemaInstruction()}`;
  }

  private buildUserPrompt(input: ExtractionPromptInput): string {
    const { hierarchy } = input;
    const sections = [
      `## Context (hierarchy from previous pages)

- Current Section: ${hierarchy.section ?? 'Unknown'}
- Current Subsection: ${hierarchy.subsection ?? 'Unknown'}
- Current Subheading: ${hierarchy.subheading ?? 'Unknown'}
- Current Topic: ${hierarchy.topic ?? 'Unknown'}`,
    ];

    if (input.previousRecord) {
      sections.push(`## Previous Code Context

The last code extracted from the previous page range was:
${JSON.stringify(input.previousRecord, null, 2)}
If the FIRST code in the current text is a child code (starts with a semicolon or is indented), use the description of this previous code as the PARENT.`);
    }

    sections.push(`## Input Text

${input.text}`);

    return sections.join('\n\n');
  }

  private buildSchemaInstruction(): string {
    const format = `4. **Output Format**:
   Return the data as **JSON Lines** (ndjson).
   - Each line must be a valid, independent JSON object.
   - Do NOT wrap the output in a list \`[...]\`.
   - Do NOT use commas between lines.
   - Schema for each object:`;

    if (this.simpleSchema) {
      return `${format}
   {
    "code": "string",
    "code_description": "string (resolved full description)"
   }
   Do NOT include any other fields like section, subsection, etc.`;
    }

    return `${format}
   {
    "code": "string",
    "code_description": "string (resolved full description)",
    "code_type": "${this.codeType}",
    "section": "string",
    "section_text": "string",
    "subsection": "string",
    "subsection_text": "string",
    "subheading": "string",
    "subheading_text": "string",
    "topic": "string",
    "topic_text": "string",
    "code_version": "${this.codeVersion}"
   }`;
  }
}
