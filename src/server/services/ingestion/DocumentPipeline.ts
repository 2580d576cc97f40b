/**
 * Per-document pipeline
 *
 * fetch → sniff → extract → normalize → window → generate → PipelineResult
 *
 * Every failure is turned into an entry on the result; nothing thrown inside escapes.
 */

import type { BatchOptions } from '../../config/pipelineOptions.js';
import type {
  DocumentReference,
  PipelineIssue,
  PipelineResult,
  PipelineStage,
  PipelineStatistics,
  PipelineStatus,
} from '../../types/pipeline.js';
import { ARTIFACT_TYPES } from '../../types/pipeline.js';
import {
  GenerationTimeoutError,
  InsufficientTextError,
  getErrorMessage,
  isAppError,
  issueDetails,
} from '../../types/errors.js';
import { createChildLogger, runWithPipelineContext } from '../../utils/logger.js';
import { sniffFormat } from '../../extraction/FormatSniffer.js';
import type { ExtractorRegistry } from '../../extraction/ExtractorRegistry.js';
import { ContentNormalizer } from '../normalization/ContentNormalizer.js';
import { WindowSelector } from '../windowing/WindowSelector.js';
import type { GenerationOrchestrator } from '../generation/GenerationOrchestrator.js';
import type { DocumentFetcher } from './DocumentFetcher.js';

const WORDS_PER_MINUTE = 200;

export interface DocumentPipelineDeps {
  fetcher: DocumentFetcher;
  extractors: ExtractorRegistry;
  orchestrator: GenerationOrchestrator;
  now?: () => number;
}

export function emptyStatistics(): PipelineStatistics {
  return {
    extractedLength: 0,
    textLength: 0,
    wordCount: 0,
    windowLength: 0,
    estimatedReadTimeMinutes: 0,
    elapsedMs: 0,
    flashcardCount: 0,
    quizQuestionCount: 0,
    generatedArtifacts: [],
    attempts: {},
  };
}

/**
 * Convert anything thrown into a result entry
 */
export function issueFromError(error: unknown, stage: PipelineStage): PipelineIssue {
  if (isAppError(error)) {
    const issue: PipelineIssue = { code: error.code, message: error.message, stage };
    const details = issueDetails(error);
    if (details) issue.details = details;
    return issue;
  }
  return { code: 'INTERNAL_ERROR', message: getErrorMessage(error), stage };
}

export function documentIdOf(reference: DocumentReference, index: number): string {
  return reference.id ?? reference.url ?? reference.filename ?? `document-${index + 1}`;
}

export class DocumentPipeline {
  private readonly fetcher: DocumentFetcher;
  private readonly extractors: ExtractorRegistry;
  private readonly orchestrator: GenerationOrchestrator;
  private readonly now: () => number;
  private readonly normalizer: ContentNormalizer;
  private readonly windowSelector: WindowSelector;

  constructor(deps: DocumentPipelineDeps, private readonly options: BatchOptions) {
    this.fetcher = deps.fetcher;
    this.extractors = deps.extractors;
    this.orchestrator = deps.orchestrator;
    this.now = deps.now ?? Date.now;
    this.normalizer = new ContentNormalizer({ minWords: options.minWords });
    this.windowSelector = new WindowSelector({
      budget: options.contextBudgetChars,
      strategy: options.windowStrategy,
      segments: options.windowSegments,
    });
  }

  async process(reference: DocumentReference, index: number): Promise<PipelineResult> {
    const documentId = documentIdOf(reference, index);
    return runWithPipelineContext({ documentId, documentIndex: index }, () => this.run(reference, index, documentId));
  }

  private async run(reference: DocumentReference, index: number, documentId: string): Promise<PipelineResult> {
    const log = createChildLogger({ stage: 'pipeline' });
    const startedAt = this.now();
    const deadline = this.options.documentTimeoutMs ? startedAt + this.options.documentTimeoutMs : undefined;
    const statistics = emptyStatistics();
    const errors: PipelineIssue[] = [];
    const warnings: PipelineIssue[] = [];

    const result: PipelineResult = {
      index,
      documentId,
      filename: reference.filename,
      sourceUrl: reference.url,
      status: 'failed',
      materials: {},
      errors,
      warnings,
      statistics,
      processedAt: '',
    };

    let stage: PipelineStage = 'fetch';
    const enter = (next: PipelineStage) => {
      stage = next;
      if (deadline !== undefined && this.now() >= deadline) {
        throw new GenerationTimeoutError(`Document deadline passed before the ${next} stage`, { stage: next });
      }
    };

    try {
      enter('fetch');
      const source = await this.fetcher.resolve(reference);
      result.fileId = source.fileId;
      result.filename = source.filename;
      result.sourceUrl = source.sourceUrl;

      enter('sniff');
      const detection = sniffFormat(source, this.options.defaultFormat);
      result.format = detection.format;
      for (const message of detection.warnings) {
        warnings.push({ code: 'FORMAT_ASSUMED', message, stage: 'sniff' });
      }

      enter('extract');
      const extracted = await this.extractors[detection.format].extract(source, {
        encodingTolerance: this.options.encodingTolerance,
      });
      statistics.extractedLength = extracted.charCount;
      for (const note of extracted.diagnostics.notes ?? []) {
        warnings.push({ code: 'EXTRACTION_NOTE', message: note, stage: 'extract' });
      }

      enter('normalize');
      const normalized = this.normalizer.normalize(extracted);
      result.quality = normalized.quality;
      statistics.textLength = normalized.charCount;
      statistics.wordCount = normalized.wordCount;
      statistics.estimatedReadTimeMinutes = Math.ceil(normalized.wordCount / WORDS_PER_MINUTE);

      if (normalized.quality === 'insufficient') {
        const insufficient = new InsufficientTextError(normalized.wordCount, normalized.minWords);
        if (normalized.wordCount === 0 || this.options.insufficientTextPolicy === 'skip') {
          throw insufficient;
        }
        warnings.push(issueFromError(insufficient, 'normalize'));
      }

      enter('window');
      const window = this.windowSelector.select(normalized);
      statistics.windowLength = window.text.length;
      statistics.windowStrategy = window.strategy;

      enter('generate');
      const generation = await this.orchestrator.generate({
        window,
        documentName: source.filename,
        options: this.options,
        deadline,
      });
      result.materials = generation.materials;
      errors.push(...generation.errors);
      statistics.attempts = generation.attempts;
      statistics.generatedArtifacts = ARTIFACT_TYPES.filter((artifact) => generation.materials[artifact] !== undefined);
      statistics.flashcardCount = generation.materials.flashcards?.length ?? 0;
      statistics.quizQuestionCount = generation.materials.quiz?.questions.length ?? 0;

      result.status = this.statusOf(statistics.generatedArtifacts.length);
    } catch (error) {
      const issue = issueFromError(error, stage);
      errors.push(issue);
      result.status = 'failed';
      log.warn({ stage, code: issue.code }, issue.message);
    }

    const finishedAt = this.now();
    statistics.elapsedMs = finishedAt - startedAt;
    result.processedAt = new Date(finishedAt).toISOString();

    log.info(
      { status: result.status, format: result.format, errors: errors.length, elapsedMs: statistics.elapsedMs },
      'Document processed'
    );
    return result;
  }

  private statusOf(generatedCount: number): PipelineStatus {
    if (generatedCount === this.options.outputFormats.length) return 'success';
    return generatedCount > 0 ? 'partial' : 'failed';
  }
}
