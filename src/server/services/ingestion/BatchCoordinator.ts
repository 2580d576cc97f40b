/**
 * Batch Coordinator
 *
 * Validates batch options, then runs each document through the pipeline with bounded
 * concurrency. One document's failure never stops the others; the report keeps input order.
 */

import { randomUUID } from 'crypto';
import { resolveBatchOptions, type BatchOptionsInput } from '../../config/pipelineOptions.js';
import type { BatchReport, DocumentReference, PipelineResult } from '../../types/pipeline.js';
import { logger, runWithPipelineContext } from '../../utils/logger.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { getErrorMessage } from '../../types/errors.js';
import { createExtractorRegistry, type ExtractorRegistry } from '../../extraction/ExtractorRegistry.js';
import type { LLMProvider } from '../llm/LLMProvider.js';
import { GenerationOrchestrator } from '../generation/GenerationOrchestrator.js';
import { DocumentFetcher } from './DocumentFetcher.js';
import { DocumentPipeline, documentIdOf, emptyStatistics, issueFromError } from './DocumentPipeline.js';

export interface BatchCoordinatorDeps {
  provider: LLMProvider;
  fetcher?: DocumentFetcher;
  extractors?: ExtractorRegistry;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface BatchRunHooks {
  /** Called as each document finishes, in completion order */
  onResult?: (result: PipelineResult) => void | Promise<void>;
}

export class BatchCoordinator {
  private readonly fetcher: DocumentFetcher;
  private readonly extractors: ExtractorRegistry;
  private readonly orchestrator: GenerationOrchestrator;
  private readonly now: () => number;

  constructor(deps: BatchCoordinatorDeps) {
    this.fetcher = deps.fetcher ?? new DocumentFetcher();
    this.extractors = deps.extractors ?? createExtractorRegistry();
    this.now = deps.now ?? Date.now;
    this.orchestrator = new GenerationOrchestrator({ provider: deps.provider, sleep: deps.sleep, now: this.now });
  }

  /**
   * Process a batch of documents
   *
   * @throws InvalidOptionsError before any document is touched
   */
  async run(
    references: DocumentReference[],
    optionsInput: BatchOptionsInput = {},
    hooks: BatchRunHooks = {}
  ): Promise<BatchReport> {
    const options = resolveBatchOptions(optionsInput);
    const batchId = randomUUID();
    const startedAt = this.now();
    const pipeline = new DocumentPipeline(
      { fetcher: this.fetcher, extractors: this.extractors, orchestrator: this.orchestrator, now: this.now },
      options
    );

    logger.info(
      { batchId, documents: references.length, concurrency: options.concurrencyLimit, outputFormats: options.outputFormats },
      'Batch started'
    );

    const results = await runWithPipelineContext({ batchId }, () =>
      mapWithConcurrency(references, options.concurrencyLimit, async (reference, index) => {
        let result: PipelineResult;
        try {
          result = await pipeline.process(reference, index);
        } catch (error) {
          result = this.internalFailure(reference, index, error);
        }
        await this.notify(hooks, result);
        return result;
      })
    );

    const finishedAt = this.now();
    const report: BatchReport = {
      results,
      totals: {
        documents: results.length,
        success: results.filter((result) => result.status === 'success').length,
        partial: results.filter((result) => result.status === 'partial').length,
        failed: results.filter((result) => result.status === 'failed').length,
      },
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      elapsedMs: finishedAt - startedAt,
    };

    logger.info({ batchId, ...report.totals, elapsedMs: report.elapsedMs }, 'Batch finished');
    return report;
  }

  private internalFailure(reference: DocumentReference, index: number, error: unknown): PipelineResult {
    logger.error({ index, error: getErrorMessage(error) }, 'Document pipeline crashed');
    const issue = issueFromError(error, 'pipeline');
    return {
      index,
      documentId: documentIdOf(reference, index),
      filename: reference.filename,
      sourceUrl: reference.url,
      status: 'failed',
      materials: {},
      errors: [{ ...issue, code: 'INTERNAL_ERROR' }],
      warnings: [],
      statistics: emptyStatistics(),
      processedAt: new Date(this.now()).toISOString(),
    };
  }

  private async notify(hooks: BatchRunHooks, result: PipelineResult): Promise<void> {
    if (!hooks.onResult) return;
    try {
      await hooks.onResult(result);
    } catch (error) {
      logger.warn({ index: result.index, error: getErrorMessage(error) }, 'onResult callback failed');
    }
  }
}
