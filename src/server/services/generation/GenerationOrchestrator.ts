/**
 * Generation Orchestrator
 *
 * Produces the requested study artifacts for one generation window. Each artifact runs
 * its own retry state machine; a failed artifact is reported and left out of the
 * material set while the others continue.
 */

import type { BatchOptions } from '../../config/pipelineOptions.js';
import type {
  ArtifactType,
  GenerationWindow,
  PipelineIssue,
  StudyMaterialSet,
} from '../../types/pipeline.js';
import { GenerationTimeoutError, SchemaValidationError, issueDetails } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { sleep as defaultSleep } from '../../utils/retry.js';
import type { LLMProvider } from '../llm/LLMProvider.js';
import { ArtifactGenerationStateMachine, classifyGenerationError, type AttemptFailure } from './ArtifactGenerationStateMachine.js';
import { ARTIFACT_MAX_TOKENS, buildArtifactMessages, buildRepairMessages, type PromptParameters } from './promptBuilder.js';
import { parseArtifact } from './responseParser.js';

export type GenerationOptions = Pick<
  BatchOptions,
  | 'outputFormats'
  | 'numFlashcards'
  | 'numQuizQuestions'
  | 'difficultyLevel'
  | 'maxRetries'
  | 'artifactConcurrency'
  | 'retry'
>;

export interface GenerationRequest {
  window: GenerationWindow;
  documentName: string;
  options: GenerationOptions;
  /** Epoch milliseconds after which no new attempt starts */
  deadline?: number;
}

export interface ArtifactOutcome {
  artifact: ArtifactType;
  succeeded: boolean;
  attempts: number;
  error?: PipelineIssue;
}

export interface GenerationOutcome {
  materials: StudyMaterialSet;
  artifacts: ArtifactOutcome[];
  errors: PipelineIssue[];
  attempts: Partial<Record<ArtifactType, number>>;
}

export interface GenerationOrchestratorDeps {
  provider: LLMProvider;
  /** Waits between attempts; tests swap in an instant version */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Cut list artifacts down to the requested size
 */
export function trimToRequested(materials: StudyMaterialSet, options: GenerationOptions): StudyMaterialSet {
  const trimmed: StudyMaterialSet = { ...materials };
  if (trimmed.flashcards) {
    trimmed.flashcards = trimmed.flashcards.slice(0, options.numFlashcards);
  }
  if (trimmed.quiz) {
    trimmed.quiz = { ...trimmed.quiz, questions: trimmed.quiz.questions.slice(0, options.numQuizQuestions) };
  }
  return trimmed;
}

export class GenerationOrchestrator {
  private readonly provider: LLMProvider;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(deps: GenerationOrchestratorDeps) {
    this.provider = deps.provider;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  async generate(request: GenerationRequest): Promise<GenerationOutcome> {
    const materials: StudyMaterialSet = {};
    const artifacts = await mapWithConcurrency(
      request.options.outputFormats,
      request.options.artifactConcurrency,
      (artifact) => this.generateArtifact(artifact, request, materials)
    );

    const errors: PipelineIssue[] = [];
    const attempts: Partial<Record<ArtifactType, number>> = {};
    for (const outcome of artifacts) {
      attempts[outcome.artifact] = outcome.attempts;
      if (outcome.error) errors.push(outcome.error);
    }

    return {
      materials: trimToRequested(materials, request.options),
      artifacts,
      errors,
      attempts,
    };
  }

  /**
   * Run one artifact to success or exhaustion, writing the result into `materials`
   */
  async generateArtifact<K extends ArtifactType>(
    artifact: K,
    request: GenerationRequest,
    materials: StudyMaterialSet
  ): Promise<ArtifactOutcome> {
    const { options, deadline } = request;
    const log = createChildLogger({ artifact, documentName: request.documentName });
    const machine = new ArtifactGenerationStateMachine(artifact, options.maxRetries, options.retry);
    const params: PromptParameters = {
      documentName: request.documentName,
      windowText: request.window.text,
      numFlashcards: options.numFlashcards,
      numQuizQuestions: options.numQuizQuestions,
      difficulty: options.difficultyLevel,
    };
    let repairIssues: string[] | undefined;

    while (!machine.isTerminal()) {
      if (deadline !== undefined && this.now() >= deadline) {
        machine.expire(
          new GenerationTimeoutError(`Deadline passed before attempt ${machine.attemptCount + 1} of ${artifact}`)
        );
        break;
      }

      const attempt = machine.startAttempt();
      const messages = repairIssues
        ? buildRepairMessages(artifact, params, repairIssues)
        : buildArtifactMessages(artifact, params);

      let failure: AttemptFailure;
      try {
        const response = await this.provider.generate(messages, {
          max_tokens: ARTIFACT_MAX_TOKENS[artifact],
          timeoutMs: deadline === undefined ? undefined : Math.max(1, deadline - this.now()),
        });
        const parsed = parseArtifact(artifact, response.content);
        if (parsed.success) {
          materials[artifact] = parsed.data;
          machine.succeed();
          log.debug({ attempt, model: response.model }, 'Artifact generated');
          break;
        }
        failure = new SchemaValidationError(artifact, parsed.issues);
      } catch (error) {
        failure = classifyGenerationError(error, this.provider.getName());
      }

      const decision = machine.fail(failure);
      log.warn({ attempt, code: failure.code, retry: decision.retry, delayMs: decision.delayMs }, failure.message);
      if (!decision.retry) break;

      repairIssues = decision.repair && failure instanceof SchemaValidationError ? failure.issues : undefined;

      if (decision.delayMs > 0) {
        if (deadline !== undefined && this.now() + decision.delayMs >= deadline) {
          machine.expire(
            new GenerationTimeoutError(`Deadline passes before ${artifact} can be retried`, {
              retryDelayMs: decision.delayMs,
            })
          );
          break;
        }
        await this.sleep(decision.delayMs);
      }
    }

    const attempts = machine.attemptCount;
    if (machine.current === 'succeeded') {
      return { artifact, succeeded: true, attempts };
    }

    const lastFailure = machine.lastFailure;
    log.error({ attempts, code: lastFailure?.code }, 'Artifact generation exhausted');
    const error: PipelineIssue = {
      code: lastFailure?.code ?? 'SERVICE_ERROR',
      message: lastFailure?.message ?? `Generation of ${artifact} failed`,
      stage: 'generate',
      artifact,
      attempts,
    };
    const details = lastFailure ? issueDetails(lastFailure) : undefined;
    if (details) error.details = details;
    return { artifact, succeeded: false, attempts, error };
  }
}
