/**
 * Study material pipeline - public API
 */

export * from './types/pipeline.js';
export * from './types/errors.js';

export { resolveBatchOptions, BatchOptionsSchema } from './config/pipelineOptions.js';
export type { BatchOptions, BatchOptionsInput, RetryOptions } from './config/pipelineOptions.js';
export { getEnv, resetEnv } from './config/env.js';
export type { Env } from './config/env.js';

export { logger, createChildLogger } from './utils/logger.js';

export { sniffFormat, detectFormatFromContent, detectFormatFromSuffix } from './extraction/FormatSniffer.js';
export type { FormatDetection, SniffInput } from './extraction/FormatSniffer.js';
export { createExtractorRegistry } from './extraction/ExtractorRegistry.js';
export type { ExtractorRegistry } from './extraction/ExtractorRegistry.js';
export type { TextExtractor, ExtractionOptions } from './extraction/TextExtractor.js';

export { ContentNormalizer } from './services/normalization/ContentNormalizer.js';
export { WindowSelector, SEGMENT_SEPARATOR } from './services/windowing/WindowSelector.js';

export { GenerationOrchestrator } from './services/generation/GenerationOrchestrator.js';
export type { GenerationOutcome, GenerationRequest } from './services/generation/GenerationOrchestrator.js';
export { ArtifactGenerationStateMachine } from './services/generation/ArtifactGenerationStateMachine.js';
export type { ArtifactState } from './services/generation/ArtifactGenerationStateMachine.js';
export type { CornellNotes, Flashcard, Quiz, QuizQuestion, Summary } from './services/generation/artifactSchemas.js';

export type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './services/llm/LLMProvider.js';
export { OpenAIProvider } from './services/llm/OpenAIProvider.js';
export { ScriptedLLMProvider } from './services/mocks/ScriptedLLMProvider.js';

export * from './services/ingestion/index.js';
