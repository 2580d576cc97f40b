/**
 * Ingestion Layer - Main exports
 */

export { BatchCoordinator } from './BatchCoordinator.js';
export type { BatchCoordinatorDeps, BatchRunHooks } from './BatchCoordinator.js';

export { DocumentPipeline, documentIdOf, issueFromError } from './DocumentPipeline.js';
export type { DocumentPipelineDeps } from './DocumentPipeline.js';

export { DocumentFetcher, computeFileId, filenameFromContentDisposition, filenameFromUrl } from './DocumentFetcher.js';
export type { DocumentFetcherConfig } from './DocumentFetcher.js';
