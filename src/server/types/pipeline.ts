/**
 * Pipeline data model
 *
 * Each stage produces one of these values and hands it to the next:
 * SourceDocument -> ExtractedText -> NormalizedText -> GenerationWindow -> StudyMaterialSet
 */

import type {
  CornellNotes,
  Flashcard,
  Quiz,
  Summary,
} from '../services/generation/artifactSchemas.js';

export const DOCUMENT_FORMATS = ['pdf', 'docx', 'doc', 'epub', 'txt', 'md', 'html', 'rtf'] as const;
export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

export function isDocumentFormat(value: string): value is DocumentFormat {
  return (DOCUMENT_FORMATS as readonly string[]).includes(value);
}

export const ARTIFACT_TYPES = ['cornellNotes', 'flashcards', 'quiz', 'summary', 'mindMap'] as const;
export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

export const DIFFICULTY_LEVELS = ['easy', 'medium', 'hard', 'mixed'] as const;
export type DifficultyLevel = (typeof DIFFICULTY_LEVELS)[number];

/**
 * A document as supplied by the caller: either a URL to download or bytes already in hand
 */
export interface DocumentReference {
  id?: string;
  url?: string;
  bytes?: Uint8Array;
  filename?: string;
  declaredFormat?: string;
}

/**
 * Fetched document payload; immutable and dropped once extraction is done
 */
export interface SourceDocument {
  readonly fileId: string;
  readonly filename: string;
  readonly sourceUrl?: string;
  readonly declaredFormat?: string;
  readonly contentType?: string;
  readonly bytes: Buffer;
  readonly size: number;
}

export interface ExtractionDiagnostics {
  extractionMethod: string;
  pageCount: number;
  notes?: string[];
}

export interface ExtractedText {
  format: DocumentFormat;
  text: string;
  /** Page, chapter or section boundaries; `text` is always `pages.join('\n\n')` */
  pages: string[];
  headings: string[];
  title?: string;
  encoding?: string;
  wordCount: number;
  charCount: number;
  diagnostics: ExtractionDiagnostics;
}

export type TextQuality = 'ok' | 'insufficient';

export interface NormalizedText {
  text: string;
  wordCount: number;
  charCount: number;
  quality: TextQuality;
  minWords: number;
  removedLines: number;
}

export type WindowStrategy = 'full' | 'prefix' | 'distributed';

export interface WindowSegment {
  start: number;
  end: number;
}

export interface GenerationWindow {
  text: string;
  strategy: WindowStrategy;
  budget: number;
  sourceLength: number;
  /** Characters of the normalized text that made it into the window */
  coveredChars: number;
  coverageRatio: number;
  segments: WindowSegment[];
}

export interface StudyMaterialSet {
  cornellNotes?: CornellNotes;
  flashcards?: Flashcard[];
  quiz?: Quiz;
  summary?: Summary;
  mindMap?: string;
}

export type PipelineStage = 'fetch' | 'sniff' | 'extract' | 'normalize' | 'window' | 'generate' | 'pipeline';

export interface PipelineIssue {
  code: string;
  message: string;
  stage: PipelineStage;
  artifact?: ArtifactType;
  attempts?: number;
  details?: Record<string, unknown>;
}

export type PipelineStatus = 'success' | 'partial' | 'failed';

export interface PipelineStatistics {
  extractedLength: number;
  textLength: number;
  wordCount: number;
  windowLength: number;
  windowStrategy?: WindowStrategy;
  estimatedReadTimeMinutes: number;
  elapsedMs: number;
  flashcardCount: number;
  quizQuestionCount: number;
  generatedArtifacts: ArtifactType[];
  attempts: Partial<Record<ArtifactType, number>>;
}

export interface PipelineResult {
  index: number;
  documentId: string;
  fileId?: string;
  filename?: string;
  sourceUrl?: string;
  format?: DocumentFormat;
  status: PipelineStatus;
  quality?: TextQuality;
  materials: StudyMaterialSet;
  errors: PipelineIssue[];
  warnings: PipelineIssue[];
  statistics: PipelineStatistics;
  processedAt: string;
}

export interface BatchReport {
  results: PipelineResult[];
  totals: {
    documents: number;
    success: number;
    partial: number;
    failed: number;
  };
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
}
