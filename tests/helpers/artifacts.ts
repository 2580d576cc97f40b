/**
 * Well-formed model responses and option presets for generation tests
 */

import type { Env } from '../../src/server/config/env.js';
import { resolveBatchOptions, type BatchOptions, type BatchOptionsInput } from '../../src/server/config/pipelineOptions.js';
import type { ArtifactType } from '../../src/server/types/pipeline.js';
import type { ScriptedLLMProvider } from '../../src/server/services/mocks/ScriptedLLMProvider.js';

export const testEnv: Env = {
  NODE_ENV: 'test',
  STUDY_MODEL: 'test-model',
  GENERATION_TEMPERATURE: 0.7,
  GENERATION_TIMEOUT_MS: 60000,
  FETCH_TIMEOUT_MS: 30000,
  FETCH_MAX_BYTES: 1024 * 1024,
  CONTEXT_BUDGET_CHARS: 15000,
  MAX_RETRIES: 3,
  CONCURRENCY_LIMIT: 3,
};

export function testOptions(input: BatchOptionsInput = {}): BatchOptions {
  return resolveBatchOptions(input, testEnv);
}

export function flashcardsJson(count: number): string {
  return JSON.stringify(
    Array.from({ length: count }, (_, i) => ({
      front: `Question ${i + 1}?`,
      back: `Answer ${i + 1}.`,
      difficulty: 'medium',
      tags: ['cells'],
    }))
  );
}

export function quizJson(count: number): string {
  return JSON.stringify({
    questions: Array.from({ length: count }, (_, i) => ({
      type: 'multiple_choice',
      question: `Question ${i + 1}?`,
      options: ['A) Alpha', 'B) Beta', 'C) Gamma', 'D) Delta'],
      correctAnswer: 'A',
      explanation: 'Alpha comes first.',
      difficulty: 'easy',
    })),
  });
}

export const summaryJson = JSON.stringify({
  overview: 'Cells divide and use energy.',
  keyPoints: [{ point: 'Division', details: 'Cells split in two.' }],
  conclusion: 'Cells keep life going.',
});

export const cornellNotesJson = JSON.stringify({
  cues: ['What do cells do?'],
  notes: ['Cells divide and use energy.'],
  summary: 'Cells are busy.',
});

export const mindMapText = 'mindmap\n  root((Cells))\n    Division\n    Energy';

const VALID_RESPONSES: Record<ArtifactType, string> = {
  flashcards: flashcardsJson(5),
  quiz: quizJson(5),
  summary: summaryJson,
  cornellNotes: cornellNotesJson,
  mindMap: mindMapText,
};

/**
 * Queue `times` valid responses for each artifact
 */
export function scriptValidResponses(provider: ScriptedLLMProvider, artifacts: ArtifactType[], times: number = 1): void {
  for (const artifact of artifacts) {
    for (let i = 0; i < times; i++) {
      provider.enqueueResponse(artifact, VALID_RESPONSES[artifact]);
    }
  }
}
