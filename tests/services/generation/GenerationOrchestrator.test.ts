import { describe, it, expect, vi } from 'vitest';
import { GenerationOrchestrator, type GenerationRequest } from '../../../src/server/services/generation/GenerationOrchestrator.js';
import { WindowSelector } from '../../../src/server/services/windowing/WindowSelector.js';
import { ScriptedLLMProvider } from '../../../src/server/services/mocks/ScriptedLLMProvider.js';
import { GenerationServiceError, GenerationTimeoutError } from '../../../src/server/types/errors.js';
import type { BatchOptionsInput } from '../../../src/server/config/pipelineOptions.js';
import { flashcardsJson, quizJson, scriptValidResponses, summaryJson, testOptions } from '../../helpers/artifacts.js';

function requestFor(input: BatchOptionsInput, deadline?: number): GenerationRequest {
  return {
    window: new WindowSelector().select('Cells divide. Energy flows through living systems.'),
    documentName: 'cells.txt',
    options: testOptions(input),
    deadline,
  };
}

function setup(now?: () => number) {
  const provider = new ScriptedLLMProvider();
  const sleep = vi.fn(async (_ms: number) => {});
  const orchestrator = new GenerationOrchestrator({ provider, sleep, now });
  return { provider, sleep, orchestrator };
}

describe('GenerationOrchestrator', () => {
  it('generates every requested artifact', async () => {
    const { provider, orchestrator } = setup();
    scriptValidResponses(provider, ['cornellNotes', 'flashcards', 'quiz', 'summary', 'mindMap']);

    const outcome = await orchestrator.generate(requestFor({ numFlashcards: 5, numQuizQuestions: 5 }));
    expect(outcome.errors).toEqual([]);
    expect(Object.keys(outcome.materials).sort()).toEqual(['cornellNotes', 'flashcards', 'mindMap', 'quiz', 'summary']);
    expect(outcome.attempts).toEqual({ cornellNotes: 1, flashcards: 1, quiz: 1, summary: 1, mindMap: 1 });
    expect(outcome.materials.mindMap).toBe('mindmap\n  root((Cells))\n    Division\n    Energy');
  });

  it('sends a repair prompt after malformed output without waiting', async () => {
    const { provider, sleep, orchestrator } = setup();
    provider
      .enqueueResponse('flashcards', 'Sorry, here are some cards')
      .enqueueResponse('flashcards', '[{"front": "Q"}]')
      .enqueueResponse('flashcards', flashcardsJson(5));

    const outcome = await orchestrator.generate(requestFor({ outputFormats: ['flashcards'], numFlashcards: 5 }));
    expect(outcome.attempts).toEqual({ flashcards: 3 });
    expect(outcome.materials.flashcards).toHaveLength(5);
    expect(sleep).not.toHaveBeenCalled();

    const calls = provider.callsFor('flashcards');
    expect(calls.map((call) => call.messages.length)).toEqual([2, 3, 3]);
    expect(calls[2].messages[2].content).toContain('Your previous response could not be used');
    expect(calls[2].messages[2].content).toContain('- 0.back: Required');
    expect(calls[0].options).toEqual({ max_tokens: 4000, timeoutMs: undefined });
  });

  it('sends the repair prompt only right after malformed output', async () => {
    const { provider, sleep, orchestrator } = setup();
    provider
      .enqueueResponse('summary', 'not json')
      .enqueueError('summary', new Error('socket hang up'))
      .enqueueResponse('summary', summaryJson);

    const outcome = await orchestrator.generate(requestFor({ outputFormats: ['summary'] }));
    expect(outcome.attempts).toEqual({ summary: 3 });
    expect(provider.callsFor('summary').map((call) => call.messages.length)).toEqual([2, 3, 2]);
    expect(sleep.mock.calls).toEqual([[500]]);
  });

  it('retries a quiz with three options and never returns it', async () => {
    const { provider, sleep, orchestrator } = setup();
    const threeOptions = JSON.stringify({
      questions: [
        {
          question: 'Which organelle produces energy?',
          options: ['A) Mitochondrion', 'B) Ribosome', 'C) Nucleus'],
          correctAnswer: 'A',
          explanation: 'Mitochondria produce ATP.',
        },
      ],
    });
    provider.enqueueResponse('quiz', threeOptions).enqueueResponse('quiz', quizJson(5));

    const outcome = await orchestrator.generate(requestFor({ outputFormats: ['quiz'], numQuizQuestions: 5 }));
    expect(outcome.errors).toEqual([]);
    expect(outcome.attempts).toEqual({ quiz: 2 });
    expect(sleep).not.toHaveBeenCalled();

    const calls = provider.callsFor('quiz');
    expect(calls[1].messages[2].content).toContain('- questions.0.options: exactly 4 options are required');

    const questions = outcome.materials.quiz?.questions ?? [];
    expect(questions).toHaveLength(5);
    expect(questions.map((question) => question.question)).not.toContain('Which organelle produces energy?');
    for (const question of questions) {
      expect(question.options).toHaveLength(4);
      expect(question.correctAnswer).toBe('A');
    }
  });

  it('trims list artifacts to the requested size', async () => {
    const { provider, orchestrator } = setup();
    provider.enqueueResponse('flashcards', flashcardsJson(8));

    const outcome = await orchestrator.generate(requestFor({ outputFormats: ['flashcards'], numFlashcards: 5 }));
    expect(outcome.materials.flashcards?.map((card) => card.front)).toEqual([
      'Question 1?',
      'Question 2?',
      'Question 3?',
      'Question 4?',
      'Question 5?',
    ]);
  });

  it('reports an artifact that exhausts its attempts and keeps the others', async () => {
    const { provider, sleep, orchestrator } = setup();
    scriptValidResponses(provider, ['summary']);
    for (let i = 0; i < 3; i++) {
      provider.enqueueError('quiz', new GenerationServiceError('scripted-llm', 'down'));
    }

    const outcome = await orchestrator.generate(requestFor({ outputFormats: ['quiz', 'summary'] }));
    expect(outcome.materials.summary?.overview).toBe('Cells divide and use energy.');
    expect(outcome.materials.quiz).toBeUndefined();
    expect(outcome.errors).toEqual([
      {
        code: 'SERVICE_ERROR',
        message: 'External service error (scripted-llm): down',
        stage: 'generate',
        artifact: 'quiz',
        attempts: 3,
        details: { service: 'scripted-llm' },
      },
    ]);
    expect(sleep.mock.calls).toEqual([[500], [500]]);
  });

  it('reports schema failures once retries are spent', async () => {
    const { provider, orchestrator } = setup();
    provider.setDefaultResponse('still not json');

    const outcome = await orchestrator.generate(requestFor({ outputFormats: ['summary'], maxRetries: 2 }));
    expect(outcome.errors).toHaveLength(1);
    expect(outcome.errors[0].code).toBe('SCHEMA_VALIDATION_FAILED');
    expect(outcome.errors[0].message).toMatch(/^Generated summary failed validation: response is not valid JSON: /);
    expect(outcome.errors[0].attempts).toBe(2);
  });

  it('treats unexpected provider errors as service errors and retries them', async () => {
    const { provider, sleep, orchestrator } = setup();
    provider.enqueueError('summary', new Error('socket hang up')).enqueueResponse('summary', summaryJson);

    const outcome = await orchestrator.generate(requestFor({ outputFormats: ['summary'] }));
    expect(outcome.errors).toEqual([]);
    expect(outcome.attempts).toEqual({ summary: 2 });
    expect(sleep).toHaveBeenCalledWith(500);
  });

  it('stops when the retry delay would pass the deadline', async () => {
    const { provider, sleep, orchestrator } = setup(() => 0);
    provider.enqueueError('quiz', new GenerationTimeoutError());

    const outcome = await orchestrator.generate(requestFor({ outputFormats: ['quiz'] }, 300));
    expect(outcome.errors).toEqual([
      {
        code: 'TIMEOUT',
        message: 'Deadline passes before quiz can be retried',
        stage: 'generate',
        artifact: 'quiz',
        attempts: 1,
        details: { retryDelayMs: 500 },
      },
    ]);
    expect(provider.callsFor('quiz')[0].options?.timeoutMs).toBe(300);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('makes no attempt once the deadline has passed', async () => {
    const { provider, orchestrator } = setup(() => 1000);

    const outcome = await orchestrator.generate(requestFor({ outputFormats: ['summary'] }, 1000));
    expect(provider.calls).toHaveLength(0);
    expect(outcome.errors).toEqual([
      {
        code: 'TIMEOUT',
        message: 'Deadline passed before attempt 1 of summary',
        stage: 'generate',
        artifact: 'summary',
        attempts: 0,
      },
    ]);
  });
});
