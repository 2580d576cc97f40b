/**
 * Scripted LLM provider
 *
 * Stands in for the generation service in tests and dry runs. Steps are keyed by the
 * artifact a request asks for (read from the prompt), so a test can script
 * "quiz: rate limited, rate limited, rate limited" alongside "flashcards: valid JSON".
 */

import type { ArtifactType } from '../../types/pipeline.js';
import { GenerationServiceError } from '../../types/errors.js';
import type { LLMGenerateOptions, LLMMessage, LLMProvider, LLMResponse } from '../llm/LLMProvider.js';
import { MockServiceBase } from './MockServiceBase.js';

export interface RecordedCall {
  key: string;
  messages: LLMMessage[];
  options?: LLMGenerateOptions;
}

const ARTIFACT_MARKERS: Array<[RegExp, ArtifactType]> = [
  [/\bflashcards\b/i, 'flashcards'],
  [/multiple-choice quiz/i, 'quiz'],
  [/cornell notes/i, 'cornellNotes'],
  [/mind map/i, 'mindMap'],
  [/\bsummary\b/i, 'summary'],
];

/**
 * Which artifact a prompt asks for, from the first line of its first user message
 */
export function artifactKeyFromMessages(messages: LLMMessage[]): string {
  const request = messages.find((message) => message.role === 'user');
  const firstLine = request?.content.split('\n')[0] ?? '';
  const match = ARTIFACT_MARKERS.find(([pattern]) => pattern.test(firstLine));
  return match ? match[1] : 'default';
}

export class ScriptedLLMProvider extends MockServiceBase<string, Error> implements LLMProvider {
  readonly calls: RecordedCall[] = [];

  getServiceName(): string {
    return 'scripted-llm';
  }

  getName(): string {
    return this.getServiceName();
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    const key = artifactKeyFromMessages(messages);
    this.calls.push({ key, messages, options });

    const step = this.nextStep(key);
    if (!step) {
      throw new GenerationServiceError(this.getServiceName(), `no scripted response for "${key}"`);
    }
    if (step.kind === 'error') {
      throw step.value;
    }
    return { content: step.value, model: 'scripted' };
  }

  callsFor(key: ArtifactType): RecordedCall[] {
    return this.calls.filter((call) => call.key === key);
  }
}
