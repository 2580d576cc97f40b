/**
 * Prompt construction for study artifacts
 *
 * Each artifact gets a system message describing the task and a user message embedding
 * the generation window, the JSON shape to return and the artifact parameters.
 */

import type { ArtifactType, DifficultyLevel } from '../../types/pipeline.js';
import type { LLMMessage } from '../llm/LLMProvider.js';

export interface PromptParameters {
  documentName: string;
  windowText: string;
  numFlashcards: number;
  numQuizQuestions: number;
  difficulty: DifficultyLevel;
}

export const DIFFICULTY_GUIDANCE: Record<DifficultyLevel, string> = {
  easy: 'Focus on basic facts and definitions',
  medium: 'Balance facts with conceptual understanding',
  hard: 'Focus on complex concepts and applications',
  mixed: 'Mix of easy, medium, and hard questions',
};

/** Completion token ceiling per artifact */
export const ARTIFACT_MAX_TOKENS: Record<ArtifactType, number> = {
  summary: 2000,
  cornellNotes: 3000,
  flashcards: 4000,
  quiz: 4000,
  mindMap: 1500,
};

const SYSTEM_PROMPTS: Record<ArtifactType, string> = {
  summary:
    'You are an expert at creating concise, informative summaries of academic and professional documents. ' +
    'Generate summaries that capture the essence and main ideas.',
  cornellNotes:
    'You are an expert at creating Cornell Notes, a note-taking method with cues, notes, and summary sections.',
  flashcards:
    'You are an expert at creating effective flashcards for spaced repetition learning. ' +
    'Your flashcards are clear, concise, and test understanding.',
  quiz: 'You are an expert at creating effective multiple-choice questions that test understanding.',
  mindMap: 'You are an expert at creating clear mind maps that visualize concept relationships using Mermaid syntax.',
};

const SUMMARY_SHAPE = `{
  "overview": "2-3 sentence overview of the entire document",
  "keyPoints": [
    {"point": "Main idea 1", "details": "Brief explanation"},
    {"point": "Main idea 2", "details": "Brief explanation"}
  ],
  "conclusion": "Final takeaway or conclusion"
}`;

const CORNELL_SHAPE = `{
  "cues": ["Question 1?", "Key term 2", "Question 3?"],
  "notes": ["Detailed explanation 1", "Detailed explanation 2", "Detailed explanation 3"],
  "summary": "Overall summary in 2-3 sentences"
}`;

const FLASHCARD_SHAPE = `[
  {
    "front": "Clear, specific question",
    "back": "Concise answer (1-3 sentences)",
    "difficulty": "easy|medium|hard",
    "tags": ["topic1", "concept2"]
  }
]`;

const QUIZ_SHAPE = `{
  "questions": [
    {
      "type": "multiple_choice",
      "question": "Clear question text",
      "options": ["A) First option", "B) Second option", "C) Third option", "D) Fourth option"],
      "correctAnswer": "A",
      "explanation": "Why this answer is correct",
      "difficulty": "easy|medium|hard"
    }
  ]
}`;

const MIND_MAP_SHAPE = `mindmap
  root((Main Topic))
    Subtopic 1
      Detail A
      Detail B
    Subtopic 2
      Detail C
      Detail D`;

/**
 * Expected output shape and the rules it must satisfy
 */
export function describeOutputFormat(artifact: ArtifactType, params: PromptParameters): string {
  switch (artifact) {
    case 'summary':
      return `Respond with ONLY a JSON object (no markdown, no backticks) with this structure:\n${SUMMARY_SHAPE}`;
    case 'cornellNotes':
      return (
        `Respond with ONLY a JSON object (no markdown, no backticks) with this structure:\n${CORNELL_SHAPE}\n\n` +
        'Generate 10-15 cue-note pairs that cover the main concepts. "cues" and "notes" must have the same length.'
      );
    case 'flashcards':
      return (
        `Respond with ONLY a JSON array of exactly ${params.numFlashcards} flashcards ` +
        `(no markdown, no backticks) with this structure:\n${FLASHCARD_SHAPE}`
      );
    case 'quiz':
      return (
        `Respond with ONLY a JSON object with exactly ${params.numQuizQuestions} questions ` +
        `(no markdown, no backticks) with this structure:\n${QUIZ_SHAPE}\n\n` +
        'Every question has exactly 4 distinct options, "correctAnswer" is one of "A", "B", "C" or "D", ' +
        'and "explanation" is never empty.'
      );
    case 'mindMap':
      return (
        'Respond with ONLY the Mermaid code (no markdown code fences, no backticks, no explanations).\n' +
        `Use this format:\n\n${MIND_MAP_SHAPE}\n\nKeep it clear and organized with 3-5 main branches.`
      );
  }
}

function taskLine(artifact: ArtifactType, params: PromptParameters): string {
  switch (artifact) {
    case 'summary':
      return 'Create a comprehensive summary of this document in JSON format.';
    case 'cornellNotes':
      return 'Create Cornell Notes from this document in JSON format.';
    case 'flashcards':
      return `Create ${params.numFlashcards} flashcards from this document in JSON format.`;
    case 'quiz':
      return `Create a ${params.numQuizQuestions}-question multiple-choice quiz from this document in JSON format.`;
    case 'mindMap':
      return 'Create a Mermaid mind map from this document.';
  }
}

function closingLine(artifact: ArtifactType): string | undefined {
  switch (artifact) {
    case 'flashcards':
      return 'Make flashcards that test real understanding, not just memorization.';
    case 'quiz':
      return 'Create questions that test understanding, not just recall.';
    default:
      return undefined;
  }
}

export function buildArtifactMessages(artifact: ArtifactType, params: PromptParameters): LLMMessage[] {
  const header = [taskLine(artifact, params), '', `Document: ${params.documentName}`];
  if (artifact === 'flashcards' || artifact === 'quiz') {
    header.push(`Difficulty: ${params.difficulty} - ${DIFFICULTY_GUIDANCE[params.difficulty]}`);
  }

  const sections = [header.join('\n'), `Text:\n${params.windowText}`, describeOutputFormat(artifact, params)];
  const closing = closingLine(artifact);
  if (closing) sections.push(closing);

  return [
    { role: 'system', content: SYSTEM_PROMPTS[artifact] },
    { role: 'user', content: sections.join('\n\n') },
  ];
}

const MAX_ISSUES_IN_REPAIR = 10;

/**
 * Follow-up prompt after malformed output: the original request, then a user message
 * listing what was wrong and restating the required format
 */
export function buildRepairMessages(
  artifact: ArtifactType,
  params: PromptParameters,
  issues: string[]
): LLMMessage[] {
  const listed = issues.slice(0, MAX_ISSUES_IN_REPAIR).map((issue) => `- ${issue}`);
  if (issues.length > MAX_ISSUES_IN_REPAIR) {
    listed.push(`- ...and ${issues.length - MAX_ISSUES_IN_REPAIR} more`);
  }

  return [
    ...buildArtifactMessages(artifact, params),
    {
      role: 'user',
      content: [
        'Your previous response could not be used because of these problems:',
        ...listed,
        '',
        'Answer again, fixing every problem.',
        describeOutputFormat(artifact, params),
      ].join('\n'),
    },
  ];
}
