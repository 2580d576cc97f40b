/**
 * Zod schemas for generated study artifacts
 *
 * The generation service returns loosely formatted JSON; these schemas accept the common
 * variations (upper-case difficulty, "A)" answer prefixes, missing tags) and reject
 * anything that would make an artifact unusable.
 */

import { z } from 'zod';

export const ITEM_DIFFICULTIES = ['easy', 'medium', 'hard'] as const;
export const ANSWER_LETTERS = ['A', 'B', 'C', 'D'] as const;
export type AnswerLetter = (typeof ANSWER_LETTERS)[number];

const nonEmptyText = z.string().trim().min(1, 'must not be empty');

const itemDifficulty = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(ITEM_DIFFICULTIES))
  .default('medium');

export const CornellNotesSchema = z
  .object({
    cues: z.array(nonEmptyText).min(1, 'at least one cue is required'),
    notes: z.array(nonEmptyText).min(1, 'at least one note is required'),
    summary: nonEmptyText,
  })
  .refine((value) => value.cues.length === value.notes.length, {
    message: 'cues and notes must pair up one to one',
    path: ['notes'],
  });

export const FlashcardSchema = z.object({
  front: nonEmptyText,
  back: nonEmptyText,
  difficulty: itemDifficulty,
  tags: z.array(z.string().trim()).default([]),
});

export const FlashcardListSchema = z.array(FlashcardSchema).min(1, 'at least one flashcard is required');

/**
 * Strip an "A) " / "(B)" / "C. " label from an option
 */
export function stripOptionLabel(option: string): string {
  return option.replace(/^\s*\(?[A-Da-d][).:]\s+/, '').trim();
}

/**
 * Resolve the answer to a letter: the option text itself, "A", "a", "(B)", "b)", or "C. text"
 *
 * Option text is matched first so that answers starting with the article "A" are not read as labels.
 */
export function resolveAnswerLetter(answer: string, options: string[]): AnswerLetter | undefined {
  const trimmed = answer.trim();

  const wanted = stripOptionLabel(trimmed).toLowerCase();
  const index = options.findIndex((option) => stripOptionLabel(option).toLowerCase() === wanted);
  if (index >= 0) return ANSWER_LETTERS[index];

  const labelled = /^\(?([A-Da-d])\)?[.:]?$/.exec(trimmed) ?? /^\(?([A-Da-d])[).:]\s/.exec(trimmed);
  if (!labelled) return undefined;

  const letter = labelled[1].toUpperCase();
  return ANSWER_LETTERS.find((candidate) => candidate === letter);
}

export const QuizQuestionSchema = z
  .object({
    type: z.literal('multiple_choice').default('multiple_choice'),
    question: nonEmptyText,
    options: z.array(nonEmptyText).length(4, 'exactly 4 options are required'),
    correctAnswer: z.string(),
    explanation: nonEmptyText,
    difficulty: itemDifficulty,
  })
  .transform((value, ctx) => {
    const distinct = new Set(value.options.map((option) => stripOptionLabel(option).toLowerCase()));
    if (distinct.size !== value.options.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'options must be distinct', path: ['options'] });
      return z.NEVER;
    }

    const correctAnswer = resolveAnswerLetter(value.correctAnswer, value.options);
    if (!correctAnswer) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `correctAnswer must be one of A, B, C, D (got "${value.correctAnswer}")`,
        path: ['correctAnswer'],
      });
      return z.NEVER;
    }

    return { ...value, correctAnswer };
  });

export const QuizSchema = z.object({
  questions: z.array(QuizQuestionSchema).min(1, 'at least one question is required'),
});

export const SummarySchema = z.object({
  overview: nonEmptyText,
  keyPoints: z
    .array(
      z.object({
        point: nonEmptyText,
        details: z.string().trim().default(''),
      })
    )
    .min(1, 'at least one key point is required'),
  conclusion: nonEmptyText,
});

export type CornellNotes = z.output<typeof CornellNotesSchema>;
export type Flashcard = z.output<typeof FlashcardSchema>;
export type QuizQuestion = z.output<typeof QuizQuestionSchema>;
export type Quiz = z.output<typeof QuizSchema>;
export type Summary = z.output<typeof SummarySchema>;
