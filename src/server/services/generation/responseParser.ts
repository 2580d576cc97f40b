/**
 * Response parsing and repair for generated artifacts
 *
 * Model output often arrives wrapped in code fences or prose, with trailing commas, or
 * with the expected array nested under a single key. Parsing strips those, extracts the
 * outermost JSON value and validates it against the artifact schema.
 */

import type { z } from 'zod';
import type { ArtifactType, StudyMaterialSet } from '../../types/pipeline.js';
import {
  CornellNotesSchema,
  FlashcardListSchema,
  QuizSchema,
  SummarySchema,
} from './artifactSchemas.js';

export type ParseOutcome<T> = { success: true; data: T } | { success: false; issues: string[] };

type ArtifactValue<K extends ArtifactType> = NonNullable<StudyMaterialSet[K]>;

const MIND_MAP_HEADER = /^mindmap\s*$/;

/**
 * Remove ```json ... ``` style fences, keeping their content
 */
export function stripCodeFences(text: string): string {
  const fenced = /```[a-zA-Z]*[ \t]*\n?([\s\S]*?)\n?```/.exec(text);
  if (fenced) return fenced[1].trim();
  return text.replace(/^```[a-zA-Z]*\s*/, '').replace(/\s*```\s*$/, '').trim();
}

/**
 * Find the first JSON object or array and return it up to its matching bracket
 */
export function extractJsonValue(text: string): string | undefined {
  const start = text.search(/[{[]/);
  if (start < 0) return undefined;

  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '{' || char === '[') {
      stack.push(char === '{' ? '}' : ']');
    } else if (char === '}' || char === ']') {
      if (stack.pop() !== char) return undefined;
      if (stack.length === 0) return text.slice(start, i + 1);
    }
  }
  return undefined;
}

/**
 * Drop commas that directly precede a closing bracket, outside string literals
 */
export function removeTrailingCommas(json: string): string {
  let result = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < json.length; i++) {
    const char = json[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      result += char;
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === ',') {
      const rest = json.slice(i + 1).trimStart();
      if (rest.startsWith('}') || rest.startsWith(']')) continue;
    }
    result += char;
  }
  return result;
}

/**
 * Parse JSON out of a model response, repairing what can be repaired
 */
export function parseJsonResponse(content: string): ParseOutcome<unknown> {
  const stripped = stripCodeFences(content);
  const candidates = [stripped];
  const extracted = extractJsonValue(stripped);
  if (extracted && extracted !== stripped) candidates.push(extracted);

  let lastError = 'response contains no JSON value';
  for (const candidate of candidates) {
    for (const text of [candidate, removeTrailingCommas(candidate)]) {
      try {
        return { success: true, data: JSON.parse(text) };
      } catch (error) {
        lastError = error instanceof Error ? error.message : String(error);
      }
    }
  }
  return { success: false, issues: [`response is not valid JSON: ${lastError}`] };
}

/**
 * { "flashcards": [...] } → [...]
 */
export function unwrapSingleKeyArray(value: unknown): unknown {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    const entries = Object.values(value);
    if (entries.length === 1 && Array.isArray(entries[0])) return entries[0];
  }
  return value;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${location}: ${issue.message}`;
  });
}

function validate<S extends z.ZodTypeAny>(schema: S, value: unknown): ParseOutcome<z.output<S>> {
  const result = schema.safeParse(value);
  return result.success ? { success: true, data: result.data } : { success: false, issues: formatIssues(result.error) };
}

/**
 * Mermaid mind map: fences stripped, starts at the `mindmap` line, root plus at least one branch
 */
export function parseMindMap(content: string): ParseOutcome<string> {
  const lines = stripCodeFences(content)
    .split('\n')
    .map((line) => line.replace(/\s+$/, ''));
  const header = lines.findIndex((line) => MIND_MAP_HEADER.test(line.trim()));
  if (header < 0) {
    return { success: false, issues: ['mind map must start with a "mindmap" line'] };
  }

  const body = lines.slice(header + 1).filter((line) => line.trim().length > 0);
  if (body.length < 2) {
    return { success: false, issues: ['mind map needs a root node and at least one branch'] };
  }
  return { success: true, data: ['mindmap', ...body].join('\n') };
}

/**
 * Parse and validate one artifact
 */
export function parseArtifact<K extends ArtifactType>(artifact: K, content: string): ParseOutcome<ArtifactValue<K>>;
export function parseArtifact(artifact: ArtifactType, content: string): ParseOutcome<ArtifactValue<ArtifactType>> {
  if (artifact === 'mindMap') {
    return parseMindMap(content);
  }

  const parsed = parseJsonResponse(content);
  if (!parsed.success) return parsed;

  switch (artifact) {
    case 'cornellNotes':
      return validate(CornellNotesSchema, parsed.data);
    case 'flashcards':
      return validate(FlashcardListSchema, unwrapSingleKeyArray(parsed.data));
    case 'quiz':
      return validate(QuizSchema, Array.isArray(parsed.data) ? { questions: parsed.data } : parsed.data);
    case 'summary':
      return validate(SummarySchema, parsed.data);
  }
}
