#!/usr/bin/env node
/**
 * Study CLI
 *
 * Turns local files and URLs into study materials and prints the batch report as JSON.
 *
 * Usage:
 *   tsx src/server/scripts/study-cli.ts <file-or-url>... [options]
 *
 * Options:
 *   --formats=summary,quiz       Artifacts to generate (cornellNotes, flashcards, quiz, summary, mindMap)
 *   --flashcards=30              Number of flashcards
 *   --quiz=20                    Number of quiz questions
 *   --difficulty=mixed           easy | medium | hard | mixed
 *   --budget=15000               Context budget in characters
 *   --window=distributed         prefix | distributed
 *   --min-words=500              Word count below which text is flagged insufficient
 *   --skip-insufficient          Do not generate for insufficient text
 *   --default-format=txt         Format to assume when detection fails
 *   --concurrency=3              Documents processed at once
 *   --retries=3                  Attempts per artifact
 *   --timeout=120000             Per-document deadline in milliseconds
 *   --out=report.json            Write the report to a file instead of stdout
 */

import { realpathSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import type { BatchOptionsInput } from '../config/pipelineOptions.js';
import {
  ARTIFACT_TYPES,
  DIFFICULTY_LEVELS,
  DOCUMENT_FORMATS,
  isDocumentFormat,
  type ArtifactType,
  type DifficultyLevel,
  type DocumentReference,
  type PipelineResult,
} from '../types/pipeline.js';
import { InvalidOptionsError, getErrorMessage } from '../types/errors.js';
import { BatchCoordinator } from '../services/ingestion/BatchCoordinator.js';
import { OpenAIProvider } from '../services/llm/OpenAIProvider.js';

export interface CliArguments {
  inputs: string[];
  options: BatchOptionsInput;
  out?: string;
}

const USAGE = 'Usage: study-cli <file-or-url>... [--formats=a,b] [--flashcards=n] [--quiz=n] [--out=file]';

function isArtifactType(value: string): value is ArtifactType {
  return (ARTIFACT_TYPES as readonly string[]).includes(value);
}

function isDifficultyLevel(value: string): value is DifficultyLevel {
  return (DIFFICULTY_LEVELS as readonly string[]).includes(value);
}

function parseInteger(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidOptionsError(`--${flag} expects an integer (got "${value}")`, [`${flag}: not an integer`]);
  }
  return parsed;
}

function invalid(flag: string, value: string, allowed: readonly string[]): InvalidOptionsError {
  return new InvalidOptionsError(`--${flag} must be one of ${allowed.join(', ')} (got "${value}")`, [
    `${flag}: unsupported value "${value}"`,
  ]);
}

/**
 * Split argv into inputs and batch options
 *
 * @throws InvalidOptionsError for unknown flags or malformed values
 */
export function parseCliArgs(argv: string[]): CliArguments {
  const inputs: string[] = [];
  const options: BatchOptionsInput = {};
  let out: string | undefined;

  for (const arg of argv) {
    if (!arg.startsWith('--')) {
      inputs.push(arg);
      continue;
    }

    const [flag, ...rest] = arg.slice(2).split('=');
    const value = rest.join('=');

    switch (flag) {
      case 'formats': {
        const formats = value.split(',').map((format) => format.trim()).filter(Boolean);
        const unknown = formats.find((format) => !isArtifactType(format));
        if (unknown !== undefined) throw invalid(flag, unknown, ARTIFACT_TYPES);
        options.outputFormats = formats.filter(isArtifactType);
        break;
      }
      case 'flashcards':
        options.numFlashcards = parseInteger(flag, value);
        break;
      case 'quiz':
        options.numQuizQuestions = parseInteger(flag, value);
        break;
      case 'difficulty':
        if (!isDifficultyLevel(value)) throw invalid(flag, value, DIFFICULTY_LEVELS);
        options.difficultyLevel = value;
        break;
      case 'budget':
        options.contextBudgetChars = parseInteger(flag, value);
        break;
      case 'window':
        if (value !== 'prefix' && value !== 'distributed') throw invalid(flag, value, ['prefix', 'distributed']);
        options.windowStrategy = value;
        break;
      case 'min-words':
        options.minWords = parseInteger(flag, value);
        break;
      case 'skip-insufficient':
        options.insufficientTextPolicy = 'skip';
        break;
      case 'default-format':
        if (!isDocumentFormat(value)) throw invalid(flag, value, DOCUMENT_FORMATS);
        options.defaultFormat = value;
        break;
      case 'concurrency':
        options.concurrencyLimit = parseInteger(flag, value);
        break;
      case 'retries':
        options.maxRetries = parseInteger(flag, value);
        break;
      case 'timeout':
        options.documentTimeoutMs = parseInteger(flag, value);
        break;
      case 'out':
        out = value;
        break;
      default:
        throw new InvalidOptionsError(`Unknown option --${flag}`, [`${flag}: unknown option`]);
    }
  }

  return { inputs, options, out };
}

/**
 * URLs are downloaded by the pipeline; anything else is read from disk
 *
 * A file that cannot be read yields a reference without bytes, which the pipeline reports as a fetch failure.
 */
export async function toReference(input: string): Promise<DocumentReference> {
  if (/^https?:\/\//i.test(input)) {
    return { id: input, url: input };
  }
  const filename = path.basename(input);
  try {
    const bytes = await readFile(input);
    return { id: input, bytes, filename };
  } catch (error) {
    console.error(`⚠️  Cannot read ${input}: ${getErrorMessage(error)}`);
    return { id: input, filename };
  }
}

function describe(result: PipelineResult): string {
  const icon = result.status === 'success' ? '✅' : result.status === 'partial' ? '⚠️ ' : '❌';
  const generated = result.statistics.generatedArtifacts.join(', ') || 'nothing';
  const firstError = result.errors[0] ? ` (${result.errors[0].code}: ${result.errors[0].message})` : '';
  return `${icon} ${result.documentId}: ${result.status}, generated ${generated}${firstError}`;
}

async function main(): Promise<void> {
  let cli: CliArguments;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`❌ ${getErrorMessage(error)}`);
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  if (cli.inputs.length === 0) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const provider = new OpenAIProvider();
  if (!(await provider.isAvailable())) {
    console.error('⚠️  OPENAI_API_KEY is not set; every generation attempt will fail');
  }

  const references = await Promise.all(cli.inputs.map(toReference));
  const coordinator = new BatchCoordinator({ provider });
  const report = await coordinator.run(references, cli.options, {
    onResult: (result) => console.error(describe(result)),
  });

  const json = JSON.stringify(report, null, 2);
  if (cli.out) {
    await writeFile(cli.out, json, 'utf-8');
    console.error(`📄 Report written to ${cli.out}`);
  } else {
    process.stdout.write(`${json}\n`);
  }

  const { documents, success, partial, failed } = report.totals;
  console.error(`\n${documents} documents: ${success} success, ${partial} partial, ${failed} failed`);
  if (documents > 0 && failed === documents) {
    process.exitCode = 1;
  }
}

/**
 * True when `entry` (argv[1]) resolves to this module, including through npm's bin symlink
 */
export function isMainModule(entry: string | undefined, moduleUrl: string): boolean {
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

// Run if called directly
if (isMainModule(process.argv[1], import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('❌ Error:', getErrorMessage(error));
    process.exitCode = 1;
  });
}
