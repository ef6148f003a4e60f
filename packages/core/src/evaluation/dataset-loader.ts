import { readFile } from 'node:fs/promises';
import { createChildLogger } from '@chronoqa/shared/src/logger.js';
import type { DatasetQuestion, FewShotExample } from '@chronoqa/shared/src/types/evaluation.types.js';
import { EvaluationError, toError } from '@chronoqa/shared/src/utils/errors.js';
import type { Rng } from '@chronoqa/shared/src/utils/rng.js';
import { parseCsv } from '../output/csv.js';

const log = createChildLogger('evaluation:dataset-loader');

const REQUIRED_COLUMNS = ['question', 'answer', 'question_type'] as const;
const MIN_QUESTION_LENGTH = 10;
const SAMPLED_TYPE_COUNT = 5;
const EXAMPLES_PER_TYPE = 10;
const MAX_EXAMPLES = 50;
const EXAMPLE_MIN_CONFIDENCE = 0.9;
const EXAMPLE_MAX_DIFFICULTY = 2;

function optionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Parses batch-file text, dropping rows without a usable question or answer. */
export function parseDatasetCsv(text: string, origin: string): DatasetQuestion[] {
  const parsed = parseCsv(text);
  if (parsed.length === 0) {
    throw new EvaluationError(`Dataset ${origin} is empty`);
  }
  const [header, ...rows] = parsed;

  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new EvaluationError(`Dataset ${origin} is missing columns: ${missing.join(', ')}`);
  }

  const columnIndex = new Map(header.map((column, index) => [column, index]));
  const cell = (row: readonly string[], column: string): string | undefined => {
    const index = columnIndex.get(column);
    return index === undefined ? undefined : row[index];
  };

  const questions: DatasetQuestion[] = [];
  for (const row of rows) {
    const question = cell(row, 'question')?.trim() ?? '';
    const answer = cell(row, 'answer')?.trim() ?? '';
    if (question.length <= MIN_QUESTION_LENGTH || answer.length === 0) {
      continue;
    }
    questions.push({
      question,
      answer,
      questionType: cell(row, 'question_type') ?? 'unknown',
      domain: cell(row, 'domain') || 'general',
      difficulty: optionalNumber(cell(row, 'difficulty')),
      confidenceScore: optionalNumber(cell(row, 'confidence_score')),
    });
  }
  return questions;
}

export async function loadEvaluationDataset(datasetPath: string): Promise<DatasetQuestion[]> {
  let text: string;
  try {
    text = await readFile(datasetPath, 'utf-8');
  } catch (error) {
    throw new EvaluationError(`Failed to read dataset ${datasetPath}`, toError(error));
  }

  const questions = parseDatasetCsv(text, datasetPath);
  log.info({ datasetPath, questions: questions.length }, 'Evaluation dataset loaded');
  return questions;
}

/** The first five question types, in order of first appearance. */
export function leadingQuestionTypes(questions: readonly DatasetQuestion[]): string[] {
  const types: string[] = [];
  for (const { questionType } of questions) {
    if (!types.includes(questionType)) {
      types.push(questionType);
      if (types.length === SAMPLED_TYPE_COUNT) {
        break;
      }
    }
  }
  return types;
}

/** Equal share per leading type; types with fewer rows contribute all they have. */
export function createStratifiedSample(
  questions: readonly DatasetQuestion[],
  sampleSize: number,
  rng: Rng,
): DatasetQuestion[] {
  const types = leadingQuestionTypes(questions);
  if (types.length === 0) {
    return [];
  }
  const perType = Math.floor(sampleSize / types.length);

  return types.flatMap((type) => {
    const ofType = questions.filter((q) => q.questionType === type);
    return rng.sample(ofType, Math.min(perType, ofType.length));
  });
}

/** Easy, high-confidence rows; columns absent from the dataset do not filter. */
export function selectFewShotExamples(
  questions: readonly DatasetQuestion[],
  rng: Rng,
): FewShotExample[] {
  const candidates = questions.filter(
    (q) =>
      (q.confidenceScore === undefined || q.confidenceScore >= EXAMPLE_MIN_CONFIDENCE) &&
      (q.difficulty === undefined || q.difficulty <= EXAMPLE_MAX_DIFFICULTY),
  );

  const examples = leadingQuestionTypes(questions).flatMap((type) => {
    const ofType = candidates.filter((q) => q.questionType === type);
    return rng
      .sample(ofType, Math.min(EXAMPLES_PER_TYPE, ofType.length))
      .map((q): FewShotExample => ({ question: q.question, answer: q.answer, type }));
  });

  return examples.slice(0, MAX_EXAMPLES);
}
