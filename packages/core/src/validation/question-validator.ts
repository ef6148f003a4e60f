import type { TemporalQuestion } from '@chronoqa/shared/src/types/question.types.js';

export type ValidationStage = 'structural' | 'content' | 'quality' | 'temporal';

export type ValidationOutcome =
  | { readonly accepted: true }
  | { readonly accepted: false; readonly stage: ValidationStage; readonly reason: string };

export interface QuestionValidatorOptions {
  /** Minimum confidence score; defaults to 0.7. */
  readonly minConfidence?: number;
  readonly checkTemporalConsistency?: boolean;
}

export interface QuestionValidator {
  evaluate(question: TemporalQuestion): ValidationOutcome;
  validate(question: TemporalQuestion): boolean;
  /** Every failing reason across all stages, without stopping at the first. */
  getValidationErrors(question: TemporalQuestion): string[];
}

const DEFAULT_MIN_CONFIDENCE = 0.7;
const MIN_QUESTION_LENGTH = 10;
const MAX_QUESTION_LENGTH = 300;
const MAX_ANSWER_LENGTH = 100;
const MIN_QUESTION_WORDS = 5;

const FORBIDDEN_FRAGMENTS = ['{', '}', 'None', 'N/A', 'null'] as const;
const PLACEHOLDER_ANSWERS = new Set(['unknown', 'none', '', '0']);

interface Check {
  readonly stage: ValidationStage;
  readonly run: (question: TemporalQuestion) => string | undefined;
}

function structuralChecks(): Check[] {
  return [
    {
      stage: 'structural',
      run: (q) => (q.id.trim() === '' ? 'missing id' : undefined),
    },
    {
      stage: 'structural',
      run: (q) => (q.questionType.trim() === '' ? 'missing question type' : undefined),
    },
    {
      stage: 'structural',
      run: (q) =>
        q.question.length < MIN_QUESTION_LENGTH || q.question.length > MAX_QUESTION_LENGTH
          ? `question length ${String(q.question.length)} outside ${String(MIN_QUESTION_LENGTH)}-${String(MAX_QUESTION_LENGTH)}`
          : undefined,
    },
    {
      stage: 'structural',
      run: (q) =>
        q.answer.length < 1 || q.answer.length > MAX_ANSWER_LENGTH
          ? `answer length ${String(q.answer.length)} outside 1-${String(MAX_ANSWER_LENGTH)}`
          : undefined,
    },
  ];
}

function contentChecks(): Check[] {
  return [
    {
      stage: 'content',
      run: (q) => {
        const fragment = FORBIDDEN_FRAGMENTS.find(
          (f) => q.question.includes(f) || q.answer.includes(f),
        );
        return fragment ? `contains placeholder text "${fragment}"` : undefined;
      },
    },
    {
      stage: 'content',
      run: (q) =>
        PLACEHOLDER_ANSWERS.has(q.answer.trim().toLowerCase())
          ? `answer "${q.answer}" carries no information`
          : undefined,
    },
    {
      stage: 'content',
      run: (q) => {
        const words = q.question.split(/\s+/).filter((word) => word.length > 0).length;
        return words < MIN_QUESTION_WORDS
          ? `question has ${String(words)} words, fewer than ${String(MIN_QUESTION_WORDS)}`
          : undefined;
      },
    },
  ];
}

function qualityChecks(minConfidence: number): Check[] {
  return [
    {
      stage: 'quality',
      run: (q) =>
        q.confidenceScore < minConfidence
          ? `confidence ${String(q.confidenceScore)} below ${String(minConfidence)}`
          : undefined,
    },
    {
      stage: 'quality',
      run: (q) =>
        q.difficulty < 1 || q.difficulty > 5
          ? `difficulty ${String(q.difficulty)} outside 1-5`
          : undefined,
    },
    {
      stage: 'quality',
      run: (q) =>
        q.hopCount < 1 || q.hopCount > 10 ? `hop count ${String(q.hopCount)} outside 1-10` : undefined,
    },
  ];
}

function parseSpanYear(date: string): number | undefined {
  const match = /^(-?\d{1,4})-\d{2}-\d{2}$/.exec(date);
  return match ? Number(match[1]) : undefined;
}

function temporalChecks(): Check[] {
  return [
    {
      stage: 'temporal',
      run: (q) => {
        if (q.timeSpanStart === '' || q.timeSpanEnd === '') {
          return undefined;
        }
        const start = parseSpanYear(q.timeSpanStart);
        const end = parseSpanYear(q.timeSpanEnd);
        if (start === undefined || end === undefined) {
          return `unparseable time span ${q.timeSpanStart}..${q.timeSpanEnd}`;
        }
        return start > end ? `time span starts after it ends (${String(start)} > ${String(end)})` : undefined;
      },
    },
  ];
}

export function createQuestionValidator(options: QuestionValidatorOptions = {}): QuestionValidator {
  const minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
  const checkTemporalConsistency = options.checkTemporalConsistency ?? true;

  const checks: Check[] = [
    ...structuralChecks(),
    ...contentChecks(),
    ...qualityChecks(minConfidence),
    ...(checkTemporalConsistency ? temporalChecks() : []),
  ];

  function evaluate(question: TemporalQuestion): ValidationOutcome {
    for (const check of checks) {
      const reason = check.run(question);
      if (reason !== undefined) {
        return { accepted: false, stage: check.stage, reason };
      }
    }
    return { accepted: true };
  }

  return {
    evaluate,

    validate(question) {
      return evaluate(question).accepted;
    },

    getValidationErrors(question) {
      return checks
        .map((check) => check.run(question))
        .filter((reason): reason is string => reason !== undefined);
    },
  };
}
