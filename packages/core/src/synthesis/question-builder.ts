import type { Rng } from '@chronoqa/shared/src/utils/rng.js';
import type {
  QuestionType,
  TemporalGranularity,
  TemporalQuestion,
} from '@chronoqa/shared/src/types/question.types.js';
import type { QuestionSynthesizer, SynthesisContext, SynthesisResult } from './types.js';

const ID_SUFFIX_LENGTH = 12;

export interface YearSpan {
  readonly start: number;
  readonly end: number;
}

export interface QuestionDraft {
  readonly question: string;
  readonly answer: string;
  readonly difficulty: number;
  readonly temporalGranularity: TemporalGranularity;
  /** Defaults to the configured corpus window. */
  readonly span?: YearSpan;
  readonly entities: readonly string[];
  readonly countries: readonly string[];
  readonly hopCount: number;
  readonly confidenceScore: number;
  readonly domain: string;
  readonly requiresCalculation: boolean;
  readonly complexityScore: number;
}

function formatYear(year: number): string {
  return String(year).padStart(4, '0');
}

export function spanStart(year: number): string {
  return `${formatYear(year)}-01-01`;
}

export function spanEnd(year: number): string {
  return `${formatYear(year)}-12-31`;
}

export function spanOf(...years: number[]): YearSpan {
  return { start: Math.min(...years), end: Math.max(...years) };
}

export function questionId(prefix: string, batchId: number, rng: Rng): string {
  return `${prefix}_${String(batchId)}_${rng.token(ID_SUFFIX_LENGTH)}`;
}

export function buildQuestion(
  context: SynthesisContext,
  type: QuestionType,
  idPrefix: string,
  draft: QuestionDraft,
): TemporalQuestion {
  const span = draft.span ?? { start: context.startYear, end: context.endYear };

  return {
    id: questionId(idPrefix, context.batchId, context.rng),
    question: draft.question,
    answer: draft.answer,
    questionType: type,
    difficulty: draft.difficulty,
    temporalGranularity: draft.temporalGranularity,
    timeSpanStart: spanStart(span.start),
    timeSpanEnd: spanEnd(span.end),
    entitiesQuestion: draft.entities,
    countriesQuestion: draft.countries,
    hopCount: draft.hopCount,
    confidenceScore: draft.confidenceScore,
    domain: draft.domain,
    requiresCalculation: draft.requiresCalculation,
    complexityScore: draft.complexityScore,
    sourceType: 'curated',
    batchId: context.batchId,
  };
}

/** A synthesizer whose variants are alternative ways of producing its question type. */
export interface SynthesisVariant {
  readonly available: (context: SynthesisContext) => boolean;
  readonly run: (context: SynthesisContext) => SynthesisResult;
}

export function defineSynthesizer(
  type: QuestionType,
  idPrefix: string,
  synthesize: (context: SynthesisContext) => SynthesisResult,
): QuestionSynthesizer {
  return { type, idPrefix, synthesize };
}

export function pickVariant(
  context: SynthesisContext,
  variants: readonly SynthesisVariant[],
): SynthesisVariant | undefined {
  const available = variants.filter((variant) => variant.available(context));
  return available.length > 0 ? context.rng.pick(available) : undefined;
}
