export const QUESTION_TYPES = [
  'attribute_event',
  'attribute_entity',
  'attribute_time',
  'comparison_event',
  'comparison_entity',
  'comparison_time',
  'counting_event',
  'counting_entity',
  'causal_reasoning',
  'duration_estimation',
  'sequence_ordering',
  'cross_domain',
  'temporal_clustering',
  'multi_granular',
  'counterfactual',
  'temporal_overlap',
] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

export type TemporalGranularity = 'year' | 'decade' | 'century';

export type QuestionSourceType = 'curated';

export interface TemporalQuestion {
  readonly id: string;
  readonly question: string;
  readonly answer: string;
  readonly questionType: QuestionType;
  /** 1 (very easy) to 5 (very hard). */
  readonly difficulty: number;
  readonly temporalGranularity: TemporalGranularity;
  /** ISO date, `YYYY-01-01`. */
  readonly timeSpanStart: string;
  /** ISO date, `YYYY-12-31`. */
  readonly timeSpanEnd: string;
  readonly entitiesQuestion: readonly string[];
  readonly countriesQuestion: readonly string[];
  readonly hopCount: number;
  readonly confidenceScore: number;
  readonly domain: string;
  readonly requiresCalculation: boolean;
  readonly complexityScore: number;
  readonly sourceType: QuestionSourceType;
  readonly batchId: number;
}

/** CSV column order shared by every batch file. */
export const QUESTION_FIELDS = [
  'id',
  'question',
  'answer',
  'question_type',
  'difficulty',
  'temporal_granularity',
  'time_span_start',
  'time_span_end',
  'entities_question',
  'countries_question',
  'hop_count',
  'confidence_score',
  'domain',
  'requires_calculation',
  'complexity_score',
  'source_type',
  'batch_id',
] as const;

export type QuestionField = (typeof QUESTION_FIELDS)[number];

export type QuestionRow = Readonly<Record<QuestionField, string | number | boolean | readonly string[]>>;

export function toQuestionRow(question: TemporalQuestion): QuestionRow {
  return {
    id: question.id,
    question: question.question,
    answer: question.answer,
    question_type: question.questionType,
    difficulty: question.difficulty,
    temporal_granularity: question.temporalGranularity,
    time_span_start: question.timeSpanStart,
    time_span_end: question.timeSpanEnd,
    entities_question: question.entitiesQuestion,
    countries_question: question.countriesQuestion,
    hop_count: question.hopCount,
    confidence_score: question.confidenceScore,
    domain: question.domain,
    requires_calculation: question.requiresCalculation,
    complexity_score: question.complexityScore,
    source_type: question.sourceType,
    batch_id: question.batchId,
  };
}
