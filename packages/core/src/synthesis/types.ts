import type { Rng } from '@chronoqa/shared/src/utils/rng.js';
import type { QuestionType, TemporalQuestion } from '@chronoqa/shared/src/types/question.types.js';
import type { KnowledgeBase } from '../knowledge/knowledge-base.js';

export interface SynthesisContext {
  readonly knowledgeBase: KnowledgeBase;
  readonly batchId: number;
  readonly rng: Rng;
  /** Nominal corpus window, used for default time spans. */
  readonly startYear: number;
  readonly endYear: number;
}

export type SynthesisResult =
  | { readonly status: 'ok'; readonly question: TemporalQuestion }
  | { readonly status: 'skipped'; readonly reason: string };

export interface QuestionSynthesizer {
  readonly type: QuestionType;
  readonly idPrefix: string;
  synthesize(context: SynthesisContext): SynthesisResult;
}

export function synthesized(question: TemporalQuestion): SynthesisResult {
  return { status: 'ok', question };
}

export function skipped(reason: string): SynthesisResult {
  return { status: 'skipped', reason };
}
