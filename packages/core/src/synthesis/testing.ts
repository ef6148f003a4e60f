import type { Rng } from '@chronoqa/shared/src/utils/rng.js';
import type { TemporalQuestion } from '@chronoqa/shared/src/types/question.types.js';
import { createKnowledgeBase } from '../knowledge/knowledge-base.js';
import type { KnowledgeDataInput } from '../knowledge/knowledge-base.js';
import type { SynthesisContext, SynthesisResult } from './types.js';

/** Test double that always takes the first option, so every draw is predictable. */
export function firstChoiceRng(): Rng {
  return {
    seed: 0,
    next: () => 0,
    int: (min) => min,
    pick: (values) => values[0],
    sample: (values, count) => values.slice(0, count),
    shuffle: (values) => [...values],
    token: (length) => '0'.repeat(length),
  };
}

/** Like `firstChoiceRng`, but `pick` takes the last option. */
export function lastChoiceRng(): Rng {
  return { ...firstChoiceRng(), pick: (values) => values[values.length - 1] };
}

export async function contextFor(
  data: KnowledgeDataInput,
  rng: Rng = firstChoiceRng(),
): Promise<SynthesisContext> {
  const knowledgeBase = createKnowledgeBase({ data });
  await knowledgeBase.load();
  return { knowledgeBase, batchId: 1, rng, startYear: 1800, endYear: 2025 };
}

export function questionOf(result: SynthesisResult): TemporalQuestion {
  if (result.status !== 'ok') {
    throw new Error(`expected a question, got skipped: ${result.reason}`);
  }
  return result.question;
}
