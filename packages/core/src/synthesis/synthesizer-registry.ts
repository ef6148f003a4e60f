import { QUESTION_TYPES } from '@chronoqa/shared/src/types/question.types.js';
import type { QuestionType } from '@chronoqa/shared/src/types/question.types.js';
import { SynthesisError } from '@chronoqa/shared/src/utils/errors.js';
import type { QuestionSynthesizer } from './types.js';
import {
  attributeEntitySynthesizer,
  attributeEventSynthesizer,
  attributeTimeSynthesizer,
} from './synthesizers/attribute.synthesizers.js';
import {
  comparisonEntitySynthesizer,
  comparisonEventSynthesizer,
  comparisonTimeSynthesizer,
} from './synthesizers/comparison.synthesizers.js';
import {
  countingEntitySynthesizer,
  countingEventSynthesizer,
} from './synthesizers/counting.synthesizers.js';
import {
  causalReasoningSynthesizer,
  counterfactualSynthesizer,
  crossDomainSynthesizer,
  durationEstimationSynthesizer,
  sequenceOrderingSynthesizer,
} from './synthesizers/reasoning.synthesizers.js';
import {
  multiGranularSynthesizer,
  temporalClusteringSynthesizer,
  temporalOverlapSynthesizer,
} from './synthesizers/temporal.synthesizers.js';

export const DEFAULT_SYNTHESIZERS: readonly QuestionSynthesizer[] = [
  attributeEventSynthesizer,
  attributeEntitySynthesizer,
  attributeTimeSynthesizer,
  comparisonEventSynthesizer,
  comparisonEntitySynthesizer,
  comparisonTimeSynthesizer,
  countingEventSynthesizer,
  countingEntitySynthesizer,
  causalReasoningSynthesizer,
  durationEstimationSynthesizer,
  sequenceOrderingSynthesizer,
  crossDomainSynthesizer,
  temporalClusteringSynthesizer,
  multiGranularSynthesizer,
  counterfactualSynthesizer,
  temporalOverlapSynthesizer,
];

export interface SynthesizerRegistry {
  get(type: QuestionType): QuestionSynthesizer;
  has(type: QuestionType): boolean;
  /** Registered types in canonical enumeration order. */
  types(): QuestionType[];
}

export function createSynthesizerRegistry(
  synthesizers: readonly QuestionSynthesizer[] = DEFAULT_SYNTHESIZERS,
): SynthesizerRegistry {
  const byType = new Map<QuestionType, QuestionSynthesizer>();
  for (const synthesizer of synthesizers) {
    if (byType.has(synthesizer.type)) {
      throw new SynthesisError(`Duplicate synthesizer for question type ${synthesizer.type}`);
    }
    byType.set(synthesizer.type, synthesizer);
  }

  return {
    get(type) {
      const synthesizer = byType.get(type);
      if (!synthesizer) {
        throw new SynthesisError(`No synthesizer registered for question type ${type}`);
      }
      return synthesizer;
    },

    has(type) {
      return byType.has(type);
    },

    types() {
      return QUESTION_TYPES.filter((type) => byType.has(type));
    },
  };
}
