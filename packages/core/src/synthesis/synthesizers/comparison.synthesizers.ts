import type { QuestionSynthesizer, SynthesisContext, SynthesisResult } from '../types.js';
import { skipped, synthesized } from '../types.js';
import { buildQuestion, defineSynthesizer, pickVariant, spanOf } from '../question-builder.js';
import {
  EVENT_COMPARISON_TEMPLATES,
  ORGANIZATION_COMPARISON_TEMPLATES,
  PERSON_COMPARISON_TEMPLATES,
  YEAR_GAP_TEMPLATES,
  fillTemplate,
} from '../templates.js';

const EVENT_PREFIX = 'evt_comp';
const ENTITY_PREFIX = 'ent_comp';
const TIME_PREFIX = 'time_comp';

export const comparisonEventSynthesizer: QuestionSynthesizer = defineSynthesizer(
  'comparison_event',
  EVENT_PREFIX,
  (context) => {
    const { events } = context.knowledgeBase;
    if (events.length < 2) {
      return skipped('fewer than two events loaded');
    }

    const [event1, event2] = context.rng.sample(events, 2);
    const template = context.rng.pick(EVENT_COMPARISON_TEMPLATES);

    return synthesized(
      buildQuestion(context, 'comparison_event', EVENT_PREFIX, {
        question: fillTemplate(template.question, { event1: event1.name, event2: event2.name }),
        answer: template.answer(event1, event2),
        difficulty: context.rng.int(2, 4),
        temporalGranularity: 'year',
        entities: [event1.name, event2.name],
        countries: [event1.location, event2.location],
        hopCount: 2,
        confidenceScore: 0.9,
        domain: 'comparison',
        requiresCalculation: false,
        complexityScore: 0.6,
      }),
    );
  },
);

function personComparison(context: SynthesisContext): SynthesisResult {
  const [person1, person2] = context.rng.sample(context.knowledgeBase.people, 2);
  const template = context.rng.pick(PERSON_COMPARISON_TEMPLATES);

  return synthesized(
    buildQuestion(context, 'comparison_entity', ENTITY_PREFIX, {
      question: fillTemplate(template.question, { person1: person1.name, person2: person2.name }),
      answer: template.answer(person1, person2),
      difficulty: context.rng.int(2, 4),
      temporalGranularity: 'year',
      entities: [person1.name, person2.name],
      countries: [person1.country, person2.country],
      hopCount: 2,
      confidenceScore: 0.9,
      domain: 'comparison',
      requiresCalculation: false,
      complexityScore: 0.6,
    }),
  );
}

function organizationComparison(context: SynthesisContext): SynthesisResult {
  const [org1, org2] = context.rng.sample(context.knowledgeBase.organizations, 2);
  const template = context.rng.pick(ORGANIZATION_COMPARISON_TEMPLATES);

  return synthesized(
    buildQuestion(context, 'comparison_entity', ENTITY_PREFIX, {
      question: fillTemplate(template.question, {
        organization1: org1.name,
        organization2: org2.name,
      }),
      answer: template.answer(org1, org2),
      difficulty: context.rng.int(2, 4),
      temporalGranularity: 'year',
      entities: [org1.name, org2.name],
      countries: [org1.country, org2.country],
      hopCount: 2,
      confidenceScore: 0.9,
      domain: 'comparison',
      requiresCalculation: false,
      complexityScore: 0.6,
    }),
  );
}

export const comparisonEntitySynthesizer: QuestionSynthesizer = defineSynthesizer(
  'comparison_entity',
  ENTITY_PREFIX,
  (context) => {
    const variant = pickVariant(context, [
      { available: (c) => c.knowledgeBase.people.length >= 2, run: personComparison },
      {
        available: (c) => c.knowledgeBase.organizations.length >= 2,
        run: organizationComparison,
      },
    ]);
    return variant ? variant.run(context) : skipped('fewer than two people or organizations');
  },
);

export const comparisonTimeSynthesizer: QuestionSynthesizer = defineSynthesizer(
  'comparison_time',
  TIME_PREFIX,
  (context) => {
    const { events } = context.knowledgeBase;
    if (events.length < 2) {
      return skipped('fewer than two events loaded');
    }

    const [event1, event2] = context.rng.sample(events, 2);
    if (event1.year === event2.year) {
      return skipped('events began in the same year');
    }

    const template = context.rng.pick(YEAR_GAP_TEMPLATES);

    return synthesized(
      buildQuestion(context, 'comparison_time', TIME_PREFIX, {
        question: fillTemplate(template.question, { event1: event1.name, event2: event2.name }),
        answer: template.answer(event1, event2),
        difficulty: context.rng.int(3, 4),
        temporalGranularity: 'year',
        span: spanOf(event1.year, event2.year),
        entities: [event1.name, event2.name],
        countries: [event1.location, event2.location],
        hopCount: 2,
        confidenceScore: 0.95,
        domain: 'comparison',
        requiresCalculation: true,
        complexityScore: 0.6,
      }),
    );
  },
);
