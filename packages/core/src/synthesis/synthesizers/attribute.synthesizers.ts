import type { QuestionSynthesizer, SynthesisContext, SynthesisResult } from '../types.js';
import { skipped, synthesized } from '../types.js';
import { buildQuestion, defineSynthesizer, pickVariant } from '../question-builder.js';
import {
  EVENT_ATTRIBUTE_TEMPLATES,
  ORGANIZATION_ATTRIBUTE_TEMPLATES,
  PERSON_ATTRIBUTE_TEMPLATES,
  YEAR_ACTIVE_TEMPLATES,
  YEAR_START_TEMPLATES,
  fillTemplate,
} from '../templates.js';

const EVENT_PREFIX = 'evt_attr';
const ENTITY_PREFIX = 'ent_attr';
const TIME_PREFIX = 'time_attr';

export const attributeEventSynthesizer: QuestionSynthesizer = defineSynthesizer(
  'attribute_event',
  EVENT_PREFIX,
  (context) => {
    const { events } = context.knowledgeBase;
    if (events.length === 0) {
      return skipped('no events loaded');
    }

    const event = context.rng.pick(events);
    const template = context.rng.pick(EVENT_ATTRIBUTE_TEMPLATES);

    return synthesized(
      buildQuestion(context, 'attribute_event', EVENT_PREFIX, {
        question: fillTemplate(template.question, { event: event.name }),
        answer: template.answer(event),
        difficulty: context.rng.int(1, 3),
        temporalGranularity: 'year',
        entities: [event.name],
        countries: [event.location],
        hopCount: 1,
        confidenceScore: 0.95,
        domain: event.domain,
        requiresCalculation: false,
        complexityScore: 0.3,
      }),
    );
  },
);

function personAttribute(context: SynthesisContext): SynthesisResult {
  const person = context.rng.pick(context.knowledgeBase.people);
  const template = context.rng.pick(PERSON_ATTRIBUTE_TEMPLATES);

  return synthesized(
    buildQuestion(context, 'attribute_entity', ENTITY_PREFIX, {
      question: fillTemplate(template.question, { person: person.name }),
      answer: template.answer(person),
      difficulty: context.rng.int(1, 3),
      temporalGranularity: 'year',
      entities: [person.name],
      countries: [person.country],
      hopCount: 1,
      confidenceScore: 0.95,
      domain: person.field.toLowerCase(),
      requiresCalculation: false,
      complexityScore: 0.3,
    }),
  );
}

function organizationAttribute(context: SynthesisContext): SynthesisResult {
  const organization = context.rng.pick(context.knowledgeBase.organizations);
  const template = context.rng.pick(ORGANIZATION_ATTRIBUTE_TEMPLATES);

  return synthesized(
    buildQuestion(context, 'attribute_entity', ENTITY_PREFIX, {
      question: fillTemplate(template.question, { organization: organization.name }),
      answer: template.answer(organization),
      difficulty: context.rng.int(1, 3),
      temporalGranularity: 'year',
      entities: [organization.name],
      countries: [organization.country],
      hopCount: 1,
      confidenceScore: 0.95,
      domain: 'organization',
      requiresCalculation: false,
      complexityScore: 0.3,
    }),
  );
}

export const attributeEntitySynthesizer: QuestionSynthesizer = defineSynthesizer(
  'attribute_entity',
  ENTITY_PREFIX,
  (context) => {
    const variant = pickVariant(context, [
      { available: (c) => c.knowledgeBase.people.length > 0, run: personAttribute },
      { available: (c) => c.knowledgeBase.organizations.length > 0, run: organizationAttribute },
    ]);
    return variant ? variant.run(context) : skipped('no people or organizations loaded');
  },
);

export const attributeTimeSynthesizer: QuestionSynthesizer = defineSynthesizer(
  'attribute_time',
  TIME_PREFIX,
  (context) => {
    const { events } = context.knowledgeBase;
    if (events.length === 0) {
      return skipped('no events loaded');
    }

    const event = context.rng.pick(events);
    const sameYear = events.filter((e) => e.domain === event.domain && e.year === event.year);
    if (sameYear.length > 1) {
      return skipped(`several ${event.domain} events began in ${String(event.year)}`);
    }

    const othersUnderWay = events.some(
      (e) =>
        e !== event &&
        e.domain === event.domain &&
        e.year <= event.year &&
        event.year <= e.endYear,
    );
    const template = context.rng.pick(
      othersUnderWay ? YEAR_START_TEMPLATES : [...YEAR_START_TEMPLATES, ...YEAR_ACTIVE_TEMPLATES],
    );

    return synthesized(
      buildQuestion(context, 'attribute_time', TIME_PREFIX, {
        question: fillTemplate(template.question, { domain: event.domain, year: event.year }),
        answer: template.answer(event),
        difficulty: context.rng.int(2, 3),
        temporalGranularity: 'year',
        span: { start: event.year, end: event.year },
        entities: [event.name],
        countries: [event.location],
        hopCount: 1,
        confidenceScore: 0.9,
        domain: event.domain,
        requiresCalculation: false,
        complexityScore: 0.4,
      }),
    );
  },
);
