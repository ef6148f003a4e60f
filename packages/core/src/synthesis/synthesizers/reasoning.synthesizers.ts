import type { HistoricalEvent } from '@chronoqa/shared/src/types/knowledge.types.js';
import type { QuestionSynthesizer, SynthesisContext, SynthesisResult } from '../types.js';
import { skipped, synthesized } from '../types.js';
import { buildQuestion, defineSynthesizer, pickVariant, spanOf } from '../question-builder.js';
import {
  COUNTERFACTUAL_PRECEDENCE_PATTERNS,
  COUNTERFACTUAL_SHIFT_PATTERNS,
  EVENT_DURATION_TEMPLATES,
  EVENT_INFLUENCE_TEMPLATES,
  LIFESPAN_TEMPLATES,
  ORGANIZATION_EVENT_TEMPLATES,
  ORGANIZATION_INFLUENCE_TEMPLATES,
  PERSON_EVENT_TEMPLATES,
  SEQUENCE_PATTERNS,
  fillTemplate,
  yesNo,
} from '../templates.js';

const CAUSAL_PREFIX = 'causal';
const DURATION_PREFIX = 'duration';
const SEQUENCE_PREFIX = 'sequence';
const CROSS_PREFIX = 'cross';
const COUNTERFACTUAL_PREFIX = 'counterfactual';

export const COUNTERFACTUAL_OFFSETS = [5, 10, 20, 25, 50] as const;
export const COUNTERFACTUAL_DIRECTIONS = ['earlier', 'later'] as const;

export type CounterfactualDirection = (typeof COUNTERFACTUAL_DIRECTIONS)[number];

export function shiftYear(year: number, offset: number, direction: CounterfactualDirection): number {
  return direction === 'earlier' ? year - offset : year + offset;
}

/** Names ordered by start year; callers guarantee the years are distinct. */
export function chronologicalOrder(events: readonly HistoricalEvent[]): string[] {
  return [...events].sort((a, b) => a.year - b.year).map((e) => e.name);
}

// -- causal_reasoning --

function eventInfluence(context: SynthesisContext): SynthesisResult {
  const [event1, event2] = context.rng.sample(context.knowledgeBase.events, 2);
  const template = context.rng.pick(EVENT_INFLUENCE_TEMPLATES);

  return synthesized(
    buildQuestion(context, 'causal_reasoning', CAUSAL_PREFIX, {
      question: fillTemplate(template.question, { event1: event1.name, event2: event2.name }),
      answer: template.answer(event1, event2),
      difficulty: context.rng.int(4, 5),
      temporalGranularity: 'year',
      span: spanOf(event1.year, event2.year),
      entities: [event1.name, event2.name],
      countries: [event1.location, event2.location],
      hopCount: 2,
      confidenceScore: 0.85,
      domain: 'causal',
      requiresCalculation: false,
      complexityScore: 0.8,
    }),
  );
}

function organizationInfluence(context: SynthesisContext): SynthesisResult {
  const organization = context.rng.pick(context.knowledgeBase.organizations);
  const event = context.rng.pick(context.knowledgeBase.events);
  const template = context.rng.pick(ORGANIZATION_INFLUENCE_TEMPLATES);

  return synthesized(
    buildQuestion(context, 'causal_reasoning', CAUSAL_PREFIX, {
      question: fillTemplate(template.question, {
        organization: organization.name,
        event: event.name,
      }),
      answer: template.answer(organization, event),
      difficulty: context.rng.int(4, 5),
      temporalGranularity: 'year',
      span: spanOf(organization.inceptionYear, event.year),
      entities: [organization.name, event.name],
      countries: [organization.country, event.location],
      hopCount: 2,
      confidenceScore: 0.85,
      domain: 'causal',
      requiresCalculation: false,
      complexityScore: 0.8,
    }),
  );
}

export const causalReasoningSynthesizer: QuestionSynthesizer = defineSynthesizer(
  'causal_reasoning',
  CAUSAL_PREFIX,
  (context) => {
    const variant = pickVariant(context, [
      { available: (c) => c.knowledgeBase.events.length >= 2, run: eventInfluence },
      {
        available: (c) =>
          c.knowledgeBase.organizations.length > 0 && c.knowledgeBase.events.length > 0,
        run: organizationInfluence,
      },
    ]);
    return variant ? variant.run(context) : skipped('not enough events or organizations');
  },
);

// -- duration_estimation --

function eventDuration(context: SynthesisContext): SynthesisResult {
  const ranged = context.knowledgeBase.events.filter((e) => e.endYear > e.year);
  const event = context.rng.pick(ranged);
  const template = context.rng.pick(EVENT_DURATION_TEMPLATES);

  return synthesized(
    buildQuestion(context, 'duration_estimation', DURATION_PREFIX, {
      question: fillTemplate(template.question, { event: event.name }),
      answer: template.answer(event),
      difficulty: context.rng.int(2, 4),
      temporalGranularity: 'year',
      span: { start: event.year, end: event.endYear },
      entities: [event.name],
      countries: [event.location],
      hopCount: 1,
      confidenceScore: 0.95,
      domain: event.domain,
      requiresCalculation: true,
      complexityScore: 0.5,
    }),
  );
}

function lifespan(context: SynthesisContext): SynthesisResult {
  const deceased = context.knowledgeBase.people.filter((p) => p.deathYear !== null);
  const person = context.rng.pick(deceased);
  const template = context.rng.pick(LIFESPAN_TEMPLATES);

  return synthesized(
    buildQuestion(context, 'duration_estimation', DURATION_PREFIX, {
      question: fillTemplate(template.question, { person: person.name }),
      answer: template.answer(person),
      difficulty: context.rng.int(2, 4),
      temporalGranularity: 'year',
      span: { start: person.birthYear, end: person.deathYear ?? person.birthYear },
      entities: [person.name],
      countries: [person.country],
      hopCount: 1,
      confidenceScore: 0.95,
      domain: person.field.toLowerCase(),
      requiresCalculation: true,
      complexityScore: 0.5,
    }),
  );
}

export const durationEstimationSynthesizer: QuestionSynthesizer = defineSynthesizer(
  'duration_estimation',
  DURATION_PREFIX,
  (context) => {
    const variant = pickVariant(context, [
      { available: (c) => c.knowledgeBase.events.some((e) => e.endYear > e.year), run: eventDuration },
      { available: (c) => c.knowledgeBase.people.some((p) => p.deathYear !== null), run: lifespan },
    ]);
    return variant ? variant.run(context) : skipped('no ranged events or deceased people');
  },
);

// -- sequence_ordering --

export const sequenceOrderingSynthesizer: QuestionSynthesizer = defineSynthesizer(
  'sequence_ordering',
  SEQUENCE_PREFIX,
  (context) => {
    const { events } = context.knowledgeBase;
    if (events.length < 3) {
      return skipped('fewer than three events loaded');
    }

    const chosen = context.rng.sample(events, 3);
    if (new Set(chosen.map((e) => e.year)).size < chosen.length) {
      return skipped('sampled events share a start year');
    }

    const pattern = context.rng.pick(SEQUENCE_PATTERNS);

    return synthesized(
      buildQuestion(context, 'sequence_ordering', SEQUENCE_PREFIX, {
        question: fillTemplate(pattern, { events: chosen.map((e) => e.name).join(', ') }),
        answer: chronologicalOrder(chosen).join(', '),
        difficulty: context.rng.int(3, 5),
        temporalGranularity: 'year',
        span: spanOf(...chosen.map((e) => e.year)),
        entities: chosen.map((e) => e.name),
        countries: chosen.map((e) => e.location),
        hopCount: 3,
        confidenceScore: 0.9,
        domain: 'sequence',
        requiresCalculation: false,
        complexityScore: 0.8,
      }),
    );
  },
);

// -- cross_domain --

function personVersusEvent(context: SynthesisContext): SynthesisResult {
  const person = context.rng.pick(context.knowledgeBase.people);
  const event = context.rng.pick(context.knowledgeBase.events);
  const template = context.rng.pick(PERSON_EVENT_TEMPLATES);

  return synthesized(
    buildQuestion(context, 'cross_domain', CROSS_PREFIX, {
      question: fillTemplate(template.question, { person: person.name, event: event.name }),
      answer: template.answer(person, event),
      difficulty: context.rng.int(3, 4),
      temporalGranularity: 'year',
      span: spanOf(person.birthYear, event.year),
      entities: [person.name, event.name],
      countries: [person.country, event.location],
      hopCount: 2,
      confidenceScore: 0.9,
      domain: 'cross_domain',
      requiresCalculation: false,
      complexityScore: 0.65,
    }),
  );
}

function organizationVersusEvent(context: SynthesisContext): SynthesisResult {
  const organization = context.rng.pick(context.knowledgeBase.organizations);
  const event = context.rng.pick(context.knowledgeBase.events);
  const template = context.rng.pick(ORGANIZATION_EVENT_TEMPLATES);

  return synthesized(
    buildQuestion(context, 'cross_domain', CROSS_PREFIX, {
      question: fillTemplate(template.question, {
        organization: organization.name,
        event: event.name,
      }),
      answer: template.answer(organization, event),
      difficulty: context.rng.int(3, 4),
      temporalGranularity: 'year',
      span: spanOf(organization.inceptionYear, event.year),
      entities: [organization.name, event.name],
      countries: [organization.country, event.location],
      hopCount: 2,
      confidenceScore: 0.9,
      domain: 'cross_domain',
      requiresCalculation: false,
      complexityScore: 0.65,
    }),
  );
}

export const crossDomainSynthesizer: QuestionSynthesizer = defineSynthesizer(
  'cross_domain',
  CROSS_PREFIX,
  (context) => {
    const hasEvents = (c: SynthesisContext): boolean => c.knowledgeBase.events.length > 0;
    const variant = pickVariant(context, [
      { available: (c) => hasEvents(c) && c.knowledgeBase.people.length > 0, run: personVersusEvent },
      {
        available: (c) => hasEvents(c) && c.knowledgeBase.organizations.length > 0,
        run: organizationVersusEvent,
      },
    ]);
    return variant ? variant.run(context) : skipped('no events to relate entities to');
  },
);

// -- counterfactual --

function shiftedStart(context: SynthesisContext): SynthesisResult {
  const event = context.rng.pick(context.knowledgeBase.events);
  const offset = context.rng.pick(COUNTERFACTUAL_OFFSETS);
  const direction = context.rng.pick(COUNTERFACTUAL_DIRECTIONS);
  const shifted = shiftYear(event.year, offset, direction);
  const pattern = context.rng.pick(COUNTERFACTUAL_SHIFT_PATTERNS);

  return synthesized(
    buildQuestion(context, 'counterfactual', COUNTERFACTUAL_PREFIX, {
      question: fillTemplate(pattern, { event: event.name, offset, direction }),
      answer: String(shifted),
      difficulty: context.rng.int(3, 4),
      temporalGranularity: 'year',
      span: spanOf(event.year, shifted),
      entities: [event.name],
      countries: [event.location],
      hopCount: 1,
      confidenceScore: 0.9,
      domain: 'counterfactual',
      requiresCalculation: true,
      complexityScore: 0.7,
    }),
  );
}

function shiftedPrecedence(context: SynthesisContext): SynthesisResult {
  const [event1, event2] = context.rng.sample(context.knowledgeBase.events, 2);
  const offset = context.rng.pick(COUNTERFACTUAL_OFFSETS);
  const direction = context.rng.pick(COUNTERFACTUAL_DIRECTIONS);
  const shifted = shiftYear(event1.year, offset, direction);
  const pattern = context.rng.pick(COUNTERFACTUAL_PRECEDENCE_PATTERNS);

  return synthesized(
    buildQuestion(context, 'counterfactual', COUNTERFACTUAL_PREFIX, {
      question: fillTemplate(pattern, {
        event1: event1.name,
        offset,
        direction,
        event2: event2.name,
      }),
      answer: yesNo(shifted < event2.year),
      difficulty: context.rng.int(3, 4),
      temporalGranularity: 'year',
      span: spanOf(event1.year, shifted, event2.year),
      entities: [event1.name, event2.name],
      countries: [event1.location, event2.location],
      hopCount: 2,
      confidenceScore: 0.9,
      domain: 'counterfactual',
      requiresCalculation: true,
      complexityScore: 0.7,
    }),
  );
}

export const counterfactualSynthesizer: QuestionSynthesizer = defineSynthesizer(
  'counterfactual',
  COUNTERFACTUAL_PREFIX,
  (context) => {
    const variant = pickVariant(context, [
      { available: (c) => c.knowledgeBase.events.length > 0, run: shiftedStart },
      { available: (c) => c.knowledgeBase.events.length >= 2, run: shiftedPrecedence },
    ]);
    return variant ? variant.run(context) : skipped('no events loaded');
  },
);
