import type {
  HistoricalEvent,
  NotablePerson,
  Organization,
} from '@chronoqa/shared/src/types/knowledge.types.js';
import type { QuestionSynthesizer, SynthesisContext, SynthesisResult } from '../types.js';
import { skipped, synthesized } from '../types.js';
import { buildQuestion, defineSynthesizer, pickVariant } from '../question-builder.js';
import {
  EVENT_COUNTING_PATTERNS,
  ORGANIZATION_COUNTING_PATTERNS,
  PERSON_COUNTING_PATTERNS,
  fillTemplate,
} from '../templates.js';

const EVENT_PREFIX = 'evt_count';
const ENTITY_PREFIX = 'ent_count';

export const COUNTING_DOMAINS = ['military', 'science', 'politics'] as const;

export function countEventsInRange(
  events: readonly HistoricalEvent[],
  domain: string,
  startYear: number,
  endYear: number,
): number {
  return events.filter((e) => e.domain === domain && e.year >= startYear && e.year <= endYear)
    .length;
}

export function countPeopleBornInRange(
  people: readonly NotablePerson[],
  field: string,
  startYear: number,
  endYear: number,
): number {
  return people.filter(
    (p) => p.field === field && p.birthYear >= startYear && p.birthYear <= endYear,
  ).length;
}

export function countOrganizationsFoundedInRange(
  organizations: readonly Organization[],
  orgType: string,
  startYear: number,
  endYear: number,
): number {
  return organizations.filter(
    (o) => o.orgType === orgType && o.inceptionYear >= startYear && o.inceptionYear <= endYear,
  ).length;
}

function distinct(values: readonly string[]): string[] {
  return [...new Set(values)];
}

export const countingEventSynthesizer: QuestionSynthesizer = defineSynthesizer(
  'counting_event',
  EVENT_PREFIX,
  (context) => {
    const domain = context.rng.pick(COUNTING_DOMAINS);
    const startYear = context.rng.int(1900, 2000);
    const endYear = startYear + context.rng.int(10, 50);
    const count = countEventsInRange(context.knowledgeBase.events, domain, startYear, endYear);
    const pattern = context.rng.pick(EVENT_COUNTING_PATTERNS);

    return synthesized(
      buildQuestion(context, 'counting_event', EVENT_PREFIX, {
        question: fillTemplate(pattern, { domain, start_year: startYear, end_year: endYear }),
        answer: String(count),
        difficulty: context.rng.int(3, 4),
        temporalGranularity: 'decade',
        span: { start: startYear, end: endYear },
        entities: [],
        countries: [],
        hopCount: 2,
        confidenceScore: 0.98,
        domain,
        requiresCalculation: true,
        complexityScore: 0.7,
      }),
    );
  },
);

function peopleCount(context: SynthesisContext): SynthesisResult {
  const { people } = context.knowledgeBase;
  const field = context.rng.pick(distinct(people.map((p) => p.field)));
  const startYear = context.rng.int(1850, 1950);
  const endYear = startYear + context.rng.int(10, 50);
  const count = countPeopleBornInRange(people, field, startYear, endYear);
  const pattern = context.rng.pick(PERSON_COUNTING_PATTERNS);

  return synthesized(
    buildQuestion(context, 'counting_entity', ENTITY_PREFIX, {
      question: fillTemplate(pattern, {
        field: field.toLowerCase(),
        start_year: startYear,
        end_year: endYear,
      }),
      answer: String(count),
      difficulty: context.rng.int(3, 4),
      temporalGranularity: 'decade',
      span: { start: startYear, end: endYear },
      entities: [],
      countries: [],
      hopCount: 2,
      confidenceScore: 0.98,
      domain: field.toLowerCase(),
      requiresCalculation: true,
      complexityScore: 0.7,
    }),
  );
}

function organizationCount(context: SynthesisContext): SynthesisResult {
  const { organizations } = context.knowledgeBase;
  const orgType = context.rng.pick(distinct(organizations.map((o) => o.orgType)));
  const startYear = context.rng.int(1900, 1990);
  const endYear = startYear + context.rng.int(10, 50);
  const count = countOrganizationsFoundedInRange(organizations, orgType, startYear, endYear);
  const pattern = context.rng.pick(ORGANIZATION_COUNTING_PATTERNS);

  return synthesized(
    buildQuestion(context, 'counting_entity', ENTITY_PREFIX, {
      question: fillTemplate(pattern, {
        org_type: orgType.toLowerCase(),
        start_year: startYear,
        end_year: endYear,
      }),
      answer: String(count),
      difficulty: context.rng.int(3, 4),
      temporalGranularity: 'decade',
      span: { start: startYear, end: endYear },
      entities: [],
      countries: [],
      hopCount: 2,
      confidenceScore: 0.98,
      domain: 'organization',
      requiresCalculation: true,
      complexityScore: 0.7,
    }),
  );
}

export const countingEntitySynthesizer: QuestionSynthesizer = defineSynthesizer(
  'counting_entity',
  ENTITY_PREFIX,
  (context) => {
    const variant = pickVariant(context, [
      { available: (c) => c.knowledgeBase.people.length > 0, run: peopleCount },
      { available: (c) => c.knowledgeBase.organizations.length > 0, run: organizationCount },
    ]);
    return variant ? variant.run(context) : skipped('no people or organizations loaded');
  },
);
