import type { HistoricalEvent } from '@chronoqa/shared/src/types/knowledge.types.js';
import type { QuestionSynthesizer, SynthesisContext, SynthesisResult } from '../types.js';
import { skipped, synthesized } from '../types.js';
import { buildQuestion, defineSynthesizer, pickVariant, spanOf } from '../question-builder.js';
import {
  CENTURY_SPAN_TEMPLATES,
  CENTURY_START_TEMPLATES,
  CLUSTERING_PATTERNS,
  DECADE_SPAN_TEMPLATES,
  DECADE_START_TEMPLATES,
  EVENT_OVERLAP_TEMPLATES,
  PERSON_ALIVE_TEMPLATES,
  centuryOf,
  decadeOf,
  fillTemplate,
} from '../templates.js';

const CLUSTER_PREFIX = 'cluster';
const GRANULAR_PREFIX = 'granular';
const OVERLAP_PREFIX = 'overlap';

/**
 * The decade holding the most events, or `undefined` when the leading count is
 * shared by several decades.
 */
export function busiestDecade(events: readonly HistoricalEvent[]): number | undefined {
  const counts = new Map<number, number>();
  for (const event of events) {
    const decade = decadeOf(event.year);
    counts.set(decade, (counts.get(decade) ?? 0) + 1);
  }

  let best: number | undefined;
  let bestCount = 0;
  let tied = false;
  for (const [decade, count] of counts) {
    if (count > bestCount) {
      best = decade;
      bestCount = count;
      tied = false;
    } else if (count === bestCount) {
      tied = true;
    }
  }
  return tied ? undefined : best;
}

export const temporalClusteringSynthesizer: QuestionSynthesizer = defineSynthesizer(
  'temporal_clustering',
  CLUSTER_PREFIX,
  (context) => {
    const byDomain = new Map<string, HistoricalEvent[]>();
    for (const event of context.knowledgeBase.events) {
      const group = byDomain.get(event.domain) ?? [];
      group.push(event);
      byDomain.set(event.domain, group);
    }

    const candidates = [...byDomain.keys()].filter(
      (domain) => (byDomain.get(domain)?.length ?? 0) >= 2,
    );
    if (candidates.length === 0) {
      return skipped('no domain has two or more events');
    }

    const domain = context.rng.pick(candidates);
    const events = byDomain.get(domain) ?? [];
    const decade = busiestDecade(events);
    if (decade === undefined) {
      return skipped(`several decades tie for the most ${domain} events`);
    }

    const pattern = context.rng.pick(CLUSTERING_PATTERNS);

    return synthesized(
      buildQuestion(context, 'temporal_clustering', CLUSTER_PREFIX, {
        question: fillTemplate(pattern, { domain }),
        answer: `${String(decade)}s`,
        difficulty: context.rng.int(3, 5),
        temporalGranularity: 'decade',
        span: spanOf(...events.map((e) => e.year)),
        entities: events.map((e) => e.name),
        countries: [...new Set(events.map((e) => e.location))],
        hopCount: 3,
        confidenceScore: 0.85,
        domain,
        requiresCalculation: true,
        complexityScore: 0.75,
      }),
    );
  },
);

function decadeQuestion(context: SynthesisContext): SynthesisResult {
  const event = context.rng.pick(context.knowledgeBase.events);
  const decade = decadeOf(event.year);
  const template = context.rng.pick(
    decade === decadeOf(event.endYear)
      ? [...DECADE_SPAN_TEMPLATES, ...DECADE_START_TEMPLATES]
      : DECADE_START_TEMPLATES,
  );

  return synthesized(
    buildQuestion(context, 'multi_granular', GRANULAR_PREFIX, {
      question: fillTemplate(template.question, { event: event.name }),
      answer: template.answer(event),
      difficulty: context.rng.int(2, 3),
      temporalGranularity: 'decade',
      span: { start: decade, end: decade + 9 },
      entities: [event.name],
      countries: [event.location],
      hopCount: 1,
      confidenceScore: 0.95,
      domain: event.domain,
      requiresCalculation: true,
      complexityScore: 0.45,
    }),
  );
}

function centuryQuestion(context: SynthesisContext): SynthesisResult {
  const event = context.rng.pick(context.knowledgeBase.events);
  const century = centuryOf(event.year);
  const template = context.rng.pick(
    century === centuryOf(event.endYear)
      ? [...CENTURY_SPAN_TEMPLATES, ...CENTURY_START_TEMPLATES]
      : CENTURY_START_TEMPLATES,
  );

  return synthesized(
    buildQuestion(context, 'multi_granular', GRANULAR_PREFIX, {
      question: fillTemplate(template.question, { event: event.name }),
      answer: template.answer(event),
      difficulty: context.rng.int(2, 3),
      temporalGranularity: 'century',
      span: { start: (century - 1) * 100 + 1, end: century * 100 },
      entities: [event.name],
      countries: [event.location],
      hopCount: 1,
      confidenceScore: 0.95,
      domain: event.domain,
      requiresCalculation: true,
      complexityScore: 0.45,
    }),
  );
}

export const multiGranularSynthesizer: QuestionSynthesizer = defineSynthesizer(
  'multi_granular',
  GRANULAR_PREFIX,
  (context) => {
    if (context.knowledgeBase.events.length === 0) {
      return skipped('no events loaded');
    }
    const run = context.rng.pick([decadeQuestion, centuryQuestion]);
    return run(context);
  },
);

function personAlive(context: SynthesisContext): SynthesisResult {
  const person = context.rng.pick(context.knowledgeBase.people);
  const event = context.rng.pick(context.knowledgeBase.events);
  const template = context.rng.pick(PERSON_ALIVE_TEMPLATES);

  return synthesized(
    buildQuestion(context, 'temporal_overlap', OVERLAP_PREFIX, {
      question: fillTemplate(template.question, { person: person.name, event: event.name }),
      answer: template.answer(person, event),
      difficulty: context.rng.int(3, 5),
      temporalGranularity: 'year',
      span: spanOf(person.birthYear, event.year, event.endYear),
      entities: [person.name, event.name],
      countries: [person.country, event.location],
      hopCount: 2,
      confidenceScore: 0.9,
      domain: 'overlap',
      requiresCalculation: false,
      complexityScore: 0.7,
    }),
  );
}

function eventOverlap(context: SynthesisContext): SynthesisResult {
  const [event1, event2] = context.rng.sample(context.knowledgeBase.events, 2);
  const template = context.rng.pick(EVENT_OVERLAP_TEMPLATES);

  return synthesized(
    buildQuestion(context, 'temporal_overlap', OVERLAP_PREFIX, {
      question: fillTemplate(template.question, { event1: event1.name, event2: event2.name }),
      answer: template.answer(event1, event2),
      difficulty: context.rng.int(3, 5),
      temporalGranularity: 'year',
      span: spanOf(event1.year, event1.endYear, event2.year, event2.endYear),
      entities: [event1.name, event2.name],
      countries: [event1.location, event2.location],
      hopCount: 2,
      confidenceScore: 0.9,
      domain: 'overlap',
      requiresCalculation: false,
      complexityScore: 0.7,
    }),
  );
}

export const temporalOverlapSynthesizer: QuestionSynthesizer = defineSynthesizer(
  'temporal_overlap',
  OVERLAP_PREFIX,
  (context) => {
    const variant = pickVariant(context, [
      {
        available: (c) => c.knowledgeBase.people.length > 0 && c.knowledgeBase.events.length > 0,
        run: personAlive,
      },
      { available: (c) => c.knowledgeBase.events.length >= 2, run: eventOverlap },
    ]);
    return variant ? variant.run(context) : skipped('not enough people or events');
  },
);
