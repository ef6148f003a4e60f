import { describe, it, expect } from 'vitest';
import type { KnowledgeDataInput } from '../../knowledge/knowledge-base.js';
import { contextFor, questionOf } from '../testing.js';
import {
  comparisonEntitySynthesizer,
  comparisonEventSynthesizer,
  comparisonTimeSynthesizer,
} from './comparison.synthesizers.js';

const worldWars: KnowledgeDataInput = {
  events: [
    { name: 'World War I', year: 1914, end_year: 1918, location: 'Europe', casualties: 17000000, domain: 'military' },
    { name: 'World War II', year: 1939, end_year: 1945, location: 'Global', casualties: 75000000, domain: 'military' },
  ],
};

describe('comparisonEventSynthesizer', () => {
  it('should name the earlier event', async () => {
    const context = await contextFor(worldWars);

    const question = questionOf(comparisonEventSynthesizer.synthesize(context));

    expect(question.question).toBe('Which occurred first, World War I or World War II?');
    expect(question.answer).toBe('World War I');
    expect(question.id).toBe('evt_comp_1_000000000000');
    expect(question.hopCount).toBe(2);
    expect(question.entitiesQuestion).toEqual(['World War I', 'World War II']);
    expect(question.countriesQuestion).toEqual(['Europe', 'Global']);
    expect(question.domain).toBe('comparison');
  });

  it('should resolve equal years to the second event', async () => {
    const context = await contextFor({
      events: [
        { name: 'Event Alpha', year: 1950, location: 'Korea', casualties: 0, domain: 'military' },
        { name: 'Event Beta', year: 1950, location: 'Korea', casualties: 0, domain: 'military' },
      ],
    });

    const question = questionOf(comparisonEventSynthesizer.synthesize(context));

    expect(question.answer).toBe('Event Beta');
  });

  it('should skip when fewer than two events are loaded', async () => {
    const context = await contextFor({ events: [worldWars.events[0]] });

    const result = comparisonEventSynthesizer.synthesize(context);

    expect(result).toEqual({ status: 'skipped', reason: 'fewer than two events loaded' });
  });
});

describe('comparisonEntitySynthesizer', () => {
  it('should compare two people by birth year', async () => {
    const context = await contextFor({
      events: [],
      people: [
        { name: 'Marie Curie', birth: 1867, death: 1934, country: 'Poland', field: 'Chemistry' },
        { name: 'Albert Einstein', birth: 1879, death: 1955, country: 'Germany', field: 'Physics' },
      ],
    });

    const question = questionOf(comparisonEntitySynthesizer.synthesize(context));

    expect(question.question).toBe('Who was born first, Marie Curie or Albert Einstein?');
    expect(question.answer).toBe('Marie Curie');
    expect(question.questionType).toBe('comparison_entity');
  });

  it('should skip when no collection has two members', async () => {
    const context = await contextFor({
      events: [],
      people: [{ name: 'Elon Musk', birth: 1971, death: null, country: 'United States', field: 'Technology' }],
    });

    expect(comparisonEntitySynthesizer.synthesize(context).status).toBe('skipped');
  });
});

describe('comparisonTimeSynthesizer', () => {
  it('should compute the gap between two start years', async () => {
    const context = await contextFor(worldWars);

    const question = questionOf(comparisonTimeSynthesizer.synthesize(context));

    expect(question.answer).toBe('25');
    expect(question.requiresCalculation).toBe(true);
    expect(question.timeSpanStart).toBe('1914-01-01');
    expect(question.timeSpanEnd).toBe('1939-12-31');
  });
});
