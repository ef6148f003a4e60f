import { describe, it, expect } from 'vitest';
import { createKnowledgeBase } from '../../knowledge/knowledge-base.js';
import { contextFor, questionOf } from '../testing.js';
import {
  countEventsInRange,
  countOrganizationsFoundedInRange,
  countPeopleBornInRange,
  countingEntitySynthesizer,
  countingEventSynthesizer,
} from './counting.synthesizers.js';

describe('countEventsInRange', () => {
  it('should count events of the domain inside the inclusive range', async () => {
    const kb = createKnowledgeBase({
      data: {
        events: [
          { name: 'World War I', year: 1914, location: 'Europe', casualties: 0, domain: 'military' },
          { name: 'World War II', year: 1939, location: 'Global', casualties: 0, domain: 'military' },
          { name: 'Sputnik Launch', year: 1957, location: 'Soviet Union', casualties: 0, domain: 'science' },
        ],
      },
    });
    await kb.load();

    expect(countEventsInRange(kb.events, 'military', 1910, 1940)).toBe(2);
    expect(countEventsInRange(kb.events, 'military', 1914, 1914)).toBe(1);
    expect(countEventsInRange(kb.events, 'science', 1910, 1940)).toBe(0);
  });
});

describe('countPeopleBornInRange and countOrganizationsFoundedInRange', () => {
  it('should match on the exact field and type', async () => {
    const kb = createKnowledgeBase({
      data: {
        events: [],
        people: [
          { name: 'Albert Einstein', birth: 1879, death: 1955, country: 'Germany', field: 'Physics' },
          { name: 'Stephen Hawking', birth: 1942, death: 2018, country: 'United Kingdom', field: 'Physics' },
        ],
        organizations: [
          { name: 'Apple Inc.', founded: 1976, country: 'United States', type: 'Technology Company' },
          { name: 'NASA', founded: 1958, country: 'United States', type: 'Space Agency' },
        ],
      },
    });
    await kb.load();

    expect(countPeopleBornInRange(kb.people, 'Physics', 1870, 1950)).toBe(2);
    expect(countPeopleBornInRange(kb.people, 'physics', 1870, 1950)).toBe(0);
    expect(countOrganizationsFoundedInRange(kb.organizations, 'Technology Company', 1950, 1990)).toBe(1);
  });
});

describe('countingEventSynthesizer', () => {
  it('should count events in the drawn range', async () => {
    const context = await contextFor({
      events: [
        { name: 'Border Clash', year: 1905, location: 'Manchuria', casualties: 0, domain: 'military' },
        { name: 'Naval Battle', year: 1908, location: 'Pacific', casualties: 0, domain: 'military' },
        { name: 'World War I', year: 1914, location: 'Europe', casualties: 0, domain: 'military' },
      ],
    });

    const question = questionOf(countingEventSynthesizer.synthesize(context));

    expect(question.question).toBe('How many military events occurred between 1900 and 1910?');
    expect(question.answer).toBe('2');
    expect(question.temporalGranularity).toBe('decade');
    expect(question.timeSpanStart).toBe('1900-01-01');
    expect(question.timeSpanEnd).toBe('1910-12-31');
    expect(question.confidenceScore).toBe(0.98);
    expect(question.requiresCalculation).toBe(true);
  });
});

describe('countingEntitySynthesizer', () => {
  it('should count people of a field born in the drawn range', async () => {
    const context = await contextFor({
      events: [],
      people: [
        { name: 'Marie Curie', birth: 1867, death: 1934, country: 'Poland', field: 'Chemistry' },
        { name: 'Albert Einstein', birth: 1879, death: 1955, country: 'Germany', field: 'Physics' },
      ],
    });

    const question = questionOf(countingEntitySynthesizer.synthesize(context));

    expect(question.question).toBe(
      'How many notable figures in chemistry were born between 1850 and 1860?',
    );
    expect(question.answer).toBe('0');
    expect(question.domain).toBe('chemistry');
  });

  it('should skip when neither people nor organizations are loaded', async () => {
    const context = await contextFor({ events: [] });

    expect(countingEntitySynthesizer.synthesize(context).status).toBe('skipped');
  });
});
