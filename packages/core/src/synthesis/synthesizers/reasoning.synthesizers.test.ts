import { describe, it, expect } from 'vitest';
import type { KnowledgeDataInput } from '../../knowledge/knowledge-base.js';
import { contextFor, questionOf } from '../testing.js';
import {
  causalReasoningSynthesizer,
  chronologicalOrder,
  counterfactualSynthesizer,
  crossDomainSynthesizer,
  durationEstimationSynthesizer,
  sequenceOrderingSynthesizer,
  shiftYear,
} from './reasoning.synthesizers.js';

const data: KnowledgeDataInput = {
  events: [
    { name: 'World War I', year: 1914, end_year: 1918, location: 'Europe', casualties: 17000000, domain: 'military' },
    { name: 'World War II', year: 1939, end_year: 1945, location: 'Global', casualties: 75000000, domain: 'military' },
    { name: 'Sputnik Launch', year: 1957, location: 'Soviet Union', casualties: 0, domain: 'science' },
  ],
  people: [
    { name: 'Albert Einstein', birth: 1879, death: 1955, country: 'Germany', field: 'Physics' },
  ],
  organizations: [
    { name: 'NASA', founded: 1958, country: 'United States', type: 'Space Agency' },
  ],
};

describe('shiftYear', () => {
  it('should move the year in the named direction', () => {
    expect(shiftYear(1914, 5, 'earlier')).toBe(1909);
    expect(shiftYear(1914, 50, 'later')).toBe(1964);
  });
});

describe('chronologicalOrder', () => {
  it('should order names by start year without mutating the input', async () => {
    const context = await contextFor(data);
    const events = [...context.knowledgeBase.events].reverse();

    expect(chronologicalOrder(events)).toEqual(['World War I', 'World War II', 'Sputnik Launch']);
    expect(events[0].name).toBe('Sputnik Launch');
  });
});

describe('causalReasoningSynthesizer', () => {
  it('should answer whether the first event could have influenced the second', async () => {
    const context = await contextFor(data);

    const question = questionOf(causalReasoningSynthesizer.synthesize(context));

    expect(question.question).toBe(
      'Is it chronologically possible that World War I influenced World War II?',
    );
    expect(question.answer).toBe('yes');
    expect(question.difficulty).toBe(4);
    expect(question.confidenceScore).toBe(0.85);
  });
});

describe('durationEstimationSynthesizer', () => {
  it('should compute the length of a ranged event', async () => {
    const context = await contextFor(data);

    const question = questionOf(durationEstimationSynthesizer.synthesize(context));

    expect(question.question).toBe('How long did World War I last?');
    expect(question.answer).toBe('4 years');
    expect(question.hopCount).toBe(1);
    expect(question.timeSpanEnd).toBe('1918-12-31');
  });

  it('should use lifespans when no event spans several years', async () => {
    const context = await contextFor({
      events: [data.events[2]],
      people: [
        { name: 'Bill Gates', birth: 1955, death: null, country: 'United States', field: 'Technology' },
        { name: 'Albert Einstein', birth: 1879, death: 1955, country: 'Germany', field: 'Physics' },
      ],
    });

    const question = questionOf(durationEstimationSynthesizer.synthesize(context));

    expect(question.question).toBe('Roughly how many years did Albert Einstein live?');
    expect(question.answer).toBe('76 years');
  });
});

describe('sequenceOrderingSynthesizer', () => {
  it('should list three events earliest first', async () => {
    const context = await contextFor({
      events: [data.events[2], data.events[0], data.events[1]],
    });

    const question = questionOf(sequenceOrderingSynthesizer.synthesize(context));

    expect(question.question).toBe(
      'What is the chronological order of these events: Sputnik Launch, World War I, World War II?',
    );
    expect(question.answer).toBe('World War I, World War II, Sputnik Launch');
    expect(question.hopCount).toBe(3);
    expect(question.timeSpanStart).toBe('1914-01-01');
    expect(question.timeSpanEnd).toBe('1957-12-31');
  });

  it('should skip when two sampled events share a year', async () => {
    const context = await contextFor({
      events: [
        data.events[0],
        { name: 'Event Twin', year: 1914, location: 'Europe', casualties: 0, domain: 'military' },
        data.events[1],
      ],
    });

    expect(sequenceOrderingSynthesizer.synthesize(context)).toEqual({
      status: 'skipped',
      reason: 'sampled events share a start year',
    });
  });
});

describe('crossDomainSynthesizer', () => {
  it('should compare a birth year against an event start', async () => {
    const context = await contextFor(data);

    const question = questionOf(crossDomainSynthesizer.synthesize(context));

    expect(question.question).toBe('Was Albert Einstein born before World War I began?');
    expect(question.answer).toBe('yes');
    expect(question.entitiesQuestion).toEqual(['Albert Einstein', 'World War I']);
  });
});

describe('counterfactualSynthesizer', () => {
  it('should shift the start year by the drawn offset', async () => {
    const context = await contextFor(data);

    const question = questionOf(counterfactualSynthesizer.synthesize(context));

    expect(question.question).toBe(
      'If World War I had happened 5 years earlier, in which year would it have begun?',
    );
    expect(question.answer).toBe('1909');
    expect(question.hopCount).toBe(1);
    expect(question.timeSpanStart).toBe('1909-01-01');
    expect(question.timeSpanEnd).toBe('1914-12-31');
  });

  it('should skip without events', async () => {
    const context = await contextFor({ events: [] });

    expect(counterfactualSynthesizer.synthesize(context).status).toBe('skipped');
  });
});
