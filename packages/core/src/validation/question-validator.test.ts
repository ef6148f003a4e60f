import { describe, it, expect } from 'vitest';
import type { TemporalQuestion } from '@chronoqa/shared/src/types/question.types.js';
import { createQuestionValidator } from './question-validator.js';

const baseQuestion: TemporalQuestion = {
  id: 'evt_comp_1_abc123def456',
  question: 'Which occurred first, World War I or World War II?',
  answer: 'World War I',
  questionType: 'comparison_event',
  difficulty: 3,
  temporalGranularity: 'year',
  timeSpanStart: '1800-01-01',
  timeSpanEnd: '2025-12-31',
  entitiesQuestion: ['World War I', 'World War II'],
  countriesQuestion: ['Europe', 'Global'],
  hopCount: 2,
  confidenceScore: 0.9,
  domain: 'comparison',
  requiresCalculation: false,
  complexityScore: 0.6,
  sourceType: 'curated',
  batchId: 1,
};

function withChanges(changes: Partial<TemporalQuestion>): TemporalQuestion {
  return { ...baseQuestion, ...changes };
}

describe('createQuestionValidator', () => {
  const validator = createQuestionValidator();

  it('should accept a well-formed question', () => {
    expect(validator.evaluate(baseQuestion)).toEqual({ accepted: true });
    expect(validator.validate(baseQuestion)).toBe(true);
    expect(validator.getValidationErrors(baseQuestion)).toEqual([]);
  });

  it('should reject questions outside the length bounds', () => {
    expect(validator.evaluate(withChanges({ question: 'Too short' }))).toEqual({
      accepted: false,
      stage: 'structural',
      reason: 'question length 9 outside 10-300',
    });
    expect(validator.validate(withChanges({ question: `${'word '.repeat(60)}end?` }))).toBe(false);
    expect(validator.validate(withChanges({ answer: 'x'.repeat(101) }))).toBe(false);
    expect(validator.validate(withChanges({ answer: '' }))).toBe(false);
  });

  it('should reject placeholder fragments case-sensitively', () => {
    const outcome = validator.evaluate(withChanges({ question: 'Which {domain} event began in 1914?' }));

    expect(outcome).toEqual({
      accepted: false,
      stage: 'content',
      reason: 'contains placeholder text "{"',
    });
    expect(validator.validate(withChanges({ answer: 'None' }))).toBe(false);
    expect(validator.validate(withChanges({ answer: 'N/A' }))).toBe(false);
    expect(validator.validate(withChanges({ answer: 'nonexistent' }))).toBe(true);
  });

  it('should reject uninformative answers', () => {
    expect(validator.evaluate(withChanges({ answer: ' Unknown ' }))).toEqual({
      accepted: false,
      stage: 'content',
      reason: 'answer " Unknown " carries no information',
    });
    expect(validator.validate(withChanges({ answer: '0' }))).toBe(false);
    expect(validator.validate(withChanges({ answer: 'none' }))).toBe(false);
  });

  it('should require at least five words', () => {
    expect(validator.evaluate(withChanges({ question: 'When did Sputnik launch?' }))).toEqual({
      accepted: false,
      stage: 'content',
      reason: 'question has 4 words, fewer than 5',
    });
  });

  it('should apply the confidence threshold', () => {
    const strict = createQuestionValidator({ minConfidence: 0.95 });

    expect(validator.validate(withChanges({ confidenceScore: 0.7 }))).toBe(true);
    expect(validator.validate(withChanges({ confidenceScore: 0.69 }))).toBe(false);
    expect(strict.evaluate(baseQuestion)).toEqual({
      accepted: false,
      stage: 'quality',
      reason: 'confidence 0.9 below 0.95',
    });
  });

  it('should bound difficulty and hop count', () => {
    expect(validator.validate(withChanges({ difficulty: 0 }))).toBe(false);
    expect(validator.validate(withChanges({ difficulty: 6 }))).toBe(false);
    expect(validator.validate(withChanges({ hopCount: 11 }))).toBe(false);
    expect(validator.validate(withChanges({ hopCount: 10 }))).toBe(true);
  });

  it('should reject inverted time spans unless the check is disabled', () => {
    const inverted = withChanges({ timeSpanStart: '1950-01-01', timeSpanEnd: '1940-12-31' });
    const lenient = createQuestionValidator({ checkTemporalConsistency: false });

    expect(validator.evaluate(inverted)).toEqual({
      accepted: false,
      stage: 'temporal',
      reason: 'time span starts after it ends (1950 > 1940)',
    });
    expect(lenient.validate(inverted)).toBe(true);
  });

  it('should report unparseable span dates', () => {
    expect(validator.getValidationErrors(withChanges({ timeSpanStart: 'sometime' }))).toEqual([
      'unparseable time span sometime..2025-12-31',
    ]);
  });

  it('should collect failures from every stage', () => {
    const errors = validator.getValidationErrors(
      withChanges({ question: 'Why?', answer: 'unknown', confidenceScore: 0.1, difficulty: 9 }),
    );

    expect(errors).toEqual([
      'question length 4 outside 10-300',
      'answer "unknown" carries no information',
      'question has 1 words, fewer than 5',
      'confidence 0.1 below 0.7',
      'difficulty 9 outside 1-5',
    ]);
  });
});
