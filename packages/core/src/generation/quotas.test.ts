import { describe, it, expect } from 'vitest';
import { QUESTION_TYPES } from '@chronoqa/shared/src/types/question.types.js';
import { computeTypeQuotas } from './quotas.js';

describe('computeTypeQuotas', () => {
  it('should split evenly when the target divides by the type count', () => {
    const quotas = computeTypeQuotas(32, QUESTION_TYPES);

    expect(quotas.every((q) => q.quota === 2)).toBe(true);
  });

  it('should give the remainder to the first types', () => {
    const quotas = computeTypeQuotas(10, QUESTION_TYPES);

    expect(quotas.slice(0, 10).every((q) => q.quota === 1)).toBe(true);
    expect(quotas.slice(10).every((q) => q.quota === 0)).toBe(true);
    expect(quotas.reduce((sum, q) => sum + q.quota, 0)).toBe(10);
  });

  it('should keep the given type order', () => {
    expect(computeTypeQuotas(5, ['counterfactual', 'attribute_event'])).toEqual([
      { type: 'counterfactual', quota: 3 },
      { type: 'attribute_event', quota: 2 },
    ]);
  });

  it('should return nothing without types', () => {
    expect(computeTypeQuotas(10, [])).toEqual([]);
  });
});
