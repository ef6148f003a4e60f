import type { QuestionType } from '@chronoqa/shared/src/types/question.types.js';
import type { TypeQuota } from './types.js';

/**
 * Splits the per-batch target evenly across types. The remainder goes one extra
 * attempt each to the first types, so the quotas always sum to `total`.
 */
export function computeTypeQuotas(total: number, types: readonly QuestionType[]): TypeQuota[] {
  if (types.length === 0) {
    return [];
  }
  const base = Math.floor(total / types.length);
  const remainder = total % types.length;
  return types.map((type, index) => ({ type, quota: base + (index < remainder ? 1 : 0) }));
}
