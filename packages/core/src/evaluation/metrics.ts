import type { AnswerMetrics } from '@chronoqa/shared/src/types/evaluation.types.js';

export interface TokenMetrics {
  readonly precision: number;
  readonly recall: number;
  readonly f1: number;
}

/** Lower-cases, replaces punctuation with spaces and collapses whitespace. */
export function normalizeAnswer(answer: string): string {
  return answer
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}_\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function tokenSet(normalized: string): Set<string> {
  return new Set(normalized.split(' ').filter((token) => token.length > 0));
}

function numbersIn(normalized: string): string[] {
  return normalized.match(/\b\d+\b/g) ?? [];
}

/** 100 on a direct match, containment either way or a shared number; 0 otherwise. */
export function exactMatch(prediction: string, truth: string): number {
  const pred = normalizeAnswer(prediction);
  const gold = normalizeAnswer(truth);
  if (gold === '' || pred === '') {
    return 0;
  }
  if (pred === gold || gold.includes(pred) || pred.includes(gold)) {
    return 100;
  }

  const predNumbers = numbersIn(pred);
  const goldNumbers = numbersIn(gold);
  if (predNumbers.some((n) => goldNumbers.includes(n))) {
    return 100;
  }
  return 0;
}

export function tokenMetrics(prediction: string, truth: string): TokenMetrics {
  const predTokens = tokenSet(normalizeAnswer(prediction));
  const goldTokens = tokenSet(normalizeAnswer(truth));
  if (goldTokens.size === 0 || predTokens.size === 0) {
    return { precision: 0, recall: 0, f1: 0 };
  }

  const common = [...predTokens].filter((token) => goldTokens.has(token)).length;
  const precision = common / predTokens.size;
  const recall = common / goldTokens.size;
  const f1 = precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);

  return { precision: precision * 100, recall: recall * 100, f1: f1 * 100 };
}

/** Share of truth tokens present in the prediction, 0-100. */
export function containmentScore(prediction: string, truth: string): number {
  const predTokens = tokenSet(normalizeAnswer(prediction));
  const goldTokens = tokenSet(normalizeAnswer(truth));
  if (goldTokens.size === 0) {
    return 0;
  }
  const overlap = [...goldTokens].filter((token) => predTokens.has(token)).length;
  return (overlap / goldTokens.size) * 100;
}

export function calculateAllMetrics(prediction: string, truth: string): AnswerMetrics {
  return {
    ...tokenMetrics(prediction, truth),
    exactMatch: exactMatch(prediction, truth),
    containment: containmentScore(prediction, truth),
  };
}
