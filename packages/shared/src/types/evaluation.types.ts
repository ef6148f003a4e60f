export interface DatasetQuestion {
  readonly question: string;
  readonly answer: string;
  readonly questionType: string;
  readonly domain: string;
  readonly difficulty?: number;
  readonly confidenceScore?: number;
}

export interface FewShotExample {
  readonly question: string;
  readonly answer: string;
  readonly type: string;
}

export interface AnswerMetrics {
  readonly precision: number;
  readonly recall: number;
  readonly f1: number;
  readonly exactMatch: number;
  readonly containment: number;
}

export interface EvaluationResult extends AnswerMetrics {
  readonly model: string;
  readonly shots: number;
  readonly questionType: string;
  readonly domain: string;
  readonly question: string;
  readonly trueAnswer: string;
  readonly predictedAnswer: string;
}
