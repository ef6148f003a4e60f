import type { GenerationConfig, GenerationConfigFile } from '@chronoqa/schemas/src/generation-config.schema.js';
import type { QuestionType } from '@chronoqa/shared/src/types/question.types.js';
import type { KnowledgeBase } from '../knowledge/knowledge-base.js';
import type { RecordSink } from '../output/csv-sink.js';
import type { SynthesizerRegistry } from '../synthesis/synthesizer-registry.js';
import type { QuestionValidator } from '../validation/question-validator.js';

export interface DatasetGeneratorDeps {
  readonly config: GenerationConfig;
  readonly knowledgeBase: KnowledgeBase;
  /** Defaults to the registry of all built-in synthesizers. */
  readonly registry?: SynthesizerRegistry;
  /** Defaults to a validator using `config.qualityThreshold`. */
  readonly validator?: QuestionValidator;
  readonly createSink?: (filePath: string) => RecordSink;
  readonly now?: () => number;
}

export interface TypeQuota {
  readonly type: QuestionType;
  readonly quota: number;
}

export interface BatchSummary {
  readonly batchId: number;
  readonly file: string;
  readonly questions: number;
  readonly attempts: number;
  readonly skipped: number;
  readonly rejected: number;
  readonly perType: Readonly<Record<string, number>>;
  readonly durationMs: number;
}

export interface DatasetSummary {
  readonly name: string;
  readonly generatedAt: string;
  readonly totalBatches: number;
  readonly totalQuestions: number;
  /** Target per batch; batches may hold fewer. */
  readonly questionsPerBatch: number;
  readonly questionTypes: readonly QuestionType[];
  readonly seed: string | number;
  readonly durationMs: number;
  readonly config: GenerationConfigFile;
  readonly batches: readonly BatchSummary[];
}

export interface DatasetGenerator {
  generate(): Promise<DatasetSummary>;
}
