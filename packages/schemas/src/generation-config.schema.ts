import { z } from 'zod';
import { QUESTION_TYPES } from '@chronoqa/shared/src/types/question.types.js';

export const SeedSchema = z.union([z.string().min(1), z.number().int().nonnegative()]);

const QuestionTypesSchema = z
  .array(z.enum(QUESTION_TYPES))
  .min(1)
  .refine((types) => new Set(types).size === types.length, {
    message: 'question_types must not contain duplicates',
  });

export const GenerationConfigFileSchema = z
  .object({
    $schema: z.string().optional(),
    output_dir: z.string().min(1).default('data/generated'),
    num_batches: z.number().int().positive().default(5),
    questions_per_batch: z.number().int().positive().default(50_000_000),
    start_year: z.number().int().default(1800),
    end_year: z.number().int().default(2025),
    batch_write_size: z.number().int().positive().default(100_000),
    quality_threshold: z.number().min(0).max(1).default(0.8),
    diversity_factor: z.number().min(0).max(1).default(0.9),
    seed: SeedSchema.optional(),
    question_types: QuestionTypesSchema.optional(),
  })
  .strict()
  .refine((config) => config.start_year <= config.end_year, {
    message: 'start_year must not be after end_year',
    path: ['start_year'],
  });

export const GenerationConfigSchema = GenerationConfigFileSchema.transform((file) => ({
  outputDir: file.output_dir,
  numBatches: file.num_batches,
  questionsPerBatch: file.questions_per_batch,
  startYear: file.start_year,
  endYear: file.end_year,
  batchWriteSize: file.batch_write_size,
  qualityThreshold: file.quality_threshold,
  diversityFactor: file.diversity_factor,
  seed: file.seed,
  questionTypes: file.question_types,
}));

export type GenerationConfigInput = z.input<typeof GenerationConfigFileSchema>;
export type GenerationConfigFile = z.output<typeof GenerationConfigFileSchema>;
export type GenerationConfig = z.output<typeof GenerationConfigSchema>;

export function toGenerationConfigFile(config: GenerationConfig): GenerationConfigFile {
  return {
    output_dir: config.outputDir,
    num_batches: config.numBatches,
    questions_per_batch: config.questionsPerBatch,
    start_year: config.startYear,
    end_year: config.endYear,
    batch_write_size: config.batchWriteSize,
    quality_threshold: config.qualityThreshold,
    diversity_factor: config.diversityFactor,
    seed: config.seed,
    question_types: config.questionTypes,
  };
}
