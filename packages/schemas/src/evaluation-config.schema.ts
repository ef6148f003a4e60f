import { z } from 'zod';
import { SeedSchema } from './generation-config.schema.js';

export const DEFAULT_EVALUATION_MODELS = ['gemini-2.0-flash', 'gemini-1.5-flash'] as const;

export const EvaluationConfigFileSchema = z
  .object({
    $schema: z.string().optional(),
    dataset_path: z.string().min(1),
    output_dir: z.string().min(1).default('results'),
    sample_size: z.number().int().positive().default(50),
    max_shots: z.number().int().nonnegative().max(10).default(3),
    models: z.array(z.string().min(1)).min(1).default([...DEFAULT_EVALUATION_MODELS]),
    max_new_tokens: z.number().int().positive().default(30),
    temperature: z.number().min(0).max(2).default(0.3),
    seed: SeedSchema.default(42),
  })
  .strict();

export const EvaluationConfigSchema = EvaluationConfigFileSchema.transform((file) => ({
  datasetPath: file.dataset_path,
  outputDir: file.output_dir,
  sampleSize: file.sample_size,
  maxShots: file.max_shots,
  models: file.models,
  maxNewTokens: file.max_new_tokens,
  temperature: file.temperature,
  seed: file.seed,
}));

export type EvaluationConfigInput = z.input<typeof EvaluationConfigFileSchema>;
export type EvaluationConfig = z.output<typeof EvaluationConfigSchema>;
export type EvaluationConfigFile = z.output<typeof EvaluationConfigFileSchema>;

export function toEvaluationConfigFile(config: EvaluationConfig): EvaluationConfigFile {
  return {
    dataset_path: config.datasetPath,
    output_dir: config.outputDir,
    sample_size: config.sampleSize,
    max_shots: config.maxShots,
    models: config.models,
    max_new_tokens: config.maxNewTokens,
    temperature: config.temperature,
    seed: config.seed,
  };
}
