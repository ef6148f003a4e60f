import type { ZodError } from 'zod';
import { SchemaValidationError } from '@chronoqa/shared/src/utils/errors.js';
import { GenerationConfigSchema } from './generation-config.schema.js';
import type { GenerationConfig } from './generation-config.schema.js';
import { EvaluationConfigSchema } from './evaluation-config.schema.js';
import type { EvaluationConfig } from './evaluation-config.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateGenerationConfig(data: unknown): GenerationConfig {
  const result = GenerationConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError(
      'Invalid generation configuration',
      formatZodErrors(result.error),
    );
  }

  return result.data;
}

export function validateEvaluationConfig(data: unknown): EvaluationConfig {
  const result = EvaluationConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError(
      'Invalid evaluation configuration',
      formatZodErrors(result.error),
    );
  }

  return result.data;
}
