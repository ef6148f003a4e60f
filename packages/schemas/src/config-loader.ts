import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@chronoqa/shared/src/utils/errors.js';
import { validateEvaluationConfig, validateGenerationConfig } from './validators.js';
import type { GenerationConfig, GenerationConfigInput } from './generation-config.schema.js';
import type { EvaluationConfig, EvaluationConfigInput } from './evaluation-config.schema.js';

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readConfigObject(filePath: string | undefined): Promise<Record<string, unknown>> {
  if (!filePath) {
    return {};
  }
  const raw = await readJsonFile(filePath);
  if (!isPlainObject(raw)) {
    throw new ConfigurationError(`Configuration in ${filePath} must be a JSON object`);
  }
  return raw;
}

function withoutUndefined(overrides: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
}

/** Digit-only values become numbers, so `--seed 42` seeds like `"seed": 42`. */
export function parseSeedArgument(value: string | undefined): string | number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    return value;
  }
  const seed = Number.parseInt(value, 10);
  return Number.isSafeInteger(seed) ? seed : value;
}

/**
 * Reads an optional JSON config file and applies CLI overrides on top.
 * Overrides set to `undefined` leave the file value in place.
 */
export async function loadGenerationConfig(
  filePath?: string,
  overrides: Partial<GenerationConfigInput> = {},
): Promise<GenerationConfig> {
  const fileConfig = await readConfigObject(filePath);
  return validateGenerationConfig({ ...fileConfig, ...withoutUndefined(overrides) });
}

export async function loadEvaluationConfig(
  filePath?: string,
  overrides: Partial<EvaluationConfigInput> = {},
): Promise<EvaluationConfig> {
  const fileConfig = await readConfigObject(filePath);
  return validateEvaluationConfig({ ...fileConfig, ...withoutUndefined(overrides) });
}
