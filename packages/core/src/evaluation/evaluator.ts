import type { EvaluationConfig } from '@chronoqa/schemas/src/evaluation-config.schema.js';
import { createChildLogger } from '@chronoqa/shared/src/logger.js';
import type {
  DatasetQuestion,
  EvaluationResult,
  FewShotExample,
} from '@chronoqa/shared/src/types/evaluation.types.js';
import { EvaluationError, toError } from '@chronoqa/shared/src/utils/errors.js';
import { createRng } from '@chronoqa/shared/src/utils/rng.js';
import {
  createStratifiedSample,
  loadEvaluationDataset,
  selectFewShotExamples,
} from './dataset-loader.js';
import { calculateAllMetrics } from './metrics.js';
import { createModelClient } from './model-client.js';
import type { ModelClient, ModelClientFactory } from './model-client.js';
import { buildPrompt } from './prompt-builder.js';
import type { PromptStyle } from './prompt-builder.js';

const log = createChildLogger('evaluation:evaluator');

export interface EvaluatorDeps {
  readonly config: EvaluationConfig;
  readonly createClient?: ModelClientFactory;
  readonly loadDataset?: (datasetPath: string) => Promise<DatasetQuestion[]>;
  readonly promptStyle?: PromptStyle;
}

export interface EvaluationRun {
  readonly results: EvaluationResult[];
  readonly sample: readonly DatasetQuestion[];
  readonly examples: readonly FewShotExample[];
  readonly modelsEvaluated: string[];
  readonly modelsFailed: string[];
}

export interface Evaluator {
  evaluate(): Promise<EvaluationRun>;
}

function meanF1(results: readonly EvaluationResult[]): number {
  return results.length === 0 ? 0 : results.reduce((sum, r) => sum + r.f1, 0) / results.length;
}

export function createEvaluator(deps: EvaluatorDeps): Evaluator {
  const { config } = deps;
  const createClient = deps.createClient ?? createModelClient;
  const loadDataset = deps.loadDataset ?? loadEvaluationDataset;
  const promptStyle = deps.promptStyle ?? 'completion';

  async function evaluateModel(
    client: ModelClient,
    sample: readonly DatasetQuestion[],
    examples: readonly FewShotExample[],
  ): Promise<EvaluationResult[]> {
    const results: EvaluationResult[] = [];

    for (let shots = 0; shots <= config.maxShots; shots++) {
      const shotExamples = examples.slice(0, shots);
      const shotResults: EvaluationResult[] = [];

      for (const row of sample) {
        try {
          const prompt = buildPrompt(promptStyle, row.question, shotExamples);
          const prediction = await client.generate(prompt, config.maxNewTokens);
          shotResults.push({
            model: client.modelName,
            shots,
            questionType: row.questionType,
            domain: row.domain,
            question: row.question,
            trueAnswer: row.answer,
            predictedAnswer: prediction,
            ...calculateAllMetrics(prediction, row.answer),
          });
        } catch (error) {
          log.warn(
            { model: client.modelName, shots, question: row.question, error: toError(error).message },
            'Prediction failed, skipping question',
          );
        }
      }

      log.info(
        { model: client.modelName, shots, predictions: shotResults.length, f1: meanF1(shotResults) },
        'Shot configuration evaluated',
      );
      results.push(...shotResults);
    }

    return results;
  }

  return {
    async evaluate(): Promise<EvaluationRun> {
      const questions = await loadDataset(config.datasetPath);
      if (questions.length === 0) {
        throw new EvaluationError(`Dataset ${config.datasetPath} has no usable questions`);
      }

      const rng = createRng(config.seed);
      const sample = createStratifiedSample(questions, config.sampleSize, rng);
      const examples = selectFewShotExamples(questions, rng);

      log.info(
        { sample: sample.length, examples: examples.length, models: config.models },
        'Starting evaluation',
      );

      const results: EvaluationResult[] = [];
      const modelsEvaluated: string[] = [];
      const modelsFailed: string[] = [];

      for (const modelName of config.models) {
        let client: ModelClient;
        try {
          client = await createClient(modelName, { temperature: config.temperature });
        } catch (error) {
          log.error({ modelName, error: toError(error).message }, 'Failed to create model client');
          modelsFailed.push(modelName);
          continue;
        }

        results.push(...(await evaluateModel(client, sample, examples)));
        modelsEvaluated.push(modelName);
      }

      return { results, sample, examples, modelsEvaluated, modelsFailed };
    },
  };
}
