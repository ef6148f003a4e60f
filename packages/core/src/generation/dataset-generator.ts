import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { toGenerationConfigFile } from '@chronoqa/schemas/src/generation-config.schema.js';
import { createChildLogger } from '@chronoqa/shared/src/logger.js';
import { QUESTION_FIELDS, toQuestionRow } from '@chronoqa/shared/src/types/question.types.js';
import type { QuestionType } from '@chronoqa/shared/src/types/question.types.js';
import { ConfigurationError, PersistenceError, toError } from '@chronoqa/shared/src/utils/errors.js';
import { createRng } from '@chronoqa/shared/src/utils/rng.js';
import type { Rng } from '@chronoqa/shared/src/utils/rng.js';
import { DATASET_SUMMARY_FILE, batchFilePath } from '../output/batch-files.js';
import { createBufferedWriter } from '../output/buffered-writer.js';
import { createCsvSink } from '../output/csv-sink.js';
import { createSynthesizerRegistry } from '../synthesis/synthesizer-registry.js';
import type { QuestionSynthesizer, SynthesisContext, SynthesisResult } from '../synthesis/types.js';
import { createQuestionValidator } from '../validation/question-validator.js';
import { computeTypeQuotas } from './quotas.js';
import type { BatchSummary, DatasetGenerator, DatasetGeneratorDeps, DatasetSummary } from './types.js';

const log = createChildLogger('generation:dataset-generator');

export const DATASET_NAME = 'ChronoQA';

function synthesizeSafely(
  synthesizer: QuestionSynthesizer,
  context: SynthesisContext,
): SynthesisResult {
  try {
    return synthesizer.synthesize(context);
  } catch (error) {
    return { status: 'skipped', reason: toError(error).message };
  }
}

export function createDatasetGenerator(deps: DatasetGeneratorDeps): DatasetGenerator {
  const { config, knowledgeBase } = deps;
  const registry = deps.registry ?? createSynthesizerRegistry();
  const validator =
    deps.validator ?? createQuestionValidator({ minConfidence: config.qualityThreshold });
  const createSink = deps.createSink ?? createCsvSink;
  const now = deps.now ?? Date.now;

  const questionTypes: readonly QuestionType[] = config.questionTypes ?? registry.types();

  async function generateBatch(batchId: number, rng: Rng): Promise<BatchSummary> {
    const startTime = now();
    const target = config.questionsPerBatch;
    const file = batchFilePath(config.outputDir, batchId);
    const sink = createSink(file);
    const writer = createBufferedWriter({ sink, flushThreshold: config.batchWriteSize });
    const context: SynthesisContext = {
      knowledgeBase,
      batchId,
      rng,
      startYear: config.startYear,
      endYear: config.endYear,
    };

    const perType: Record<string, number> = {};
    for (const type of questionTypes) {
      perType[type] = 0;
    }
    let accepted = 0;
    let attempts = 0;
    let skipped = 0;
    let rejected = 0;

    log.info({ batchId, file, target }, 'Starting batch');

    await sink.open(QUESTION_FIELDS);
    try {
      for (const { type, quota } of computeTypeQuotas(target, questionTypes)) {
        if (accepted >= target) {
          break;
        }
        const synthesizer = registry.get(type);
        let typeAccepted = 0;

        for (let i = 0; i < quota && accepted < target; i++) {
          attempts++;
          const result = synthesizeSafely(synthesizer, context);
          if (result.status === 'skipped') {
            skipped++;
            log.debug({ batchId, type, reason: result.reason }, 'Synthesis skipped');
            continue;
          }

          const outcome = validator.evaluate(result.question);
          if (!outcome.accepted) {
            rejected++;
            log.trace(
              { batchId, type, stage: outcome.stage, reason: outcome.reason },
              'Question rejected',
            );
            continue;
          }

          await writer.add(toQuestionRow(result.question));
          accepted++;
          typeAccepted++;
        }

        perType[type] = typeAccepted;
        log.info({ batchId, type, accepted: typeAccepted, quota }, 'Question type finished');
      }

      await writer.close();
    } finally {
      await sink.close();
    }

    const summary: BatchSummary = {
      batchId,
      file,
      questions: accepted,
      attempts,
      skipped,
      rejected,
      perType,
      durationMs: now() - startTime,
    };
    log.info(
      { batchId, questions: accepted, attempts, skipped, rejected, durationMs: summary.durationMs },
      'Batch complete',
    );
    return summary;
  }

  async function writeSummary(summary: DatasetSummary): Promise<void> {
    const summaryPath = join(config.outputDir, DATASET_SUMMARY_FILE);
    try {
      await mkdir(config.outputDir, { recursive: true });
      await writeFile(summaryPath, `${JSON.stringify(summary, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new PersistenceError(`Failed to write dataset summary ${summaryPath}`, toError(error));
    }
  }

  return {
    async generate(): Promise<DatasetSummary> {
      const startTime = now();

      const missing = questionTypes.filter((type) => !registry.has(type));
      if (missing.length > 0) {
        throw new ConfigurationError(`No synthesizer registered for: ${missing.join(', ')}`);
      }

      await knowledgeBase.load();

      const seed = config.seed ?? startTime;
      const rng = createRng(seed);

      log.info(
        {
          numBatches: config.numBatches,
          questionsPerBatch: config.questionsPerBatch,
          questionTypes: questionTypes.length,
          seed,
        },
        'Starting dataset generation',
      );

      const batches: BatchSummary[] = [];
      for (let batchId = 1; batchId <= config.numBatches; batchId++) {
        batches.push(await generateBatch(batchId, rng));
      }

      const summary: DatasetSummary = {
        name: DATASET_NAME,
        generatedAt: new Date(now()).toISOString(),
        totalBatches: config.numBatches,
        totalQuestions: batches.reduce((sum, batch) => sum + batch.questions, 0),
        questionsPerBatch: config.questionsPerBatch,
        questionTypes,
        seed,
        durationMs: now() - startTime,
        config: { ...toGenerationConfigFile(config), seed },
        batches,
      };

      await writeSummary(summary);

      log.info(
        { totalQuestions: summary.totalQuestions, durationMs: summary.durationMs },
        'Dataset generation complete',
      );
      return summary;
    },
  };
}
