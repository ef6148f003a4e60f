import { parseArgs } from 'node:util';
import { loadGenerationConfig, parseSeedArgument } from '@chronoqa/schemas/src/config-loader.js';
import { createDatasetGenerator } from '@chronoqa/core/src/generation/dataset-generator.js';
import { createKnowledgeBase } from '@chronoqa/core/src/knowledge/knowledge-base.js';
import { logger } from '@chronoqa/shared/src/logger.js';

function optionalInt(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number.parseInt(value, 10);
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', short: 'c' },
      'output-dir': { type: 'string', short: 'o' },
      batches: { type: 'string', short: 'b' },
      'questions-per-batch': { type: 'string', short: 'q' },
      'knowledge-data': { type: 'string', short: 'k' },
      seed: { type: 'string', short: 's' },
    },
  });

  const config = await loadGenerationConfig(values.config, {
    output_dir: values['output-dir'],
    num_batches: optionalInt(values.batches),
    questions_per_batch: optionalInt(values['questions-per-batch']),
    seed: parseSeedArgument(values.seed),
  });

  console.log('=== ChronoQA Dataset Generator ===\n');
  console.log(`Output directory: ${config.outputDir}`);
  console.log(`Batches: ${String(config.numBatches)}`);
  console.log(`Questions per batch: ${String(config.questionsPerBatch)}`);
  console.log(`Years: ${String(config.startYear)}-${String(config.endYear)}\n`);

  const knowledgeBase = createKnowledgeBase({ dataPath: values['knowledge-data'] });
  const generator = createDatasetGenerator({ config, knowledgeBase });
  const summary = await generator.generate();

  console.log('--- Batches ---');
  for (const batch of summary.batches) {
    console.log(
      `  ${batch.file}: ${String(batch.questions)} questions ` +
        `(${String(batch.skipped)} skipped, ${String(batch.rejected)} rejected, ${String(batch.durationMs)}ms)`,
    );
  }

  console.log(`\nTotal questions: ${String(summary.totalQuestions)}`);
  console.log(`Seed: ${String(summary.seed)}`);
  console.log(`Duration: ${String(summary.durationMs)}ms`);
  console.log('\n=== Generation complete ===');
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Dataset generation failed');
  process.exit(1);
});
