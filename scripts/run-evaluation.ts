import { parseArgs } from 'node:util';
import { loadEvaluationConfig } from '@chronoqa/schemas/src/config-loader.js';
import { createEvaluator } from '@chronoqa/core/src/evaluation/evaluator.js';
import {
  analyzeResults,
  formatResultsTable,
  writeEvaluationOutputs,
} from '@chronoqa/core/src/evaluation/result-analyzer.js';
import { logger } from '@chronoqa/shared/src/logger.js';

function optionalInt(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number.parseInt(value, 10);
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', short: 'c' },
      dataset: { type: 'string', short: 'd' },
      'output-dir': { type: 'string', short: 'o' },
      'sample-size': { type: 'string', short: 'n' },
      'max-shots': { type: 'string' },
      model: { type: 'string', short: 'm', multiple: true },
    },
  });

  const config = await loadEvaluationConfig(values.config, {
    dataset_path: values.dataset,
    output_dir: values['output-dir'],
    sample_size: optionalInt(values['sample-size']),
    max_shots: optionalInt(values['max-shots']),
    models: values.model,
  });

  console.log('=== ChronoQA Model Evaluation ===\n');
  console.log(`Dataset: ${config.datasetPath}`);
  console.log(`Models: ${config.models.join(', ')}`);
  console.log(`Sample size: ${String(config.sampleSize)}, shots 0-${String(config.maxShots)}`);
  console.log(`Mock model: ${process.env['CHRONOQA_MOCK_MODEL'] === 'true' ? 'yes' : 'no'}\n`);

  const run = await createEvaluator({ config }).evaluate();

  if (run.results.length === 0) {
    throw new Error(`No predictions were produced; failed models: ${run.modelsFailed.join(', ')}`);
  }

  const analysis = analyzeResults(run.results);
  console.log(formatResultsTable(analysis));

  const outputs = await writeEvaluationOutputs({ config, results: run.results, analysis });

  console.log('\n--- Outputs ---');
  console.log(`  Results: ${outputs.resultsFile}`);
  console.log(`  Summary: ${outputs.summaryFile}`);
  console.log(`  Report: ${outputs.reportFile}`);
  if (run.modelsFailed.length > 0) {
    console.log(`\nSkipped models: ${run.modelsFailed.join(', ')}`);
  }
  console.log('\n=== Evaluation complete ===');
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Evaluation failed');
  process.exit(1);
});
