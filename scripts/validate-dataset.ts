import { parseArgs } from 'node:util';
import { inspectDatasetDirectory } from '@chronoqa/core/src/output/dataset-inspector.js';
import type { CsvFileReport } from '@chronoqa/core/src/output/dataset-inspector.js';
import { logger } from '@chronoqa/shared/src/logger.js';

function renderBatch(report: CsvFileReport): void {
  if (!report.readable) {
    console.log(`  ${report.file}: ${report.error}`);
    return;
  }

  console.log(
    `  ${report.file}: ${String(report.totalRows)} rows, ${report.fileSizeMb.toFixed(2)} MB, ` +
      `${String(report.columns.length)} columns`,
  );
  if (report.malformedRows.length > 0) {
    const shown = report.malformedRows.slice(0, 10).join(', ');
    console.log(`    Malformed rows: ${shown}${report.malformedRows.length > 10 ? ', ...' : ''}`);
  }
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      dir: { type: 'string', short: 'd' },
      batches: { type: 'string', short: 'b' },
    },
  });

  const directory = values.dir ?? 'data/generated';
  const batches = values.batches ?? '5';
  const expected = Number.parseInt(batches, 10);
  if (!Number.isInteger(expected) || expected < 1) {
    throw new Error(`--batches must be a positive integer, got "${batches}"`);
  }

  console.log('=== ChronoQA Dataset Validation ===\n');
  console.log(`Directory: ${directory}`);
  console.log(`Expected batches: ${String(expected)}\n`);

  const report = await inspectDatasetDirectory(directory, expected);

  for (const batch of report.batches) {
    renderBatch(batch);
  }

  console.log(`\nFiles found: ${String(report.filesFound)}/${String(report.totalExpected)}`);
  console.log(`Total questions: ${String(report.totalQuestions)}`);
  console.log(`Total size: ${report.totalSizeMb.toFixed(2)} MB`);
  console.log(`\nDataset is ${report.valid ? 'valid' : 'INVALID'}`);

  if (!report.valid) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Dataset validation failed');
  process.exit(1);
});
