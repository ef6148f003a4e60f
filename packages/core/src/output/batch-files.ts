import { join } from 'node:path';

export const DATASET_SUMMARY_FILE = 'dataset_summary.json';

/** `batch_001.csv`, `batch_002.csv`, ... */
export function batchFileName(batchId: number): string {
  return `batch_${String(batchId).padStart(3, '0')}.csv`;
}

export function batchFilePath(outputDir: string, batchId: number): string {
  return join(outputDir, batchFileName(batchId));
}
