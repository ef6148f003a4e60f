import { readFile, stat } from 'node:fs/promises';
import { parseCsv } from './csv.js';
import { batchFilePath } from './batch-files.js';

const BYTES_PER_MB = 1024 * 1024;

export interface ReadableFileReport {
  readonly file: string;
  readonly exists: true;
  readonly readable: true;
  readonly columns: string[];
  readonly totalRows: number;
  readonly fileSizeMb: number;
  /** 1-based data row numbers whose field count differs from the header. */
  readonly malformedRows: number[];
}

export interface UnreadableFileReport {
  readonly file: string;
  readonly exists: boolean;
  readonly readable: false;
  readonly error: string;
}

export type CsvFileReport = ReadableFileReport | UnreadableFileReport;

export interface DatasetReport {
  readonly directory: string;
  readonly totalExpected: number;
  readonly filesFound: number;
  readonly totalQuestions: number;
  readonly totalSizeMb: number;
  readonly batches: CsvFileReport[];
  /** True when every expected file exists, parses and has no malformed rows. */
  readonly valid: boolean;
}

export async function inspectCsvFile(filePath: string): Promise<CsvFileReport> {
  let text: string;
  let sizeBytes: number;
  try {
    const info = await stat(filePath);
    sizeBytes = info.size;
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      return { file: filePath, exists: false, readable: false, error: 'File not found' };
    }
    return { file: filePath, exists: true, readable: false, error: nodeError.message };
  }

  const rows = parseCsv(text);
  if (rows.length === 0) {
    return { file: filePath, exists: true, readable: false, error: 'File is empty' };
  }

  const [columns, ...dataRows] = rows;
  const malformedRows: number[] = [];
  dataRows.forEach((row, index) => {
    if (row.length !== columns.length) {
      malformedRows.push(index + 1);
    }
  });

  return {
    file: filePath,
    exists: true,
    readable: true,
    columns,
    totalRows: dataRows.length,
    fileSizeMb: sizeBytes / BYTES_PER_MB,
    malformedRows,
  };
}

export async function inspectDatasetDirectory(
  directory: string,
  expectedBatches: number,
): Promise<DatasetReport> {
  const batches: CsvFileReport[] = [];
  for (let batchId = 1; batchId <= expectedBatches; batchId++) {
    batches.push(await inspectCsvFile(batchFilePath(directory, batchId)));
  }

  const readable = batches.filter((b): b is ReadableFileReport => b.readable);

  return {
    directory,
    totalExpected: expectedBatches,
    filesFound: batches.filter((b) => b.exists).length,
    totalQuestions: readable.reduce((sum, b) => sum + b.totalRows, 0),
    totalSizeMb: readable.reduce((sum, b) => sum + b.fileSizeMb, 0),
    batches,
    valid:
      readable.length === expectedBatches && readable.every((b) => b.malformedRows.length === 0),
  };
}
