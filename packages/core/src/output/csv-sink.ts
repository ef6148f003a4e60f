import { mkdir, open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createChildLogger } from '@chronoqa/shared/src/logger.js';
import { PersistenceError, toError } from '@chronoqa/shared/src/utils/errors.js';
import { formatCsvRow } from './csv.js';
import type { CsvRecord } from './csv.js';

const log = createChildLogger('output:csv-sink');

export interface RecordSink {
  /** Creates the file and writes the header row. */
  open(headerFields: readonly string[]): Promise<void>;
  writeBatch(records: readonly CsvRecord[]): Promise<void>;
  /** Idempotent; a no-op when the sink was never opened. */
  close(): Promise<void>;
  readonly rowsWritten: number;
}

export function createCsvSink(filePath: string): RecordSink {
  let handle: FileHandle | undefined;
  let header: readonly string[] = [];
  let rowsWritten = 0;

  return {
    async open(headerFields) {
      if (handle) {
        throw new PersistenceError(`CSV sink for ${filePath} is already open`);
      }
      try {
        await mkdir(dirname(filePath), { recursive: true });
        handle = await open(filePath, 'w');
        await handle.write(`${headerFields.join(',')}\n`);
      } catch (error) {
        throw new PersistenceError(`Failed to open ${filePath}`, toError(error));
      }
      header = headerFields;
      log.debug({ filePath, columns: headerFields.length }, 'CSV sink opened');
    },

    async writeBatch(records) {
      if (!handle) {
        throw new PersistenceError(`CSV sink for ${filePath} written before open()`);
      }
      if (records.length === 0) {
        return;
      }

      const text = records.map((record) => `${formatCsvRow(header, record)}\n`).join('');
      try {
        await handle.write(text);
      } catch (error) {
        throw new PersistenceError(`Failed to write to ${filePath}`, toError(error));
      }
      rowsWritten += records.length;
    },

    async close() {
      if (!handle) {
        return;
      }
      const current = handle;
      handle = undefined;
      try {
        await current.close();
      } catch (error) {
        throw new PersistenceError(`Failed to close ${filePath}`, toError(error));
      }
      log.debug({ filePath, rowsWritten }, 'CSV sink closed');
    },

    get rowsWritten() {
      return rowsWritten;
    },
  };
}
