import type { CsvRecord } from './csv.js';
import type { RecordSink } from './csv-sink.js';

export interface BufferedWriterOptions {
  readonly sink: RecordSink;
  readonly flushThreshold: number;
}

export interface BufferedWriter {
  /** Buffers the record and flushes once the buffer reaches the threshold. */
  add(record: CsvRecord): Promise<void>;
  flush(): Promise<void>;
  /** Flushes what is left and closes the sink. */
  close(): Promise<void>;
  readonly written: number;
  readonly buffered: number;
}

export function createBufferedWriter(options: BufferedWriterOptions): BufferedWriter {
  const { sink } = options;
  const flushThreshold = Math.max(1, options.flushThreshold);
  let buffer: CsvRecord[] = [];
  let written = 0;

  async function flush(): Promise<void> {
    if (buffer.length === 0) {
      return;
    }
    const pending = buffer;
    buffer = [];
    await sink.writeBatch(pending);
    written += pending.length;
  }

  return {
    async add(record) {
      buffer.push(record);
      if (buffer.length >= flushThreshold) {
        await flush();
      }
    },

    flush,

    async close() {
      await flush();
      await sink.close();
    },

    get written() {
      return written;
    },

    get buffered() {
      return buffer.length;
    },
  };
}
