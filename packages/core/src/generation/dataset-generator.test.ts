import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { GenerationConfigSchema } from '@chronoqa/schemas/src/generation-config.schema.js';
import type { GenerationConfigInput } from '@chronoqa/schemas/src/generation-config.schema.js';
import { QUESTION_FIELDS, QUESTION_TYPES } from '@chronoqa/shared/src/types/question.types.js';
import type { QuestionType } from '@chronoqa/shared/src/types/question.types.js';
import { ConfigurationError, PersistenceError } from '@chronoqa/shared/src/utils/errors.js';
import { createKnowledgeBase } from '../knowledge/knowledge-base.js';
import { parseCsv } from '../output/csv.js';
import type { RecordSink } from '../output/csv-sink.js';
import { buildQuestion, defineSynthesizer } from '../synthesis/question-builder.js';
import { createSynthesizerRegistry } from '../synthesis/synthesizer-registry.js';
import { synthesized } from '../synthesis/types.js';
import type { QuestionSynthesizer } from '../synthesis/types.js';
import { createDatasetGenerator } from './dataset-generator.js';

function alwaysSucceeds(type: QuestionType): QuestionSynthesizer {
  return defineSynthesizer(type, 'stub', (context) =>
    synthesized(
      buildQuestion(context, type, 'stub', {
        question: 'Which occurred first, World War I or World War II?',
        answer: 'World War I',
        difficulty: 2,
        temporalGranularity: 'year',
        entities: ['World War I', 'World War II'],
        countries: ['Europe', 'Global'],
        hopCount: 2,
        confidenceScore: 0.9,
        domain: 'comparison',
        requiresCalculation: false,
        complexityScore: 0.6,
      }),
    ),
  );
}

function alwaysThrows(type: QuestionType): QuestionSynthesizer {
  return defineSynthesizer(type, 'broken', () => {
    throw new Error('template exploded');
  });
}

describe('createDatasetGenerator', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dataset-generator-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function configFor(overrides: GenerationConfigInput = {}) {
    return GenerationConfigSchema.parse({
      output_dir: dir,
      num_batches: 1,
      questions_per_batch: 10,
      seed: 'test-seed',
      ...overrides,
    });
  }

  async function readRows(file: string): Promise<string[][]> {
    return parseCsv(await readFile(file, 'utf-8'));
  }

  it('should stop each batch at exactly the target when synthesis always succeeds', async () => {
    const generator = createDatasetGenerator({
      config: configFor({ num_batches: 2 }),
      knowledgeBase: createKnowledgeBase(),
      registry: createSynthesizerRegistry(QUESTION_TYPES.map(alwaysSucceeds)),
    });

    const summary = await generator.generate();

    expect(summary.totalQuestions).toBe(20);
    for (const batch of summary.batches) {
      const rows = await readRows(batch.file);
      expect(rows).toHaveLength(11);
      expect(batch.questions).toBe(10);
      expect(batch.attempts).toBe(10);
      expect(batch.perType['attribute_event']).toBe(1);
      expect(batch.perType['temporal_overlap']).toBe(0);
    }
    expect(summary.batches.map((b) => b.file)).toEqual([
      join(dir, 'batch_001.csv'),
      join(dir, 'batch_002.csv'),
    ]);
  });

  it('should write the curated dataset end to end', async () => {
    const generator = createDatasetGenerator({
      config: configFor(),
      knowledgeBase: createKnowledgeBase(),
    });

    const summary = await generator.generate();

    const rows = await readRows(join(dir, 'batch_001.csv'));
    const [header, ...dataRows] = rows;
    expect(header).toEqual([...QUESTION_FIELDS]);
    expect(dataRows.length).toBeGreaterThanOrEqual(1);
    expect(dataRows.length).toBeLessThanOrEqual(10);
    expect(dataRows.every((row) => row.length === QUESTION_FIELDS.length)).toBe(true);
    expect(dataRows.every((row) => row[16] === '1')).toBe(true);

    const written = JSON.parse(await readFile(join(dir, 'dataset_summary.json'), 'utf-8')) as unknown;
    expect(written).toMatchObject({
      name: 'ChronoQA',
      totalBatches: 1,
      totalQuestions: dataRows.length,
      questionsPerBatch: 10,
      seed: 'test-seed',
      batches: [{ batchId: 1, file: join(dir, 'batch_001.csv'), questions: dataRows.length }],
    });
    expect(summary.questionTypes).toEqual([...QUESTION_TYPES]);
    expect(summary.config.output_dir).toBe(dir);
  });

  it('should produce identical files for the same seed', async () => {
    const first = await createDatasetGenerator({
      config: configFor({ output_dir: join(dir, 'a'), questions_per_batch: 40 }),
      knowledgeBase: createKnowledgeBase(),
    }).generate();
    const second = await createDatasetGenerator({
      config: configFor({ output_dir: join(dir, 'b'), questions_per_batch: 40 }),
      knowledgeBase: createKnowledgeBase(),
    }).generate();

    const a = await readFile(first.batches[0].file, 'utf-8');
    const b = await readFile(second.batches[0].file, 'utf-8');
    expect(a).toBe(b);
  });

  it('should count thrown synthesis errors as skips', async () => {
    const generator = createDatasetGenerator({
      config: configFor({ question_types: ['attribute_event', 'counterfactual'] }),
      knowledgeBase: createKnowledgeBase(),
      registry: createSynthesizerRegistry([
        alwaysThrows('attribute_event'),
        alwaysSucceeds('counterfactual'),
      ]),
    });

    const summary = await generator.generate();

    expect(summary.batches[0]).toMatchObject({
      questions: 5,
      attempts: 10,
      skipped: 5,
      rejected: 0,
      perType: { attribute_event: 0, counterfactual: 5 },
    });
  });

  it('should count validator rejections', async () => {
    const generator = createDatasetGenerator({
      config: configFor({ question_types: ['attribute_event'], quality_threshold: 0.95 }),
      knowledgeBase: createKnowledgeBase(),
      registry: createSynthesizerRegistry([alwaysSucceeds('attribute_event')]),
    });

    const summary = await generator.generate();

    expect(summary.batches[0]).toMatchObject({ questions: 0, attempts: 10, rejected: 10 });
    expect(await readRows(summary.batches[0].file)).toEqual([[...QUESTION_FIELDS]]);
  });

  it('should abort when the sink cannot write', async () => {
    let closed = false;
    const failingSink: RecordSink = {
      open: () => Promise.resolve(),
      writeBatch: () => Promise.reject(new PersistenceError('disk full')),
      close: () => {
        closed = true;
        return Promise.resolve();
      },
      rowsWritten: 0,
    };
    const generator = createDatasetGenerator({
      config: configFor({ batch_write_size: 1 }),
      knowledgeBase: createKnowledgeBase(),
      registry: createSynthesizerRegistry(QUESTION_TYPES.map(alwaysSucceeds)),
      createSink: () => failingSink,
    });

    await expect(generator.generate()).rejects.toThrow(PersistenceError);
    expect(closed).toBe(true);
  });

  it('should reject question types without a synthesizer', async () => {
    const generator = createDatasetGenerator({
      config: configFor({ question_types: ['attribute_event', 'counterfactual'] }),
      knowledgeBase: createKnowledgeBase(),
      registry: createSynthesizerRegistry([alwaysSucceeds('attribute_event')]),
    });

    await expect(generator.generate()).rejects.toThrow(ConfigurationError);
  });

  it('should derive and record a seed when none is configured', async () => {
    const config = GenerationConfigSchema.parse({
      output_dir: dir,
      num_batches: 1,
      questions_per_batch: 2,
    });
    const generator = createDatasetGenerator({
      config,
      knowledgeBase: createKnowledgeBase(),
      registry: createSynthesizerRegistry(QUESTION_TYPES.map(alwaysSucceeds)),
      now: () => 1_700_000_000_000,
    });

    const summary = await generator.generate();

    expect(summary.seed).toBe(1_700_000_000_000);
    expect(summary.config.seed).toBe(1_700_000_000_000);
    expect(summary.generatedAt).toBe('2023-11-14T22:13:20.000Z');
    expect(summary.durationMs).toBe(0);
  });
});
