import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { toEvaluationConfigFile } from '@chronoqa/schemas/src/evaluation-config.schema.js';
import type { EvaluationConfig } from '@chronoqa/schemas/src/evaluation-config.schema.js';
import { createChildLogger } from '@chronoqa/shared/src/logger.js';
import type { EvaluationResult } from '@chronoqa/shared/src/types/evaluation.types.js';
import { PersistenceError, toError } from '@chronoqa/shared/src/utils/errors.js';
import { formatCsvRow } from '../output/csv.js';

const log = createChildLogger('evaluation:result-analyzer');

const TOP_CONFIGURATIONS = 10;
const TOP_IMPROVEMENTS = 5;

export interface ConfigurationStats {
  readonly model: string;
  readonly shots: number;
  readonly count: number;
  readonly precision: number;
  readonly recall: number;
  readonly f1: number;
  readonly containment: number;
  readonly exactMatch: number;
}

export interface FewShotImprovement {
  readonly model: string;
  readonly zeroShotF1: number;
  readonly bestF1: number;
  readonly improvement: number;
}

export interface QuestionTypeStats {
  readonly questionType: string;
  readonly f1: number;
  readonly exactMatch: number;
}

export interface MeanStd {
  readonly mean: number;
  readonly std: number;
}

export interface ShotStats {
  readonly shots: number;
  readonly f1: MeanStd;
  readonly exactMatch: MeanStd;
  readonly precision: MeanStd;
  readonly recall: MeanStd;
}

export interface EvaluationAnalysis {
  readonly totalPredictions: number;
  readonly models: string[];
  readonly questionTypes: string[];
  readonly configurations: ConfigurationStats[];
  readonly bestConfigurations: ConfigurationStats[];
  readonly improvements: FewShotImprovement[];
  readonly questionTypePerformance: QuestionTypeStats[];
  readonly shotStats: ShotStats[];
}

export const RESULT_COLUMNS = [
  'model',
  'shots',
  'question_type',
  'domain',
  'question',
  'true_answer',
  'predicted_answer',
  'precision',
  'recall',
  'f1',
  'exact_match',
  'containment',
] as const;

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Population standard deviation. */
function std(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const m = mean(values);
  return Math.sqrt(mean(values.map((v) => (v - m) ** 2)));
}

function meanStd(values: readonly number[]): MeanStd {
  return { mean: mean(values), std: std(values) };
}

function groupBy<T, K>(items: readonly T[], key: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k) ?? [];
    group.push(item);
    groups.set(k, group);
  }
  return groups;
}

function distinct(values: readonly string[]): string[] {
  return [...new Set(values)];
}

export function analyzeResults(results: readonly EvaluationResult[]): EvaluationAnalysis {
  const configurations: ConfigurationStats[] = [];
  for (const [model, modelResults] of groupBy(results, (r) => r.model)) {
    for (const [shots, group] of groupBy(modelResults, (r) => r.shots)) {
      configurations.push({
        model,
        shots,
        count: group.length,
        precision: mean(group.map((r) => r.precision)),
        recall: mean(group.map((r) => r.recall)),
        f1: mean(group.map((r) => r.f1)),
        containment: mean(group.map((r) => r.containment)),
        exactMatch: mean(group.map((r) => r.exactMatch)),
      });
    }
  }
  configurations.sort((a, b) => a.model.localeCompare(b.model) || a.shots - b.shots);

  const bestConfigurations = [...configurations]
    .sort((a, b) => b.f1 - a.f1)
    .slice(0, TOP_CONFIGURATIONS);

  const improvements: FewShotImprovement[] = [];
  for (const [model, modelConfigs] of groupBy(configurations, (c) => c.model)) {
    const zeroShot = modelConfigs.find((c) => c.shots === 0);
    if (!zeroShot || modelConfigs.length < 2) {
      continue;
    }
    const bestF1 = Math.max(...modelConfigs.map((c) => c.f1));
    improvements.push({
      model,
      zeroShotF1: zeroShot.f1,
      bestF1,
      improvement: bestF1 - zeroShot.f1,
    });
  }
  improvements.sort((a, b) => b.improvement - a.improvement);

  const questionTypePerformance = [...groupBy(results, (r) => r.questionType)]
    .map(([questionType, group]): QuestionTypeStats => ({
      questionType,
      f1: mean(group.map((r) => r.f1)),
      exactMatch: mean(group.map((r) => r.exactMatch)),
    }))
    .sort((a, b) => b.f1 - a.f1);

  const shotStats = [...groupBy(results, (r) => r.shots)]
    .map(([shots, group]): ShotStats => ({
      shots,
      f1: meanStd(group.map((r) => r.f1)),
      exactMatch: meanStd(group.map((r) => r.exactMatch)),
      precision: meanStd(group.map((r) => r.precision)),
      recall: meanStd(group.map((r) => r.recall)),
    }))
    .sort((a, b) => a.shots - b.shots);

  return {
    totalPredictions: results.length,
    models: distinct(results.map((r) => r.model)),
    questionTypes: distinct(results.map((r) => r.questionType)),
    configurations,
    bestConfigurations,
    improvements: improvements.slice(0, TOP_IMPROVEMENTS),
    questionTypePerformance,
    shotStats,
  };
}

const fmt = (value: number): string => value.toFixed(3);

function shortModelName(model: string, width: number): string {
  return (model.split('/').at(-1) ?? model).slice(0, width);
}

export function formatResultsTable(analysis: EvaluationAnalysis): string {
  const lines = [
    `${'Model'.padEnd(30)} ${'Shots'.padEnd(6)} ${'Precision'.padEnd(10)} ${'Recall'.padEnd(10)} ${'F1'.padEnd(10)} ${'Containment'.padEnd(12)} EM`,
    '-'.repeat(88),
  ];
  for (const c of analysis.configurations) {
    lines.push(
      `${shortModelName(c.model, 25).padEnd(30)} ${String(c.shots).padEnd(6)} ${fmt(c.precision).padEnd(10)} ${fmt(c.recall).padEnd(10)} ${fmt(c.f1).padEnd(10)} ${fmt(c.containment).padEnd(12)} ${fmt(c.exactMatch)}`,
    );
  }
  return lines.join('\n');
}

export function formatReport(analysis: EvaluationAnalysis): string {
  const lines = [
    'ChronoQA Evaluation Report',
    '='.repeat(40),
    '',
    'Dataset Statistics:',
    `  Total predictions: ${String(analysis.totalPredictions)}`,
    `  Models evaluated: ${String(analysis.models.length)}`,
    `  Question types: ${String(analysis.questionTypes.length)}`,
    '',
    'Top Configurations:',
    ...analysis.bestConfigurations.map(
      (c, i) => `  ${String(i + 1)}. ${c.model} (${String(c.shots)}-shot): F1=${fmt(c.f1)}`,
    ),
    '',
    'Few-shot Improvements:',
    ...analysis.improvements.map(
      (imp) =>
        `  ${imp.model}: ${fmt(imp.zeroShotF1)} -> ${fmt(imp.bestF1)} (+${fmt(imp.improvement)})`,
    ),
    '',
    'Performance by Question Type:',
    ...analysis.questionTypePerformance.map(
      (q) => `  ${q.questionType}: F1=${fmt(q.f1)}, EM=${fmt(q.exactMatch)}`,
    ),
    '',
    'Performance by Shot Count:',
    ...analysis.shotStats.map(
      (s) => `  ${String(s.shots)}-shot: F1=${fmt(s.f1.mean)}±${fmt(s.f1.std)}`,
    ),
  ];
  return `${lines.join('\n')}\n`;
}

/** `YYYYMMDD_HHMMSS` in UTC. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${String(date.getUTCFullYear())}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export interface EvaluationOutputs {
  readonly resultsFile: string;
  readonly summaryFile: string;
  readonly reportFile: string;
}

export interface WriteEvaluationOutputsParams {
  readonly config: EvaluationConfig;
  readonly results: readonly EvaluationResult[];
  readonly analysis: EvaluationAnalysis;
  readonly date?: Date;
}

function toResultRecord(result: EvaluationResult): Record<(typeof RESULT_COLUMNS)[number], string | number> {
  return {
    model: result.model,
    shots: result.shots,
    question_type: result.questionType,
    domain: result.domain,
    question: result.question,
    true_answer: result.trueAnswer,
    predicted_answer: result.predictedAnswer,
    precision: result.precision,
    recall: result.recall,
    f1: result.f1,
    exact_match: result.exactMatch,
    containment: result.containment,
  };
}

export async function writeEvaluationOutputs(
  params: WriteEvaluationOutputsParams,
): Promise<EvaluationOutputs> {
  const { config, results, analysis } = params;
  const timestamp = formatTimestamp(params.date ?? new Date());
  const outputs: EvaluationOutputs = {
    resultsFile: join(config.outputDir, `evaluation_results_${timestamp}.csv`),
    summaryFile: join(config.outputDir, `evaluation_summary_${timestamp}.json`),
    reportFile: join(config.outputDir, 'evaluation_report.txt'),
  };

  const csv = [
    RESULT_COLUMNS.join(','),
    ...results.map((r) => formatCsvRow(RESULT_COLUMNS, toResultRecord(r))),
  ].join('\n');

  const summary = {
    evaluationDate: timestamp,
    dataset: config.datasetPath,
    modelsEvaluated: analysis.models,
    totalPredictions: results.length,
    sampleSize: config.sampleSize,
    config: toEvaluationConfigFile(config),
    analysis: {
      bestConfigurations: analysis.bestConfigurations,
      improvements: analysis.improvements,
      questionTypePerformance: analysis.questionTypePerformance,
      shotStats: analysis.shotStats,
    },
  };

  try {
    await mkdir(config.outputDir, { recursive: true });
    await writeFile(outputs.resultsFile, `${csv}\n`, 'utf-8');
    await writeFile(outputs.summaryFile, `${JSON.stringify(summary, null, 2)}\n`, 'utf-8');
    await writeFile(outputs.reportFile, formatReport(analysis), 'utf-8');
  } catch (error) {
    throw new PersistenceError(
      `Failed to write evaluation outputs to ${config.outputDir}`,
      toError(error),
    );
  }

  log.info({ ...outputs, predictions: results.length }, 'Evaluation outputs written');
  return outputs;
}
