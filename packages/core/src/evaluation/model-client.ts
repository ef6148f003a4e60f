import type { ChatVertexAI } from '@langchain/google-vertexai';
import { createChildLogger } from '@chronoqa/shared/src/logger.js';
import { ConfigurationError, ModelError, toError } from '@chronoqa/shared/src/utils/errors.js';
import { hashSeed } from '@chronoqa/shared/src/utils/rng.js';
import { cleanResponse } from './response-cleaner.js';

const log = createChildLogger('evaluation:model-client');

const MAX_TRANSIENT_RETRIES = 3;
const BASE_DELAY_MS = 1000;

export interface ModelClient {
  readonly modelName: string;
  /** Resolves with the cleaned, short prediction. */
  generate(prompt: string, maxNewTokens: number): Promise<string>;
}

export interface ModelClientOptions {
  readonly temperature: number;
}

export type ModelClientFactory = (
  modelName: string,
  options: ModelClientOptions,
) => Promise<ModelClient>;

const MOCK_PEOPLE = ['einstein', 'churchill', 'mandela'];
const MOCK_PLACES = ['united states', 'europe', 'global', 'soviet union'];

/** The final question of a prompt, which is what the mock answers. */
function lastQuestion(prompt: string): string {
  const lines = prompt
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => /^(?:question|q|human):/i.test(line));
  const last = lines.at(-1) ?? prompt;
  return last.replace(/^(?:question|q|human):\s*/i, '').toLowerCase();
}

export function createMockResponse(prompt: string): string {
  const question = lastQuestion(prompt);
  const hash = hashSeed(question);

  if (/\b(?:how many|count|number)\b/.test(question)) {
    return String((hash % 10) + 1);
  }
  if (/\b(?:how long|duration|lived?)\b/.test(question)) {
    return `${String((hash % 30) + 1)} years`;
  }
  if (/\b(?:when|year|decade|century)\b/.test(question)) {
    return String(1900 + (hash % 126));
  }
  if (/\bwho\b/.test(question)) {
    return MOCK_PEOPLE[hash % MOCK_PEOPLE.length];
  }
  if (/\b(?:where|country|location)\b/.test(question)) {
    return MOCK_PLACES[hash % MOCK_PLACES.length];
  }
  if (/^(?:did|was|is|could|had|were)\b/.test(question)) {
    return hash % 2 === 0 ? 'yes' : 'no';
  }
  return 'unknown';
}

function createMockModelClient(modelName: string): ModelClient {
  log.info({ modelName }, 'Using mock model client');

  return {
    modelName,
    generate(prompt: string): Promise<string> {
      log.debug({ modelName, promptLength: prompt.length }, 'Mock model invocation');
      return Promise.resolve(cleanResponse(createMockResponse(prompt)));
    },
  };
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const errorRecord = error as unknown as Record<string, unknown>;
  const statusCode =
    (typeof errorRecord['status'] === 'number' ? errorRecord['status'] : undefined) ??
    (typeof errorRecord['statusCode'] === 'number' ? errorRecord['statusCode'] : undefined);

  if (typeof statusCode === 'number' && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  const transientPatterns = [
    '429', 'rate limit', 'too many requests',
    '500', '502', '503', 'internal server error', 'bad gateway', 'service unavailable',
    'econnreset', 'etimedout', 'timeout', 'network',
    'socket hang up', 'econnrefused',
  ];

  return transientPatterns.some((pattern) => message.includes(pattern));
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function computeBackoffMs(attempt: number): number {
  const exponential = BASE_DELAY_MS * Math.pow(2, attempt);
  const jitter = Math.random() * BASE_DELAY_MS;
  return exponential + jitter;
}

async function createVertexModelClient(
  modelName: string,
  options: ModelClientOptions,
): Promise<ModelClient> {
  const projectId = process.env['CHRONOQA_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'];
  const location = process.env['VERTEX_AI_LOCATION'] ?? 'europe-west1';

  if (!projectId) {
    throw new ConfigurationError(
      'CHRONOQA_GCP_PROJECT_ID environment variable is required for the Vertex AI model client',
    );
  }

  const { ChatVertexAI: ChatModel } = await import('@langchain/google-vertexai');

  // One chat model per output budget; the budget is fixed at construction.
  const models = new Map<number, ChatVertexAI>();
  const modelFor = (maxNewTokens: number): ChatVertexAI => {
    const existing = models.get(maxNewTokens);
    if (existing) {
      return existing;
    }
    const created = new ChatModel({
      model: modelName,
      location,
      temperature: options.temperature,
      maxOutputTokens: maxNewTokens,
      authOptions: { projectId },
    });
    models.set(maxNewTokens, created);
    return created;
  };

  log.info({ modelName, projectId, location }, 'Using Vertex AI model client');

  return {
    modelName,
    async generate(prompt: string, maxNewTokens: number): Promise<string> {
      log.debug({ modelName, promptLength: prompt.length }, 'Vertex AI model invocation');

      let lastError: Error | undefined;

      for (let attempt = 0; attempt < MAX_TRANSIENT_RETRIES; attempt++) {
        try {
          const response = await modelFor(maxNewTokens).invoke([['human', prompt]]);
          const content =
            typeof response.content === 'string'
              ? response.content
              : JSON.stringify(response.content);
          return cleanResponse(content);
        } catch (error) {
          lastError = toError(error);

          if (!isTransientError(error)) {
            throw new ModelError(
              `Vertex AI invocation failed: ${lastError.message}`,
              false,
              lastError,
            );
          }

          log.warn(
            { attempt: attempt + 1, maxRetries: MAX_TRANSIENT_RETRIES, error: lastError.message },
            'Transient model error, retrying',
          );

          if (attempt < MAX_TRANSIENT_RETRIES - 1) {
            await sleep(computeBackoffMs(attempt));
          }
        }
      }

      throw new ModelError(
        `Vertex AI invocation failed after ${String(MAX_TRANSIENT_RETRIES)} retries: ${lastError?.message ?? 'unknown error'}`,
        true,
        lastError,
      );
    },
  };
}

export async function createModelClient(
  modelName: string,
  options: ModelClientOptions,
): Promise<ModelClient> {
  if (process.env['CHRONOQA_MOCK_MODEL'] === 'true') {
    return createMockModelClient(modelName);
  }

  return createVertexModelClient(modelName, options);
}
