import { describe, it, expect, afterEach, vi } from 'vitest';
import { ConfigurationError } from '@chronoqa/shared/src/utils/errors.js';
import { createMockResponse, createModelClient, isTransientError } from './model-client.js';

const MOCK_PEOPLE = ['einstein', 'churchill', 'mandela'];

describe('createMockResponse', () => {
  it('should answer counting questions with a small number', () => {
    const response = createMockResponse('Question: How many wars began after 1900?\nAnswer:');

    expect(Number(response)).toBeGreaterThanOrEqual(1);
    expect(Number(response)).toBeLessThanOrEqual(10);
  });

  it('should answer the last question of a few-shot prompt', () => {
    const prompt =
      'Question: Who led the United Kingdom in 1940?\nAnswer: churchill\n\n' +
      'Question: In which year did the Korean War end?\nAnswer:';
    const year = Number(createMockResponse(prompt));

    expect(Number.isInteger(year)).toBe(true);
    expect(year).toBeGreaterThanOrEqual(1900);
    expect(year).toBeLessThanOrEqual(2025);
  });

  it('should name a person for who-questions', () => {
    expect(MOCK_PEOPLE).toContain(createMockResponse('Q: Who founded the organization?\nA:'));
  });

  it('should answer yes or no for polar questions', () => {
    const response = createMockResponse('Human: Was the treaty signed before the war?\nAssistant:');

    expect(['yes', 'no']).toContain(response);
  });

  it('should fall back to unknown', () => {
    expect(createMockResponse('Human: What colour is the sky?\nAssistant:')).toBe('unknown');
  });

  it('should be deterministic for the same prompt', () => {
    const prompt = 'Question: Who founded the Red Cross?\nAnswer:';

    expect(createMockResponse(prompt)).toBe(createMockResponse(prompt));
  });
});

describe('isTransientError', () => {
  it('should treat rate limits and server errors as transient', () => {
    expect(isTransientError(new Error('503 Service Unavailable'))).toBe(true);
    expect(isTransientError(Object.assign(new Error('slow down'), { status: 429 }))).toBe(true);
    expect(isTransientError(new Error('socket hang up'))).toBe(true);
  });

  it('should treat other failures as permanent', () => {
    expect(isTransientError(new Error('invalid argument'))).toBe(false);
    expect(isTransientError(Object.assign(new Error('bad request'), { status: 400 }))).toBe(false);
    expect(isTransientError('503')).toBe(false);
  });
});

describe('createModelClient', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should use the mock client when mock mode is enabled', async () => {
    vi.stubEnv('CHRONOQA_MOCK_MODEL', 'true');

    const client = await createModelClient('gemini-2.0-flash', { temperature: 0.3 });

    expect(client.modelName).toBe('gemini-2.0-flash');
    expect(MOCK_PEOPLE).toContain(
      await client.generate('Question: Who founded the Red Cross?\nAnswer:', 30),
    );
  });

  it('should require a project id for the Vertex AI client', async () => {
    vi.stubEnv('CHRONOQA_MOCK_MODEL', 'false');
    vi.stubEnv('CHRONOQA_GCP_PROJECT_ID', '');
    vi.stubEnv('GCP_PROJECT_ID', '');

    await expect(
      createModelClient('gemini-2.0-flash', { temperature: 0.3 }),
    ).rejects.toThrow(ConfigurationError);
  });
});
