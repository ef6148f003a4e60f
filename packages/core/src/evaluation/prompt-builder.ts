import type { FewShotExample } from '@chronoqa/shared/src/types/evaluation.types.js';

export type PromptStyle = 'completion' | 'instruction' | 'chat';

type PromptExample = Pick<FewShotExample, 'question' | 'answer'>;

const INSTRUCTION =
  'You are a helpful assistant that answers temporal questions accurately. ' +
  'Provide short, factual answers.';

export function createPrompt(question: string, examples: readonly PromptExample[] = []): string {
  if (examples.length === 0) {
    return (
      'Answer this question with a short, precise answer (1-3 words maximum).\n\n' +
      `Question: ${question}\n` +
      'Answer:'
    );
  }

  let prompt = 'Answer questions with short, precise answers (1-3 words maximum). Examples:\n\n';
  for (const example of examples) {
    prompt += `Question: ${example.question}\n`;
    prompt += `Answer: ${example.answer}\n\n`;
  }
  prompt += `Question: ${question}\n`;
  prompt += 'Answer:';
  return prompt;
}

export function createInstructionPrompt(
  question: string,
  examples: readonly PromptExample[] = [],
): string {
  if (examples.length === 0) {
    return `${INSTRUCTION}\n\nQ: ${question}\nA:`;
  }

  let prompt = `${INSTRUCTION}\n\nExamples:\n`;
  for (const example of examples) {
    prompt += `Q: ${example.question}\nA: ${example.answer}\n\n`;
  }
  prompt += `Q: ${question}\nA:`;
  return prompt;
}

export function createChatPrompt(question: string, examples: readonly PromptExample[] = []): string {
  if (examples.length === 0) {
    return `Human: ${question}\nAssistant:`;
  }

  let prompt = 'Here are some example questions and answers:\n\n';
  for (const example of examples) {
    prompt += `Human: ${example.question}\n`;
    prompt += `Assistant: ${example.answer}\n\n`;
  }
  prompt += `Human: ${question}\n`;
  prompt += 'Assistant:';
  return prompt;
}

export function buildPrompt(
  style: PromptStyle,
  question: string,
  examples: readonly PromptExample[] = [],
): string {
  switch (style) {
    case 'completion':
      return createPrompt(question, examples);
    case 'instruction':
      return createInstructionPrompt(question, examples);
    case 'chat':
      return createChatPrompt(question, examples);
  }
}
