export class ChronoQaError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ChronoQaError';
  }
}

export class ConfigurationError extends ChronoQaError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class SchemaValidationError extends ChronoQaError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class KnowledgeBaseError extends ChronoQaError {
  constructor(message: string, cause?: Error) {
    super(message, 'KNOWLEDGE_BASE_ERROR', cause);
    this.name = 'KnowledgeBaseError';
  }
}

export class SynthesisError extends ChronoQaError {
  constructor(message: string, cause?: Error) {
    super(message, 'SYNTHESIS_ERROR', cause);
    this.name = 'SynthesisError';
  }
}

export class PersistenceError extends ChronoQaError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export class ModelError extends ChronoQaError {
  constructor(
    message: string,
    public readonly isTransient: boolean,
    cause?: Error,
  ) {
    super(message, 'MODEL_ERROR', cause);
    this.name = 'ModelError';
  }
}

export class EvaluationError extends ChronoQaError {
  constructor(message: string, cause?: Error) {
    super(message, 'EVALUATION_ERROR', cause);
    this.name = 'EvaluationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
