export type ErrorKind =
  | 'AuthError'
  | 'ValidationError'
  | 'InvalidArgument'
  | 'TransientHttpError'
  | 'PublishError'
  | 'LengthValidationFailure'
  | 'ConcurrentRun'
  | 'Unclassified';

export class SeopostError extends Error {
  readonly kind: ErrorKind = 'Unclassified';

  constructor(message: string) {
    super(message);
    this.name = 'SeopostError';
  }
}

export class AuthError extends SeopostError {
  readonly kind = 'AuthError';

  constructor(message: string) {
    super(message);
    this.name = 'AuthError';
  }
}

export class ValidationError extends SeopostError {
  readonly kind = 'ValidationError';

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class InvalidArgumentError extends SeopostError {
  readonly kind = 'InvalidArgument';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class TransientHttpError extends SeopostError {
  readonly kind = 'TransientHttpError';
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'TransientHttpError';
    this.status = status;
  }
}

export class PublishError extends SeopostError {
  readonly kind = 'PublishError';
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'PublishError';
    this.status = status;
  }
}

export class OllamaNotAvailableError extends SeopostError {
  constructor() {
    super(
      'Ollama is not available. Please ensure Ollama is running.\n\nInstall: https://ollama.ai\nStart: ollama serve'
    );
    this.name = 'OllamaNotAvailableError';
  }
}

export class ModelNotFoundError extends SeopostError {
  constructor(model: string) {
    super(`Model '${model}' not found. Run: ollama pull ${model}`);
    this.name = 'ModelNotFoundError';
  }
}

export class ConfigError extends SeopostError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export class FileSystemError extends SeopostError {
  constructor(message: string) {
    super(`File system error: ${message}`);
    this.name = 'FileSystemError';
  }
}

/**
 * Map any thrown value onto the error kinds the orchestrator branches on
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof SeopostError) {
    return error.kind;
  }
  return 'Unclassified';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorName(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}
