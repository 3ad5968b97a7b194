export class AppError extends Error {
  constructor(
    message: string,
    public readonly internalDetails?: string,
  ) {
    super(message);
    this.name = 'AppError';
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export class LLMServiceError extends AppError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = 'LLMServiceError';
    Object.setPrototypeOf(this, LLMServiceError.prototype);
  }
}

export class EmbeddingError extends AppError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = 'EmbeddingError';
    Object.setPrototypeOf(this, EmbeddingError.prototype);
  }
}

export class DocumentLoadError extends AppError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = 'DocumentLoadError';
    Object.setPrototypeOf(this, DocumentLoadError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof AppError && error.internalDetails) {
    return `${error.message}: ${error.internalDetails}`;
  }
  return error instanceof Error ? error.message : 'Unknown error';
}
