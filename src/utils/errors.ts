/**
 * Base class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toString(): string {
    return `${this.name}(${this.code}): ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      metadata: this.metadata,
    };
  }
}

/**
 * Invalid user input: bad port range, empty port set, malformed option values
 */
export class ValidationError extends AppError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', metadata);
  }
}

/**
 * Port list document could not be read or validated
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly configPath?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'CONFIGURATION_ERROR', { ...metadata, configPath });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
