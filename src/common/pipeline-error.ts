/**
 * Pipeline error taxonomy.
 *
 * Classification and coercion misses are not errors (the API exposes more
 * variables than are modeled), so they have no class here.
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Malformed upstream payload. Fatal to the unit being processed only.
 */
export class DecodeError extends PipelineError {
  constructor(message: string, originalError?: Error) {
    super(message, originalError);
    this.name = 'DecodeError';
  }
}

/**
 * Upstream fetch failed after its own retries.
 */
export class FetchError extends PipelineError {
  constructor(
    public readonly endpoint: 'live' | 'daily',
    message: string,
    originalError?: Error,
  ) {
    super(`[${endpoint}] ${message}`, originalError);
    this.name = 'FetchError';
  }
}

/**
 * A batch write exhausted its retries.
 *
 * Batches flushed before the failing one stay written: `linesWritten`
 * counts them, `linesAttempted` counts every line handed to the store so
 * far, including the failed batch.
 */
export class WriteError extends PipelineError {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly linesAttempted: number,
    public readonly linesWritten: number,
    originalError?: Error,
  ) {
    super(message, originalError);
    this.name = 'WriteError';
  }
}

export class InvalidRangeError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRangeError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, originalError?: Error) {
    super(message, originalError);
    this.name = 'ConfigError';
  }
}

/**
 * Format error message from unknown error type
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}
