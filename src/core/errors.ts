/**
 * Error types that are allowed to escape the factor pipeline.
 * Malformed records, rule drops and alignment gaps are data outcomes, not errors.
 */

export class ConfigError extends Error {
  constructor(message: string, readonly details: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class RunContextError extends Error {
  constructor(message: string, readonly details: string[] = []) {
    super(message);
    this.name = 'RunContextError';
  }
}

export class PersistenceError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export class RunCancelledError extends Error {
  constructor(readonly runId: string) {
    super('cancelled');
    this.name = 'RunCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function errorStack(error: unknown): string | null {
  if (error instanceof Error && error.stack) return error.stack;
  return null;
}
