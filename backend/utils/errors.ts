// Fatal error classes. Anything else is recovered where it happens.
export class IntelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends IntelError {}

export class StorageError extends IntelError {}

export function isFatalError(error: unknown): error is IntelError {
  return error instanceof IntelError;
}
