export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class InvalidBackupError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidBackupError';
  }
}

/** The target of a write already exists. */
export class ConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

/**
 * Upstream returned JSON that does not have the shape of the requested
 * item, user or id list.
 */
export class RemoteDataError extends Error {
  constructor(resource: string, detail: string) {
    super(`Malformed response for ${resource}: ${detail}`);
    this.name = 'RemoteDataError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
