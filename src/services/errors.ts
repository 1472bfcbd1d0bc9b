/**
 * Error types shared by the trainer services.
 *
 * Factories and constructors throw these; boundary services (import, hooks)
 * turn them into result objects or user-facing messages via getUserMessage().
 */

export class ValidationError extends Error {
  constructor(
    public field: string,
    message: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  getUserMessage(): string {
    return `Invalid ${this.field}: ${this.message}`;
  }
}

export type SessionErrorCode =
  | 'INVALID_ARGUMENT'
  | 'SESSION_RUNNING'
  | 'NO_SESSION'
  | 'LESSON_NOT_FOUND'
  | 'MODULE_NOT_FOUND'
  | 'LESSON_MODULE_MISMATCH';

export class SessionError extends Error {
  constructor(
    public code: SessionErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'SessionError';
  }

  getUserMessage(): string {
    switch (this.code) {
      case 'SESSION_RUNNING':
        return 'A training session is already running. Finish or cancel it first.';
      case 'NO_SESSION':
        return 'No training session is running.';
      case 'LESSON_NOT_FOUND':
        return 'The selected lesson could not be found.';
      case 'MODULE_NOT_FOUND':
        return 'The selected module could not be found.';
      case 'LESSON_MODULE_MISMATCH':
        return 'The selected lesson does not belong to this module.';
      default:
        return this.message;
    }
  }
}

export class DataStoreError extends Error {
  constructor(
    public storeName: string,
    message: string
  ) {
    super(message);
    this.name = 'DataStoreError';
  }

  getUserMessage(): string {
    return `Data for "${this.storeName}" is not available. Please restart the trainer.`;
  }
}

/** Best-effort message for anything thrown. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Message fit for display: the error's own user message when it has one. */
export function userMessage(error: unknown): string {
  if (error instanceof ValidationError || error instanceof SessionError || error instanceof DataStoreError) {
    return error.getUserMessage();
  }
  return describeError(error);
}
