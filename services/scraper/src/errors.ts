/**
 * Error taxonomy shared by the store, fetcher and routes.
 * `statusCode` is the HTTP status a route answers with; `code` is the
 * machine-readable tag sent back in error bodies.
 */
export class AppError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly statusCode: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class AuthError extends AppError {
  constructor(message = 'Invalid API key') {
    super(message, 'auth_failed', 403);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    readonly details?: unknown,
  ) {
    super(message, 'validation_failed', 400);
  }
}

export class CollectionNotFoundError extends AppError {
  constructor(readonly subreddit: string) {
    super(`Subreddit r/${subreddit} not found`, 'subreddit_not_found', 404);
  }
}

export class UserNotFoundError extends AppError {
  constructor(readonly telegramId: number) {
    super(`User ${telegramId} not found`, 'user_not_found', 404);
  }
}

export class PersonalityNotFoundError extends AppError {
  constructor(readonly personality: string) {
    super(`Personality '${personality}' not found`, 'personality_not_found', 404);
  }
}

export class DuplicateNameError extends AppError {
  constructor(readonly personality: string) {
    super(`Personality '${personality}' already exists`, 'duplicate_name', 409);
  }
}

export class LastPersonalityError extends AppError {
  constructor(readonly personality: string) {
    super(`Cannot delete '${personality}': it is the only personality left`, 'last_personality', 409);
  }
}

/** Raised inside the rewrite engine and absorbed there; never reaches a route. */
export class RewriteFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RewriteFailure';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
