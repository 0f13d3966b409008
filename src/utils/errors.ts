export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: string[]
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: string[]) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

/** Missing, malformed or expired credential. */
export class UnauthorizedError extends AppError {
  constructor(message = 'Could not validate credentials') {
    super(401, 'UNAUTHENTICATED', message);
  }
}

/** Credential resolved to a user whose account is switched off. */
export class AccountDisabledError extends AppError {
  constructor(message = 'User account is disabled') {
    super(403, 'ACCOUNT_DISABLED', message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Admin access required') {
    super(403, 'FORBIDDEN', message);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, 'NOT_FOUND', `${resource} not found`);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, 'CONFLICT', message);
  }
}

export class RateLimitedError extends AppError {
  constructor(public readonly retryAfterMs: number) {
    super(429, 'RATE_LIMIT_EXCEEDED', 'Rate limit exceeded. Please try again later.');
  }
}
