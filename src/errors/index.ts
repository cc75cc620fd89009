/** Base for the errors this service raises on purpose. */
export abstract class AppError extends Error {
  readonly cause?: unknown;

  protected constructor(name: string, message: string, cause?: unknown) {
    super(message);
    this.name = name;
    this.cause = cause;
  }
}

export class AuthError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('AuthError', message, cause);
  }
}

export class PermissionDeniedError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('PermissionDeniedError', message, cause);
  }
}

export class ThrottledError extends AppError {
  readonly retryAfterSeconds?: number;

  constructor(message: string, retryAfterSeconds?: number, cause?: unknown) {
    super('ThrottledError', message, cause);
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('NotFoundError', message, cause);
  }
}

/** The target already exists, e.g. an app that is already installed. */
export class ConflictError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('ConflictError', message, cause);
  }
}

export class InvalidRequestError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('InvalidRequestError', message, cause);
  }
}

/** A model or remote service answered, but not with anything usable. */
export class OutputValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('OutputValidationError', message, cause);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super('ConfigError', message);
  }
}

export class GraphError extends AppError {
  readonly status: number;
  readonly code?: string;

  constructor(message: string, status: number, code?: string, cause?: unknown) {
    super('GraphError', message, cause);
    this.status = status;
    this.code = code;
  }
}

export const mapGraphError = (status: number, message: string, code?: string, retryAfterSeconds?: number): Error => {
  if (status === 401 || status === 403) {
    return new PermissionDeniedError(message);
  }
  if (status === 404) {
    return new NotFoundError(message);
  }
  if (status === 409) {
    return new ConflictError(message);
  }
  if (status === 429 || status === 503) {
    return new ThrottledError(message, retryAfterSeconds);
  }
  if (status >= 400 && status < 500) {
    return new InvalidRequestError(message);
  }
  return new GraphError(message, status, code);
};

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
