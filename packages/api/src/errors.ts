/**
 * Application error taxonomy.
 *
 * Every error the API raises on purpose extends `AppError`, which carries the
 * HTTP status and a machine-readable code. The global error handler in
 * `app.ts` renders them as `{ error, code }`; anything else becomes a 500.
 */

export const ERROR_CODES = {
  UNAUTHENTICATED: "UNAUTHENTICATED",
  INVALID_CREDENTIALS: "INVALID_CREDENTIALS",
  ACCOUNT_DISABLED: "ACCOUNT_DISABLED",
  INVALID_TOKEN: "INVALID_TOKEN",
  TOKEN_EXPIRED: "TOKEN_EXPIRED",
  MALFORMED_HEADER: "MALFORMED_HEADER",
  FORBIDDEN: "FORBIDDEN",
  NOT_FOUND: "NOT_FOUND",
  CONFLICT: "CONFLICT",
  VALIDATION_ERROR: "VALIDATION_ERROR",
  RATE_LIMITED: "RATE_LIMITED",
  BAD_REQUEST: "BAD_REQUEST",
  INTERNAL: "INTERNAL",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class AppError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly code: ErrorCode,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad credentials, or a missing/invalid/expired token (401) */
export class AuthenticationError extends AppError {
  constructor(
    message = "Authentication required",
    code: ErrorCode = ERROR_CODES.UNAUTHENTICATED,
  ) {
    super(message, 401, code);
  }
}

/** Authorization header present but not `Bearer <token>` (401) */
export class MalformedHeaderError extends AppError {
  constructor(message = "Malformed Authorization header") {
    super(message, 401, ERROR_CODES.MALFORMED_HEADER);
  }
}

/** Valid identity without the required role or ownership (403) */
export class ForbiddenError extends AppError {
  constructor(message = "Access denied") {
    super(message, 403, ERROR_CODES.FORBIDDEN);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(message, 404, ERROR_CODES.NOT_FOUND);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, ERROR_CODES.CONFLICT);
  }
}

/** Request body is well-formed JSON but semantically invalid (400) */
export class ValidationError extends AppError {
  constructor(
    message: string,
    readonly details: { field: string; message: string }[] = [],
  ) {
    super(message, 400, ERROR_CODES.VALIDATION_ERROR);
  }
}
