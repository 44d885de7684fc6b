export type ErrorCode =
  | "invalid_input"
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "conflict"
  | "payload_too_large"
  | "store_unavailable";

export const HTTP_STATUS: Record<ErrorCode, number> = {
  invalid_input: 400,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  conflict: 409,
  payload_too_large: 413,
  store_unavailable: 503,
};

/**
 * Base for every error the service raises on purpose. Anything else reaching
 * a handler is a bug and turns into a 500.
 */
export class ServiceError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  get status(): number {
    return HTTP_STATUS[this.code];
  }
}

export class InvalidInputError extends ServiceError {
  constructor(message: string) {
    super("invalid_input", message);
  }
}

export class UnauthorizedError extends ServiceError {
  constructor(message = "missing or invalid API key") {
    super("unauthorized", message);
  }
}

export class ForbiddenError extends ServiceError {
  constructor(message: string) {
    super("forbidden", message);
  }
}

export class NotFoundError extends ServiceError {
  constructor(message: string) {
    super("not_found", message);
  }
}

export class ConflictError extends ServiceError {
  constructor(message: string) {
    super("conflict", message);
  }
}

export class PayloadTooLargeError extends ServiceError {
  constructor(limit: number) {
    super("payload_too_large", `request body exceeds ${limit} bytes`);
  }
}

export class StoreUnavailableError extends ServiceError {
  constructor(operation: string, cause: unknown) {
    super("store_unavailable", `job store unavailable during ${operation}`, { cause });
  }
}

export function isServiceError(err: unknown): err is ServiceError {
  return err instanceof ServiceError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
