/**
 * Service error taxonomy. `status` is the HTTP code the routes answer with.
 */

export class ServiceError extends Error {
  readonly status: 400 | 404 | 503;

  constructor(message: string, status: 400 | 404 | 503) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class InvalidArgumentError extends ServiceError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends ServiceError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class UpstreamUnavailableError extends ServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, 503);
    if (cause !== undefined) this.cause = cause;
  }
}

export function isServiceError(err: unknown): err is ServiceError {
  return err instanceof ServiceError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "Unknown error";
}
