import { HttpStatus } from '@nestjs/common';

export type ErrorKind =
  | 'ValidationError'
  | 'RetrievalError'
  | 'UpstreamError'
  | 'ConfigurationError'
  | 'InternalError';

/**
 * Base for every failure the relay reports to its caller, either as an error
 * body or as an `error` stream event.
 */
export abstract class ServiceError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends ServiceError {
  readonly kind = 'ValidationError';

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

export class RetrievalError extends ServiceError {
  readonly kind = 'RetrievalError';

  constructor(
    message: string,
    status: number = HttpStatus.BAD_GATEWAY,
    options?: { cause?: unknown },
  ) {
    super(message, status, options);
  }
}

export class UpstreamError extends ServiceError {
  readonly kind = 'UpstreamError';

  constructor(
    message: string,
    status: number = HttpStatus.BAD_GATEWAY,
    options?: { cause?: unknown },
  ) {
    super(message, status, options);
  }
}

export class ConfigurationError extends ServiceError {
  readonly kind = 'ConfigurationError';

  constructor(message: string) {
    super(message, HttpStatus.INTERNAL_SERVER_ERROR);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
