import {
  ArgumentsHost,
  BadRequestException,
  Catch,
  ExceptionFilter,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { ServiceError, ValidationError } from './errors';

/**
 * Renders every `ServiceError` as `{statusCode, error, message}`. Nest raises
 * `BadRequestException` for bodies the JSON parser rejects; those get the same
 * envelope as a `ValidationError`.
 */
@Catch(ServiceError, BadRequestException)
export class ServiceErrorFilter
  implements ExceptionFilter<ServiceError | BadRequestException>
{
  private readonly logger = new Logger(ServiceErrorFilter.name);

  catch(caught: ServiceError | BadRequestException, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();
    const err =
      caught instanceof ServiceError
        ? caught
        : new ValidationError('Malformed request body', [caught.message]);

    if (err.status >= 500) {
      this.logger.error(`${err.kind}: ${err.message}`);
    } else {
      this.logger.warn(`${err.kind}: ${err.message}`);
    }

    // Streaming responses report their own failures as events.
    if (res.headersSent) {
      if (!res.writableEnded) res.end();
      return;
    }

    res.status(err.status).json({
      statusCode: err.status,
      error: err.kind,
      message: err.message,
      ...(err instanceof ValidationError && err.issues.length
        ? { issues: err.issues }
        : {}),
    });
  }
}
