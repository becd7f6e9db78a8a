import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { ThrottlerException } from '@nestjs/throttler';
import type { Response } from 'express';
import { RegistryError, RequestValidationError, StateNotFoundError } from '../../../domain/errors/registry.errors';

export interface ErrorPayload {
  statusCode: number;
  error: string;
  message: string;
  validValues?: string[];
  hint?: string;
}

function httpErrorCode(status: number): string {
  switch (status) {
    case HttpStatus.UNAUTHORIZED:
      return 'AUTHENTICATION_ERROR';
    case HttpStatus.TOO_MANY_REQUESTS:
      return 'RATE_LIMIT_ERROR';
    case HttpStatus.NOT_FOUND:
      return 'NOT_FOUND';
    case HttpStatus.BAD_REQUEST:
      return 'VALIDATION_ERROR';
    default:
      return 'HTTP_ERROR';
  }
}

function httpMessage(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === 'string') return response;
  if ('message' in response) {
    const { message } = response;
    if (Array.isArray(message)) return message.map(String).join('; ');
    if (typeof message === 'string') return message;
  }
  return exception.message;
}

/**
 * Filtro global: toda respuesta de error es `{ statusCode, error, message }`
 * (+ `validValues` en validaciones, + `hint` en estados desconocidos).
 */
@Catch()
export class RegistryExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(RegistryExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const payload = this.toPayload(exception);
    res.status(payload.statusCode).json(payload);
  }

  private toPayload(exception: unknown): ErrorPayload {
    if (exception instanceof RegistryError) {
      this.logger.warn(`${exception.code}: ${exception.message}`);
      const payload: ErrorPayload = {
        statusCode: exception.statusCode,
        error: exception.code,
        message: exception.message,
      };
      if (exception instanceof RequestValidationError && exception.validValues) {
        payload.validValues = exception.validValues;
      }
      if (exception instanceof StateNotFoundError) {
        payload.hint = exception.hint;
      }
      return payload;
    }

    if (exception instanceof ThrottlerException) {
      return {
        statusCode: HttpStatus.TOO_MANY_REQUESTS,
        error: 'RATE_LIMIT_ERROR',
        message: `Rate limit exceeded: ${httpMessage(exception)}`,
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return { statusCode: status, error: httpErrorCode(status), message: httpMessage(exception) };
    }

    const error = exception instanceof Error ? exception : new Error(String(exception));
    this.logger.error(`❌ Error no controlado: ${error.message}`, error.stack);
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
  }
}
