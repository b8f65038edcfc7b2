import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorDetailsDto, ErrorResponseDto, ErrorType } from '../dto/extraction.dto';
import { AppError } from '../errors/app-error';
import { CorrelationIdUtil } from '../utils/correlation-id.util';

interface ErrorOutcome {
  status: number;
  error: ErrorDetailsDto;
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    // Prefer the id the logging middleware already issued for this request
    const correlationId =
      CorrelationIdUtil.fromLocals(response.locals ?? {}) ?? CorrelationIdUtil.getOrGenerate(request.headers);

    const { status, error } = this.toErrorOutcome(exception, correlationId);
    this.logError(exception, request, error, status);

    const body: ErrorResponseDto = {
      success: false,
      error,
      timestamp: new Date().toISOString(),
    };
    response.status(status).json(body);
  }

  private toErrorOutcome(exception: unknown, correlationId: string): ErrorOutcome {
    const production = process.env.NODE_ENV === 'production';

    if (exception instanceof AppError) {
      return {
        status: exception.statusCode,
        error: {
          type: exception.type,
          message: exception.message,
          details: exception.details,
          correlationId: exception.correlationId ?? correlationId,
        },
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const validationErrors = this.validationMessages(exception.getResponse());

      // ValidationPipe reports every failed constraint in an array
      if (validationErrors) {
        return {
          status,
          error: {
            type: ErrorType.VALIDATION_ERROR,
            message: 'Validation failed',
            details: { validationErrors },
            correlationId,
            fieldErrors: this.extractFieldErrors(validationErrors),
          },
        };
      }

      return {
        status,
        error: { type: this.getErrorTypeFromStatus(status), message: exception.message, correlationId },
      };
    }

    if (exception instanceof Error) {
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        error: {
          type: ErrorType.PROCESSING_ERROR,
          message: production ? 'Internal server error' : exception.message,
          details: production ? undefined : { stack: exception.stack },
          correlationId,
        },
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      error: {
        type: ErrorType.PROCESSING_ERROR,
        message: 'Internal server error',
        details: production ? undefined : { originalError: String(exception) },
        correlationId,
      },
    };
  }

  private validationMessages(body: string | object): string[] | undefined {
    if (typeof body !== 'object' || !('message' in body) || !Array.isArray(body.message)) {
      return undefined;
    }
    return body.message.filter((message): message is string => typeof message === 'string');
  }

  private getErrorTypeFromStatus(status: number): ErrorType {
    switch (status) {
      case HttpStatus.PAYLOAD_TOO_LARGE:
        return ErrorType.FILE_VALIDATION_ERROR;
      case HttpStatus.BAD_REQUEST:
      case HttpStatus.NOT_FOUND:
      case HttpStatus.UNPROCESSABLE_ENTITY:
        return ErrorType.VALIDATION_ERROR;
      default:
        return status < 500 ? ErrorType.VALIDATION_ERROR : ErrorType.PROCESSING_ERROR;
    }
  }

  private extractFieldErrors(messages: string[]): Record<string, string[]> | undefined {
    const fieldErrors: Record<string, string[]> = {};
    let hasFieldErrors = false;

    messages.forEach((message) => {
      // Format: "property should not be empty" or "property must be a string"
      const fieldMatch = message.match(/^(\w+)\s+(should|must|cannot)/);
      if (fieldMatch) {
        const fieldName = fieldMatch[1];
        fieldErrors[fieldName] = [...(fieldErrors[fieldName] ?? []), message];
        hasFieldErrors = true;
      }
    });

    return hasFieldErrors ? fieldErrors : undefined;
  }

  private logError(exception: unknown, request: Request, error: ErrorDetailsDto, status: number): void {
    const message = `[${error.correlationId}] ${request.method} ${request.originalUrl ?? request.url} - ${error.message}`;

    if (status >= 500) {
      this.logger.error(message, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(`${message} (${error.type})`);
    }
  }
}
