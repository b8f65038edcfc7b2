import { BadRequestException, HttpStatus, Logger, NotFoundException, PayloadTooLargeException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { GlobalExceptionFilter } from './global-exception.filter';
import { AppError, ErrorType } from '../errors/app-error';

describe('GlobalExceptionFilter', () => {
  let filter: GlobalExceptionFilter;
  let request: { method: string; originalUrl: string; url: string; headers: Record<string, string> };
  let response: { locals: Record<string, unknown>; status: jest.Mock; json: jest.Mock };
  let errorSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  const catchException = (exception: unknown): void => {
    filter.catch(exception, new ExecutionContextHost([request, response]));
  };

  const body = (): unknown => response.json.mock.calls[0][0];

  beforeEach(() => {
    filter = new GlobalExceptionFilter();
    request = { method: 'POST', originalUrl: '/upload/invoices', url: '/upload/invoices', headers: {} };
    response = { locals: {}, status: jest.fn().mockReturnThis(), json: jest.fn().mockReturnThis() };

    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation();
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('AppError handling', () => {
    it('should render an AppError with its own correlation id', () => {
      catchException(new AppError(ErrorType.VALIDATION_ERROR, 'Invalid upload', 400, { field: 'files' }, 'error-id'));

      expect(response.status).toHaveBeenCalledWith(400);
      expect(body()).toEqual({
        success: false,
        error: {
          type: ErrorType.VALIDATION_ERROR,
          message: 'Invalid upload',
          details: { field: 'files' },
          correlationId: 'error-id',
        },
        timestamp: expect.any(String),
      });
    });

    it('should use the correlation id issued for the request', () => {
      response.locals.correlationId = 'request-id';
      request.headers['x-correlation-id'] = 'header-id';

      catchException(AppError.fileValidationError('Upload rejected', { errors: ['No files provided'] }));

      expect(response.status).toHaveBeenCalledWith(400);
      expect(body()).toEqual({
        success: false,
        error: {
          type: ErrorType.FILE_VALIDATION_ERROR,
          message: 'Upload rejected',
          details: { errors: ['No files provided'] },
          correlationId: 'request-id',
        },
        timestamp: expect.any(String),
      });
    });

    it('should fall back to the correlation id header', () => {
      request.headers['x-correlation-id'] = 'header-id';

      catchException(AppError.configurationError('Dialect table is invalid'));

      expect(response.status).toHaveBeenCalledWith(500);
      expect(body()).toEqual(
        expect.objectContaining({
          error: expect.objectContaining({ type: ErrorType.CONFIGURATION_ERROR, correlationId: 'header-id' }),
        }),
      );
    });
  });

  describe('HttpException handling', () => {
    it('should collect validation pipe messages by field', () => {
      response.locals.correlationId = 'request-id';
      const message = 'format must be one of the following values: csv, xlsx';

      catchException(new BadRequestException([message]));

      expect(response.status).toHaveBeenCalledWith(400);
      expect(body()).toEqual({
        success: false,
        error: {
          type: ErrorType.VALIDATION_ERROR,
          message: 'Validation failed',
          details: { validationErrors: [message] },
          correlationId: 'request-id',
          fieldErrors: { format: [message] },
        },
        timestamp: expect.any(String),
      });
    });

    it('should report upload size limits as file validation errors', () => {
      response.locals.correlationId = 'request-id';

      catchException(new PayloadTooLargeException('File too large'));

      expect(response.status).toHaveBeenCalledWith(HttpStatus.PAYLOAD_TOO_LARGE);
      expect(body()).toEqual({
        success: false,
        error: { type: ErrorType.FILE_VALIDATION_ERROR, message: 'File too large', correlationId: 'request-id' },
        timestamp: expect.any(String),
      });
    });

    it('should map other client errors to validation errors', () => {
      catchException(new NotFoundException('Cannot GET /missing'));

      expect(response.status).toHaveBeenCalledWith(404);
      expect(body()).toEqual(
        expect.objectContaining({
          error: expect.objectContaining({ type: ErrorType.VALIDATION_ERROR, message: 'Cannot GET /missing' }),
        }),
      );
    });
  });

  describe('unexpected errors', () => {
    const originalEnv = process.env.NODE_ENV;

    afterEach(() => {
      process.env.NODE_ENV = originalEnv;
    });

    it('should expose the message outside production', () => {
      response.locals.correlationId = 'request-id';

      catchException(new Error('Worker crashed'));

      expect(response.status).toHaveBeenCalledWith(500);
      expect(body()).toEqual({
        success: false,
        error: {
          type: ErrorType.PROCESSING_ERROR,
          message: 'Worker crashed',
          details: { stack: expect.any(String) },
          correlationId: 'request-id',
        },
        timestamp: expect.any(String),
      });
    });

    it('should hide internals in production', () => {
      process.env.NODE_ENV = 'production';
      response.locals.correlationId = 'request-id';

      catchException(new Error('Worker crashed'));

      expect(body()).toEqual({
        success: false,
        error: { type: ErrorType.PROCESSING_ERROR, message: 'Internal server error', correlationId: 'request-id' },
        timestamp: expect.any(String),
      });
    });

    it('should handle thrown values that are not errors', () => {
      response.locals.correlationId = 'request-id';

      catchException('boom');

      expect(body()).toEqual({
        success: false,
        error: {
          type: ErrorType.PROCESSING_ERROR,
          message: 'Internal server error',
          details: { originalError: 'boom' },
          correlationId: 'request-id',
        },
        timestamp: expect.any(String),
      });
    });
  });

  describe('logging', () => {
    it('should log server errors with their stack', () => {
      response.locals.correlationId = 'request-id';
      const error = new Error('Worker crashed');

      catchException(error);

      expect(errorSpy).toHaveBeenCalledWith('[request-id] POST /upload/invoices - Worker crashed', error.stack);
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('should log client errors as warnings', () => {
      response.locals.correlationId = 'request-id';

      catchException(AppError.fileValidationError('Upload rejected'));

      expect(warnSpy).toHaveBeenCalledWith('[request-id] POST /upload/invoices - Upload rejected (FILE_VALIDATION_ERROR)');
      expect(errorSpy).not.toHaveBeenCalled();
    });
  });
});
