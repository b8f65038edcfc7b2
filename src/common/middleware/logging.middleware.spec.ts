import { Test, TestingModule } from '@nestjs/testing';
import { LoggingMiddleware, HttpRequest, HttpResponse } from './logging.middleware';
import { LoggerService } from '../logger/logger.service';
import { CorrelationIdUtil } from '../utils/correlation-id.util';

describe('LoggingMiddleware', () => {
  let middleware: LoggingMiddleware;
  let mockLoggerService: Partial<LoggerService>;
  let mockRequest: HttpRequest;
  let mockResponse: HttpResponse;
  let once: jest.Mock;
  let mockNext: jest.Mock;

  beforeEach(async () => {
    mockLoggerService = {
      setCorrelationId: jest.fn(),
      clearCorrelationId: jest.fn(),
      log: jest.fn(),
      logApiRequest: jest.fn(),
      warn: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LoggingMiddleware,
        {
          provide: LoggerService,
          useValue: mockLoggerService,
        },
      ],
    }).compile();

    middleware = module.get<LoggingMiddleware>(LoggingMiddleware);

    mockRequest = {
      method: 'POST',
      originalUrl: '/upload/invoices',
      headers: {
        'user-agent': 'test-agent',
        'content-type': 'multipart/form-data; boundary=x',
        'content-length': '100',
      },
      ip: '127.0.0.1',
    };

    once = jest.fn();
    mockResponse = {
      statusCode: 200,
      setHeader: jest.fn(),
      getHeader: jest.fn((header: string) => (header === 'content-type' ? 'application/json' : '250')),
      once,
      locals: {},
    };

    mockNext = jest.fn();

    jest.spyOn(CorrelationIdUtil, 'getOrGenerate').mockReturnValue('test-correlation-id');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const finishResponse = (): void => {
    const [event, listener] = once.mock.calls[0];
    expect(event).toBe('finish');
    listener();
  };

  describe('Request processing', () => {
    it('should set correlation ID and log incoming request', () => {
      middleware.use(mockRequest, mockResponse, mockNext);

      expect(CorrelationIdUtil.getOrGenerate).toHaveBeenCalledWith(mockRequest.headers);
      expect(mockLoggerService.setCorrelationId).toHaveBeenCalledWith('test-correlation-id');
      expect(mockResponse.setHeader).toHaveBeenCalledWith('X-Correlation-ID', 'test-correlation-id');
      expect(mockResponse.locals.correlationId).toBe('test-correlation-id');
      expect(mockNext).toHaveBeenCalled();

      expect(mockLoggerService.log).toHaveBeenCalledWith('Incoming Request: POST /upload/invoices', 'HTTP', {
        request: {
          method: 'POST',
          url: '/upload/invoices',
          userAgent: 'test-agent',
          ip: '127.0.0.1',
          contentType: 'multipart/form-data; boundary=x',
          contentLength: '100',
        },
        correlationId: 'test-correlation-id',
      });
    });

    it('should not log the response before it finishes', () => {
      middleware.use(mockRequest, mockResponse, mockNext);

      expect(mockLoggerService.logApiRequest).not.toHaveBeenCalled();
      expect(mockLoggerService.clearCorrelationId).not.toHaveBeenCalled();
    });
  });

  describe('Response processing', () => {
    it('should log the finished response and clear the correlation ID', () => {
      jest.spyOn(Date, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1150);

      middleware.use(mockRequest, mockResponse, mockNext);
      finishResponse();

      expect(mockLoggerService.logApiRequest).toHaveBeenCalledWith('POST', '/upload/invoices', 200, 150, {
        response: {
          statusCode: 200,
          contentLength: '250',
          contentType: 'application/json',
        },
        correlationId: 'test-correlation-id',
      });
      expect(mockLoggerService.warn).not.toHaveBeenCalled();
      expect(mockLoggerService.clearCorrelationId).toHaveBeenCalled();
    });

    it('should log slow requests as warnings', () => {
      jest.spyOn(Date, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(3000);

      middleware.use(mockRequest, mockResponse, mockNext);
      finishResponse();

      expect(mockLoggerService.warn).toHaveBeenCalledWith(
        'Slow Request: POST /upload/invoices took 2000ms',
        'Performance',
        {
          durationMs: 2000,
          correlationId: 'test-correlation-id',
        }
      );
    });

    it('should report the final status code', () => {
      jest.spyOn(Date, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1100);

      middleware.use(mockRequest, mockResponse, mockNext);
      mockResponse.statusCode = 400;
      finishResponse();

      expect(mockLoggerService.logApiRequest).toHaveBeenCalledWith(
        'POST',
        '/upload/invoices',
        400,
        100,
        expect.any(Object)
      );
    });
  });
});
