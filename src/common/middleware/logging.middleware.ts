import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { LoggerService } from '../logger/logger.service';
import { CORRELATION_ID_HEADER, CorrelationIdUtil } from '../utils/correlation-id.util';

export type HttpRequest = Pick<Request, 'method' | 'originalUrl' | 'headers' | 'ip'>;
export type HttpResponse = Pick<Response, 'statusCode' | 'setHeader' | 'getHeader' | 'once' | 'locals'>;

@Injectable()
export class LoggingMiddleware implements NestMiddleware<HttpRequest, HttpResponse> {
  constructor(private readonly logger: LoggerService) {}

  use(req: HttpRequest, res: HttpResponse, next: NextFunction): void {
    const startTime = Date.now();

    const correlationId = CorrelationIdUtil.getOrGenerate(req.headers);
    this.logger.setCorrelationId(correlationId);
    res.setHeader(CORRELATION_ID_HEADER, correlationId);
    res.locals.correlationId = correlationId;

    this.logIncomingRequest(req, correlationId);

    res.once('finish', () => {
      this.logOutgoingResponse(req, res, Date.now() - startTime, correlationId);
      this.logger.clearCorrelationId();
    });

    next();
  }

  private logIncomingRequest(req: HttpRequest, correlationId: string): void {
    this.logger.log(`Incoming Request: ${req.method} ${req.originalUrl}`, 'HTTP', {
      request: {
        method: req.method,
        url: req.originalUrl,
        userAgent: req.headers['user-agent'],
        ip: req.ip,
        contentType: req.headers['content-type'],
        contentLength: req.headers['content-length'],
      },
      correlationId,
    });
  }

  private logOutgoingResponse(req: HttpRequest, res: HttpResponse, durationMs: number, correlationId: string): void {
    this.logger.logApiRequest(req.method, req.originalUrl, res.statusCode, durationMs, {
      response: {
        statusCode: res.statusCode,
        contentLength: res.getHeader('content-length'),
        contentType: res.getHeader('content-type'),
      },
      correlationId,
    });

    if (durationMs > 1000) {
      this.logger.warn(`Slow Request: ${req.method} ${req.originalUrl} took ${durationMs}ms`, 'Performance', {
        durationMs,
        correlationId,
      });
    }
  }
}
