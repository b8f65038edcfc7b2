import { Injectable, LoggerService as NestLoggerService } from '@nestjs/common';
import { createLogger, format, transports, Logger } from 'winston';
import { ConfigurationService } from '../../config/configuration.service';
import * as path from 'path';

export type LogMetadata = Record<string, unknown>;

export interface PerformanceMetrics {
  operation: string;
  durationMs: number;
  startTime: Date;
  endTime: Date;
  memoryUsage?: NodeJS.MemoryUsage;
  cpuUsage?: NodeJS.CpuUsage;
}

@Injectable()
export class LoggerService implements NestLoggerService {
  private readonly logger: Logger;
  private correlationId?: string;
  private performanceTimers: Map<string, { startTime: Date; startCpuUsage: NodeJS.CpuUsage }> = new Map();

  constructor(private configService: ConfigurationService) {
    this.logger = this.createLogger();
  }

  private createLogger(): Logger {
    const logConfig = this.configService.logging;

    const logTransports = [
      ...(logConfig.enableConsole ? [this.createConsoleTransport()] : []),
      ...(logConfig.enableFile ? this.createFileTransports() : []),
    ];

    return createLogger({
      level: logConfig.level,
      format: format.combine(
        format.timestamp(),
        format.errors({ stack: true }),
        format.json()
      ),
      transports: logTransports,
    });
  }

  private createConsoleTransport() {
    return new transports.Console({
      format: format.combine(
        format.colorize(),
        format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        format.printf(({ timestamp, level, message, context, correlationId, ...meta }) => {
          let logMessage = `${timestamp} [${level}]`;
          if (context) logMessage += ` [${context}]`;
          if (correlationId) logMessage += ` [${correlationId}]`;
          logMessage += ` ${message}`;

          if (Object.keys(meta).length > 0) {
            logMessage += ` ${JSON.stringify(meta)}`;
          }

          return logMessage;
        })
      ),
    });
  }

  private createFileTransports() {
    const fileFormat = format.combine(format.timestamp(), format.json());

    return [
      new transports.File({
        filename: path.join(process.cwd(), 'logs', 'app.log'),
        format: fileFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new transports.File({
        filename: path.join(process.cwd(), 'logs', 'error.log'),
        level: 'error',
        format: fileFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
    ];
  }

  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  clearCorrelationId(): void {
    this.correlationId = undefined;
  }

  log(message: string, context?: string, metadata?: LogMetadata): void {
    this.logger.info(message, { context, correlationId: this.correlationId, ...metadata });
  }

  error(message: string, trace?: string, context?: string, metadata?: LogMetadata): void {
    this.logger.error(message, {
      context,
      correlationId: this.correlationId,
      stack: trace,
      ...metadata
    });
  }

  warn(message: string, context?: string, metadata?: LogMetadata): void {
    this.logger.warn(message, { context, correlationId: this.correlationId, ...metadata });
  }

  debug(message: string, context?: string, metadata?: LogMetadata): void {
    this.logger.debug(message, { context, correlationId: this.correlationId, ...metadata });
  }

  verbose(message: string, context?: string, metadata?: LogMetadata): void {
    this.logger.verbose(message, { context, correlationId: this.correlationId, ...metadata });
  }

  // Performance monitoring methods
  startPerformanceTimer(operationId: string): void {
    this.performanceTimers.set(operationId, {
      startTime: new Date(),
      startCpuUsage: process.cpuUsage(),
    });
  }

  endPerformanceTimer(operationId: string, operation: string, context?: string, metadata?: LogMetadata): PerformanceMetrics | null {
    const timer = this.performanceTimers.get(operationId);
    if (!timer) {
      this.warn(`Performance timer not found for operation: ${operationId}`, context);
      return null;
    }

    const endTime = new Date();
    const metrics: PerformanceMetrics = {
      operation,
      durationMs: endTime.getTime() - timer.startTime.getTime(),
      startTime: timer.startTime,
      endTime,
      memoryUsage: process.memoryUsage(),
      cpuUsage: process.cpuUsage(timer.startCpuUsage),
    };

    this.logPerformance(metrics, context, metadata);
    this.performanceTimers.delete(operationId);

    return metrics;
  }

  logPerformance(metrics: PerformanceMetrics, context?: string, metadata?: LogMetadata): void {
    const level = this.getPerformanceLogLevel(metrics.durationMs);
    const message = `Performance: ${metrics.operation} completed in ${metrics.durationMs}ms`;

    this.logger.log(level, message, {
      context,
      correlationId: this.correlationId,
      performance: {
        operation: metrics.operation,
        durationMs: metrics.durationMs,
        startTime: metrics.startTime.toISOString(),
        endTime: metrics.endTime.toISOString(),
        memoryUsage: {
          rss: metrics.memoryUsage?.rss,
          heapUsed: metrics.memoryUsage?.heapUsed,
        },
        cpuUsage: {
          user: metrics.cpuUsage?.user,
          system: metrics.cpuUsage?.system,
        },
      },
      ...metadata,
    });
  }

  private getPerformanceLogLevel(durationMs: number): string {
    if (durationMs > 5000) return 'error'; // > 5 seconds
    if (durationMs > 2000) return 'warn';  // > 2 seconds
    if (durationMs > 1000) return 'info';  // > 1 second
    return 'debug';
  }

  logApiRequest(method: string, url: string, statusCode: number, durationMs: number, metadata?: LogMetadata): void {
    const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
    const message = `API Request: ${method} ${url} - ${statusCode} (${durationMs}ms)`;

    this.logger.log(level, message, {
      correlationId: this.correlationId,
      api: {
        method,
        url,
        statusCode,
        durationMs,
      },
      ...metadata,
    });
  }

  logConfigurationLoad(configName: string, success: boolean, details?: LogMetadata): void {
    const level = success ? 'info' : 'error';
    const message = `Configuration: ${configName} - ${success ? 'LOADED' : 'FAILED'}`;

    this.logger.log(level, message, {
      configuration: {
        name: configName,
        success,
        details,
      },
    });
  }
}
