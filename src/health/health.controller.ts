import { Controller, Get, HttpCode, HttpStatus, Inject } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ConfigurationService } from '../config/configuration.service';
import { LoggerService } from '../common/logger/logger.service';
import { errorMessage, errorStack } from '../common/errors/app-error';
import { DIALECT_REGISTRY } from '../services/dialect-registry/dialect-registry';
import { DialectSummary } from '../models/dialect';
import { IDialectRegistry } from '../models/service.interfaces';

export interface HealthCheck {
  status: 'pass' | 'fail' | 'warn';
  details?: Record<string, unknown>;
  error?: string;
}

export interface HealthStatus {
  status: 'healthy' | 'unhealthy' | 'degraded';
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
  dialects: readonly DialectSummary[];
  checks: {
    configuration: HealthCheck;
    dialects: HealthCheck;
    memory: HealthCheck;
  };
}

export interface LivenessStatus {
  alive: boolean;
  timestamp: string;
  uptime: number;
}

@ApiTags('Health & Monitoring')
@Controller('health')
export class HealthController {
  constructor(
    private configService: ConfigurationService,
    private loggerService: LoggerService,
    @Inject(DIALECT_REGISTRY) private readonly registry: IDialectRegistry,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Health check',
    description: 'Reports liveness, configuration and the loaded dialect table',
  })
  @ApiResponse({ status: HttpStatus.OK, description: 'Health status retrieved successfully' })
  healthCheck(): HealthStatus {
    const dialects = this.registry.list();
    const checks = {
      configuration: this.checkConfiguration(),
      dialects: this.checkDialects(dialects),
      memory: this.checkMemory(),
    };

    const statuses = Object.values(checks).map((check) => check.status);
    const status = statuses.includes('fail') ? 'unhealthy' : statuses.includes('warn') ? 'degraded' : 'healthy';

    if (status !== 'healthy') {
      this.loggerService.warn(`Health check reported ${status}`, 'HealthController', { checks });
    }

    return {
      status,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: process.env.npm_package_version || '1.0.0',
      environment: process.env.NODE_ENV || 'development',
      dialects,
      checks,
    };
  }

  @Get('live')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Liveness probe' })
  livenessCheck(): LivenessStatus {
    return { alive: true, timestamp: new Date().toISOString(), uptime: process.uptime() };
  }

  private checkConfiguration(): HealthCheck {
    try {
      this.configService.validateConfiguration();
      return {
        status: 'pass',
        details: {
          maxFileSize: this.configService.upload.maxFileSize,
          maxFilesPerBatch: this.configService.upload.maxFilesPerBatch,
          concurrency: this.configService.extraction.concurrency,
        },
      };
    } catch (error) {
      this.loggerService.error('Configuration check failed', errorStack(error), 'HealthController');
      return { status: 'fail', error: errorMessage(error) };
    }
  }

  private checkDialects(dialects: readonly DialectSummary[]): HealthCheck {
    if (dialects.length === 0) {
      return { status: 'fail', error: 'No dialects are registered' };
    }
    return { status: 'pass', details: { count: dialects.length } };
  }

  private checkMemory(): HealthCheck {
    const memoryUsage = process.memoryUsage();
    const totalMemory = memoryUsage.heapTotal + memoryUsage.external;
    const memoryPercentage = (memoryUsage.heapUsed / totalMemory) * 100;

    const details = {
      heapUsed: memoryUsage.heapUsed,
      heapTotal: memoryUsage.heapTotal,
      rss: memoryUsage.rss,
      usedPercentage: Math.round(memoryPercentage * 100) / 100,
    };

    if (memoryPercentage > 90) {
      return { status: 'fail', error: 'Memory usage is critically high', details };
    }
    if (memoryPercentage > 75) {
      return { status: 'warn', error: 'Memory usage is high', details };
    }
    return { status: 'pass', details };
  }
}
