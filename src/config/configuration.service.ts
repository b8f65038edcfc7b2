import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export interface UploadConfig {
  maxFileSize: number;
  maxFilesPerBatch: number;
}

export interface ExtractionConfig {
  concurrency: number;
  totalTolerance: number;
  /** Alternative dialect table; the bundled table is used when unset */
  dialectsFile?: string;
}

export interface LoggingConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
}

export interface AppConfig {
  upload: UploadConfig;
  extraction: ExtractionConfig;
  logging: LoggingConfig;
  port: number;
  frontendUrl: string;
}

@Injectable()
export class ConfigurationService {
  private readonly config: AppConfig;

  constructor(private configService: ConfigService) {
    this.config = this.loadConfig();
  }

  private loadConfig(): AppConfig {
    return {
      upload: {
        maxFileSize: this.getNumber('MAX_FILE_SIZE', 10 * 1024 * 1024), // 10MB default
        maxFilesPerBatch: this.getNumber('MAX_FILES_PER_BATCH', 100),
      },
      extraction: {
        concurrency: this.getNumber('EXTRACTION_CONCURRENCY', 4),
        totalTolerance: this.getNumber('EXTRACTION_TOTAL_TOLERANCE', 0.01),
        dialectsFile: this.configService.get<string>('EXTRACTION_DIALECTS_FILE') || undefined,
      },
      logging: {
        level: this.configService.get<string>('LOG_LEVEL', 'info'),
        enableConsole: this.getBoolean('LOG_ENABLE_CONSOLE', true),
        enableFile: this.getBoolean('LOG_ENABLE_FILE', true),
      },
      port: this.getNumber('PORT', 4447),
      frontendUrl: this.configService.get<string>('FRONTEND_URL', 'http://localhost:3000'),
    };
  }

  // Environment values arrive as strings
  private getNumber(key: string, defaultValue: number): number {
    const raw = this.configService.get<string | number>(key);
    if (raw === undefined || raw === '') {
      return defaultValue;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new Error(`${key} must be a number, got '${raw}'`);
    }
    return value;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const raw = this.configService.get<string | boolean>(key);
    if (raw === undefined || raw === '') {
      return defaultValue;
    }
    if (typeof raw === 'boolean') {
      return raw;
    }
    return !['false', '0', 'no', 'off'].includes(raw.trim().toLowerCase());
  }

  get upload(): UploadConfig {
    return this.config.upload;
  }

  get extraction(): ExtractionConfig {
    return this.config.extraction;
  }

  get logging(): LoggingConfig {
    return this.config.logging;
  }

  get port(): number {
    return this.config.port;
  }

  get frontendUrl(): string {
    return this.config.frontendUrl;
  }

  validateConfiguration(): void {
    if (this.config.upload.maxFileSize <= 0) {
      throw new Error('MAX_FILE_SIZE must be greater than 0');
    }

    if (this.config.upload.maxFilesPerBatch <= 0) {
      throw new Error('MAX_FILES_PER_BATCH must be greater than 0');
    }

    if (!Number.isInteger(this.config.extraction.concurrency) || this.config.extraction.concurrency <= 0) {
      throw new Error('EXTRACTION_CONCURRENCY must be a positive integer');
    }

    if (this.config.extraction.totalTolerance <= 0) {
      throw new Error('EXTRACTION_TOTAL_TOLERANCE must be greater than 0');
    }
  }
}
