import { Injectable } from '@nestjs/common';
import { ConfigurationService } from '../../config/configuration.service';
import { LoggerService } from '../../common/logger/logger.service';
import { FileValidationResult, IFileValidationService } from '../../models/service.interfaces';

/**
 * Request-level checks on an upload. Problems with the XML itself are not
 * checked here; they become per-file entries of the batch result.
 */
@Injectable()
export class FileValidationService implements IFileValidationService {
  constructor(
    private configService: ConfigurationService,
    private logger: LoggerService,
  ) {}

  validateBatch(files: readonly Express.Multer.File[] | undefined): FileValidationResult {
    const result: FileValidationResult = { isValid: true, errors: [] };
    const { maxFileSize, maxFilesPerBatch } = this.configService.upload;

    if (!files || files.length === 0) {
      result.errors.push('No files provided');
      result.isValid = false;
      return result;
    }

    if (files.length > maxFilesPerBatch) {
      result.errors.push(`Too many files: ${files.length} exceeds the maximum of ${maxFilesPerBatch} per batch`);
      result.isValid = false;
    }

    files.forEach((file, index) => {
      const name = file.originalname?.trim();

      if (!name) {
        result.errors.push(`File ${index + 1}: file name is required`);
        result.isValid = false;
      } else if (this.containsSuspiciousFileName(name)) {
        result.errors.push(`${name}: file name contains path separators or control characters`);
        result.isValid = false;
      }

      if (file.size > maxFileSize) {
        result.errors.push(
          `${name || `File ${index + 1}`}: file size ${this.formatFileSize(file.size)} exceeds maximum allowed size of ${this.formatFileSize(maxFileSize)}`,
        );
        result.isValid = false;
      }
    });

    if (!result.isValid) {
      this.logger.warn('Upload validation failed', 'FileValidationService', {
        files: files.length,
        errors: result.errors,
      });
    }

    return result;
  }

  private containsSuspiciousFileName(filename: string): boolean {
    // Path traversal
    if (filename.includes('..') || filename.includes('/') || filename.includes('\\')) {
      return true;
    }

    // Null bytes or control characters
    return /[\x00-\x1f\x7f]/.test(filename);
  }

  private formatFileSize(bytes: number): string {
    const units = ['B', 'KB', 'MB', 'GB'];
    let size = bytes;
    let unitIndex = 0;

    while (size >= 1024 && unitIndex < units.length - 1) {
      size /= 1024;
      unitIndex++;
    }

    return `${size.toFixed(2)} ${units[unitIndex]}`;
  }
}
