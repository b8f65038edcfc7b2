import type { XmlElement } from '../common/xml/xml-document';
import type { Dialect, DialectSummary } from './dialect';
import type { BatchResult, ExtractionOutcome, InvoiceFile } from './invoice-record';

// Service interfaces
export interface IDialectRegistry {
  /** First dialect, by priority, whose matcher accepts the root element */
  resolve(root: XmlElement): Dialect | undefined;
  get(id: string): Dialect | undefined;
  list(): readonly DialectSummary[];
}

export interface IInvoiceExtractionService {
  extract(content: Buffer, filename: string): ExtractionOutcome;
  extractAsync(content: Buffer, filename: string): Promise<ExtractionOutcome>;
  extractBatch(files: readonly InvoiceFile[], options?: BatchOptions): Promise<BatchResult>;
}

export interface ITabularExportService {
  toCsv(result: BatchResult, sheet: ExportSheetName): string;
  toXlsx(result: BatchResult): Buffer;
}

export interface IFileValidationService {
  validateBatch(files: readonly Express.Multer.File[] | undefined): FileValidationResult;
}

// Supporting types and interfaces
export interface BatchOptions {
  /** Upper bound on documents in flight at once */
  concurrency?: number;
  correlationId?: string;
}

export type ExportSheetName = 'invoices' | 'line-items';

export interface FileValidationResult {
  isValid: boolean;
  errors: string[];
}

export type TabularRow = Record<string, string | number>;
