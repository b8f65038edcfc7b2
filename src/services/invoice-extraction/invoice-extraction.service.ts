import { Inject, Injectable } from '@nestjs/common';
import { LoggerService } from '../../common/logger/logger.service';
import { errorMessage, errorStack } from '../../common/errors/app-error';
import { CorrelationIdUtil } from '../../common/utils/correlation-id.util';
import { ConfigurationService } from '../../config/configuration.service';
import {
  BatchEntry,
  BatchResult,
  BatchSummary,
  ExtractionErrorKind,
  ExtractionOutcome,
  InvoiceFile,
  isInvoiceRecord,
} from '../../models/invoice-record';
import { BatchOptions, IDialectRegistry, IInvoiceExtractionService } from '../../models/service.interfaces';
import { DIALECT_REGISTRY } from '../dialect-registry/dialect-registry';
import { InvoiceExtractor } from './invoice-extractor';

const CONTEXT = 'InvoiceExtractionService';

@Injectable()
export class InvoiceExtractionService implements IInvoiceExtractionService {
  private readonly extractor: InvoiceExtractor;

  constructor(
    @Inject(DIALECT_REGISTRY) registry: IDialectRegistry,
    private readonly configService: ConfigurationService,
    private readonly logger: LoggerService,
  ) {
    this.extractor = new InvoiceExtractor(registry, {
      totalTolerance: this.configService.extraction.totalTolerance,
    });
  }

  extract(content: Buffer, filename: string): ExtractionOutcome {
    const outcome = this.extractor.extract(content, filename);

    if (isInvoiceRecord(outcome)) {
      this.logger.debug(`Extracted ${filename} as ${outcome.dialect}`, CONTEXT, {
        filename,
        dialect: outcome.dialect,
        lineItems: outcome.lineItems.length,
        warnings: outcome.warnings.map((warning) => warning.code),
      });
    } else {
      this.logger.warn(`Extraction failed for ${filename}: ${outcome.kind}`, CONTEXT, {
        filename,
        kind: outcome.kind,
        detail: outcome.detail,
      });
    }

    return outcome;
  }

  /** Extracts one document after yielding to the event loop. */
  async extractAsync(content: Buffer, filename: string): Promise<ExtractionOutcome> {
    await new Promise<void>((resolve) => setImmediate(resolve));
    return this.extract(content, filename);
  }

  /**
   * Extracts every file through a bounded pool. Entries come back in input
   * order and a failure in one file never affects another.
   */
  async extractBatch(files: readonly InvoiceFile[], options: BatchOptions = {}): Promise<BatchResult> {
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? this.configService.extraction.concurrency));
    const operationId = `extract-batch-${options.correlationId ?? CorrelationIdUtil.generate()}`;

    this.logger.log(`Extracting batch of ${files.length} file(s)`, CONTEXT, { files: files.length, concurrency });
    this.logger.startPerformanceTimer(operationId);

    const results = new Array<ExtractionOutcome>(files.length);
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < files.length) {
        const index = nextIndex++;
        results[index] = await this.extractSafely(files[index]);
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, files.length) }, () => worker()));

    const entries: BatchEntry[] = files.map((file, index) => ({
      index,
      filename: file.filename,
      result: results[index],
    }));
    const summary = summarize(entries);

    this.logger.endPerformanceTimer(operationId, 'extractBatch', CONTEXT, { summary });

    return { entries, summary };
  }

  private async extractSafely(file: InvoiceFile): Promise<ExtractionOutcome> {
    try {
      return await this.extractAsync(file.content, file.filename);
    } catch (error) {
      this.logger.error(`Unexpected failure extracting ${file.filename}`, errorStack(error), CONTEXT, {
        filename: file.filename,
      });
      return {
        status: 'failed',
        filename: file.filename,
        kind: ExtractionErrorKind.PROCESSING_FAILED,
        detail: errorMessage(error),
      };
    }
  }
}

export function summarize(entries: readonly BatchEntry[]): BatchSummary {
  let extracted = 0;
  let warnings = 0;

  for (const { result } of entries) {
    if (isInvoiceRecord(result)) {
      extracted++;
      warnings += result.warnings.length;
    }
  }

  return { total: entries.length, extracted, failed: entries.length - extracted, warnings };
}
