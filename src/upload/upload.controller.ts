import {
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
  Query,
  Res,
  StreamableFile,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import { Response } from 'express';
import { memoryStorage } from 'multer';
import { ApiBody, ApiConsumes, ApiOperation, ApiProduces, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  BatchResultDto,
  ErrorResponseDto,
  ExportFormat,
  ExportQueryDto,
  ExportSheet,
  SuccessResponseDto,
  UploadInvoicesDto,
} from '../common/dto/extraction.dto';
import { AppError, errorMessage, errorStack } from '../common/errors/app-error';
import { LoggerService } from '../common/logger/logger.service';
import { CorrelationIdUtil } from '../common/utils/correlation-id.util';
import { BatchResult, InvoiceFile } from '../models/invoice-record';
import {
  ExportSheetName,
  IFileValidationService,
  IInvoiceExtractionService,
  ITabularExportService,
} from '../models/service.interfaces';
import { EXPORT_FILENAMES, XLSX_CONTENT_TYPE } from '../services/tabular-export/tabular-export.service';

export type ResponseLocals = Pick<Response, 'locals'>;

@ApiTags('Invoice Upload')
@Controller('upload')
export class UploadController {
  constructor(
    @Inject('IInvoiceExtractionService')
    private readonly extractionService: IInvoiceExtractionService,
    @Inject('IFileValidationService')
    private readonly fileValidationService: IFileValidationService,
    @Inject('ITabularExportService')
    private readonly exportService: ITabularExportService,
    private readonly loggerService: LoggerService,
  ) {}

  @Post('invoices')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Extract a batch of XML invoices',
    description: 'Upload CFDI, UBL, CII or generic XML invoices; every file gets a record or an error, in upload order',
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({ description: 'Invoice files', type: UploadInvoicesDto })
  @ApiResponse({ status: HttpStatus.OK, description: 'Batch extracted', type: BatchResultDto })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'Upload rejected', type: ErrorResponseDto })
  @UseInterceptors(FilesInterceptor('files', undefined, { storage: memoryStorage() }))
  async uploadInvoices(
    @UploadedFiles() files: Express.Multer.File[] | undefined,
    @Res({ passthrough: true }) res: ResponseLocals,
  ): Promise<SuccessResponseDto<BatchResult>> {
    const correlationId = CorrelationIdUtil.fromLocals(res.locals) ?? CorrelationIdUtil.generate();
    const result = await this.extractUpload(files, correlationId);

    return {
      success: true,
      data: result,
      timestamp: new Date().toISOString(),
      correlationId,
    };
  }

  @Post('invoices/export')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Extract a batch of XML invoices and download it as a table',
    description: 'CSV carries one sheet (invoices or line items); XLSX carries both',
  })
  @ApiConsumes('multipart/form-data')
  @ApiProduces('text/csv', XLSX_CONTENT_TYPE)
  @ApiBody({ description: 'Invoice files', type: UploadInvoicesDto })
  @ApiResponse({ status: HttpStatus.OK, description: 'Table file' })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'Upload rejected', type: ErrorResponseDto })
  @UseInterceptors(FilesInterceptor('files', undefined, { storage: memoryStorage() }))
  async exportInvoices(
    @UploadedFiles() files: Express.Multer.File[] | undefined,
    @Query() query: ExportQueryDto,
    @Res({ passthrough: true }) res: ResponseLocals,
  ): Promise<StreamableFile> {
    const correlationId = CorrelationIdUtil.fromLocals(res.locals) ?? CorrelationIdUtil.generate();
    const result = await this.extractUpload(files, correlationId);
    const sheet: ExportSheetName = query.sheet === ExportSheet.LINE_ITEMS ? 'line-items' : 'invoices';

    if (query.format === ExportFormat.XLSX) {
      return new StreamableFile(this.exportService.toXlsx(result), {
        type: XLSX_CONTENT_TYPE,
        disposition: `attachment; filename="${EXPORT_FILENAMES.invoices}.xlsx"`,
      });
    }

    return new StreamableFile(Buffer.from(this.exportService.toCsv(result, sheet), 'utf8'), {
      type: 'text/csv; charset=utf-8',
      disposition: `attachment; filename="${EXPORT_FILENAMES[sheet]}.csv"`,
    });
  }

  private async extractUpload(
    files: Express.Multer.File[] | undefined,
    correlationId: string,
  ): Promise<BatchResult> {
    const validation = this.fileValidationService.validateBatch(files);
    if (!files || !validation.isValid) {
      throw AppError.fileValidationError('Upload rejected', { errors: validation.errors }, correlationId);
    }

    const invoiceFiles: InvoiceFile[] = files.map((file) => ({
      content: file.buffer,
      filename: file.originalname,
    }));

    try {
      const result = await this.extractionService.extractBatch(invoiceFiles, { correlationId });

      this.loggerService.log('Invoice batch extracted', 'UploadController', {
        correlationId,
        summary: result.summary,
      });

      return result;
    } catch (error) {
      this.loggerService.error('Invoice batch extraction failed', errorStack(error), 'UploadController', {
        correlationId,
        files: invoiceFiles.length,
      });

      throw AppError.processingError(
        `Invoice batch extraction failed: ${errorMessage(error)}`,
        { originalError: errorMessage(error) },
        correlationId,
      );
    }
  }
}
