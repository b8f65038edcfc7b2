import { IsDateString, IsEnum, IsIn, IsNotEmpty, IsOptional, IsString, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ExtractionErrorKind, WarningCode } from '../../models/invoice-record';

export enum ErrorType {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  PROCESSING_ERROR = 'PROCESSING_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  FILE_VALIDATION_ERROR = 'FILE_VALIDATION_ERROR',
}

export enum ExportFormat {
  CSV = 'csv',
  XLSX = 'xlsx',
}

export enum ExportSheet {
  INVOICES = 'invoices',
  LINE_ITEMS = 'line-items',
}

// Upload DTO
export class UploadInvoicesDto {
  @ApiProperty({
    type: 'array',
    items: { type: 'string', format: 'binary' },
    description: 'XML invoice files (CFDI, UBL, CII or generic)',
  })
  files!: Express.Multer.File[];
}

export class ExportQueryDto {
  @ApiPropertyOptional({ enum: ExportFormat, default: ExportFormat.CSV })
  @IsOptional()
  @IsEnum(ExportFormat)
  format?: ExportFormat = ExportFormat.CSV;

  @ApiPropertyOptional({
    enum: ExportSheet,
    default: ExportSheet.INVOICES,
    description: 'Sheet written to CSV; XLSX always contains both sheets',
  })
  @IsOptional()
  @IsIn(Object.values(ExportSheet))
  sheet?: ExportSheet = ExportSheet.INVOICES;
}

// Response DTOs
export class LineItemDto {
  @ApiPropertyOptional()
  description?: string;

  @ApiPropertyOptional()
  quantity?: number;

  @ApiPropertyOptional()
  unitPrice?: number;

  @ApiPropertyOptional()
  lineTotal?: number;
}

export class ExtractionWarningDto {
  @ApiProperty({ enum: WarningCode })
  code!: WarningCode;

  @ApiProperty()
  message!: string;

  @ApiPropertyOptional({ description: 'Canonical field the warning refers to' })
  field?: string;
}

export class ExtractionOutcomeDto {
  @ApiProperty({ enum: ['extracted', 'failed'] })
  status!: 'extracted' | 'failed';

  @ApiProperty()
  filename!: string;

  @ApiPropertyOptional({ description: 'Resolved dialect id', example: 'ubl-2.1-invoice' })
  dialect?: string;

  @ApiPropertyOptional({ example: 'utf-8' })
  encoding?: string;

  @ApiPropertyOptional({
    description: 'Canonical fields; absent when not present in the document',
    example: { invoiceNumber: 'INV-1', issueDate: '2024-01-31', totalGross: 120 },
  })
  fields?: Record<string, string | number>;

  @ApiPropertyOptional({ type: [LineItemDto] })
  lineItems?: LineItemDto[];

  @ApiPropertyOptional({ type: [ExtractionWarningDto] })
  warnings?: ExtractionWarningDto[];

  @ApiPropertyOptional({ enum: ExtractionErrorKind })
  kind?: ExtractionErrorKind;

  @ApiPropertyOptional()
  detail?: string;
}

export class BatchEntryDto {
  @ApiProperty({ description: 'Position of the file in the upload' })
  index!: number;

  @ApiProperty()
  filename!: string;

  @ApiProperty({ type: ExtractionOutcomeDto })
  result!: ExtractionOutcomeDto;
}

export class BatchSummaryDto {
  @ApiProperty()
  total!: number;

  @ApiProperty()
  extracted!: number;

  @ApiProperty()
  failed!: number;

  @ApiProperty({ description: 'Total number of warnings across extracted records' })
  warnings!: number;
}

export class BatchResultDto {
  @ApiProperty({ type: [BatchEntryDto] })
  entries!: BatchEntryDto[];

  @ApiProperty({ type: BatchSummaryDto })
  summary!: BatchSummaryDto;
}

// Error handling DTOs
export class ErrorDetailsDto {
  @ApiProperty({ enum: ErrorType, description: 'Type of error that occurred' })
  @IsEnum(ErrorType)
  type!: ErrorType;

  @ApiProperty({ description: 'Human-readable error message' })
  @IsString()
  @IsNotEmpty()
  message!: string;

  @ApiPropertyOptional({ description: 'Additional error details' })
  @IsOptional()
  details?: unknown;

  @ApiPropertyOptional({ description: 'Correlation ID for tracking' })
  @IsOptional()
  @IsString()
  correlationId?: string;

  @ApiPropertyOptional({ description: 'Field-specific validation errors' })
  @IsOptional()
  fieldErrors?: Record<string, string[]>;
}

export class ErrorResponseDto {
  @ApiProperty({ description: 'Success indicator', default: false })
  success!: false;

  @ApiProperty({ type: ErrorDetailsDto, description: 'Error information' })
  @ValidateNested()
  @Type(() => ErrorDetailsDto)
  error!: ErrorDetailsDto;

  @ApiProperty({ description: 'Response timestamp' })
  @IsDateString()
  timestamp!: string;
}

export class SuccessResponseDto<T> {
  @ApiProperty({ description: 'Success indicator', default: true })
  success!: true;

  @ApiProperty({ description: 'Response data' })
  data!: T;

  @ApiProperty({ description: 'Response timestamp' })
  @IsDateString()
  timestamp!: string;

  @ApiPropertyOptional({ description: 'Correlation ID for tracking' })
  @IsOptional()
  @IsString()
  correlationId?: string;
}
