import { Module } from '@nestjs/common';
import { FileValidationService } from './file-validation/file-validation.service';
import { InvoiceExtractionModule } from './invoice-extraction/invoice-extraction.module';
import { TabularExportModule } from './tabular-export/tabular-export.module';

@Module({
  imports: [InvoiceExtractionModule, TabularExportModule],
  providers: [
    FileValidationService,
    {
      provide: 'IFileValidationService',
      useExisting: FileValidationService,
    },
  ],
  exports: [FileValidationService, 'IFileValidationService', InvoiceExtractionModule, TabularExportModule],
})
export class ServicesModule {}
