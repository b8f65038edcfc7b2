import { Module } from '@nestjs/common';
import { DialectRegistryModule } from '../dialect-registry/dialect-registry.module';
import { InvoiceExtractionService } from './invoice-extraction.service';

@Module({
  imports: [DialectRegistryModule],
  providers: [
    InvoiceExtractionService,
    {
      provide: 'IInvoiceExtractionService',
      useExisting: InvoiceExtractionService,
    },
  ],
  exports: [InvoiceExtractionService, 'IInvoiceExtractionService', DialectRegistryModule],
})
export class InvoiceExtractionModule {}
