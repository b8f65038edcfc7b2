import { Module } from '@nestjs/common';
import { TabularExportService } from './tabular-export.service';

@Module({
  providers: [TabularExportService, { provide: 'ITabularExportService', useExisting: TabularExportService }],
  exports: [TabularExportService, 'ITabularExportService'],
})
export class TabularExportModule {}
