import { Module } from '@nestjs/common';
import { ConfigurationService } from '../../config/configuration.service';
import { LoggerService } from '../../common/logger/logger.service';
import { BUNDLED_TABLE_SOURCE, readDialectTable } from './dialect-table.loader';
import { DIALECT_REGISTRY, DialectRegistry } from './dialect-registry';

@Module({
  providers: [
    {
      provide: DIALECT_REGISTRY,
      useFactory: (configService: ConfigurationService, logger: LoggerService): DialectRegistry => {
        const source = configService.extraction.dialectsFile;
        const registry = new DialectRegistry(readDialectTable(source));

        logger.logConfigurationLoad('dialects', true, {
          source: source ?? BUNDLED_TABLE_SOURCE,
          dialects: registry.list().map((dialect) => dialect.id),
        });

        return registry;
      },
      inject: [ConfigurationService, LoggerService],
    },
  ],
  exports: [DIALECT_REGISTRY],
})
export class DialectRegistryModule {}
