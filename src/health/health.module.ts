import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { DialectRegistryModule } from '../services/dialect-registry/dialect-registry.module';

@Module({
  imports: [DialectRegistryModule],
  controllers: [HealthController],
})
export class HealthModule {}
