import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { LoggerModule } from '../common/logger/logger.module';
import { ServicesModule } from '../services/services.module';

@Module({
  imports: [ConfigModule, LoggerModule, ServicesModule],
})
export class ExtractCliModule {}
