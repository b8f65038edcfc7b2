import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp, setupSwagger } from './app.setup';
import { ConfigurationService } from './config/configuration.service';
import { LoggerService } from './common/logger/logger.service';

async function bootstrap(): Promise<void> {
  try {
    const app = await NestFactory.create(AppModule, {
      bufferLogs: true,
    });

    const configService = app.get(ConfigurationService);
    const loggerService = app.get(LoggerService);

    // Validate configuration on startup
    configService.validateConfiguration();
    loggerService.log('Configuration validated successfully', 'Bootstrap');

    app.useLogger(loggerService);
    configureApp(app, configService);
    setupSwagger(app);

    const port = configService.port;
    await app.listen(port);

    loggerService.log(`Application started successfully on port ${port}`, 'Bootstrap', {
      port,
      frontendUrl: configService.frontendUrl,
      environment: process.env.NODE_ENV || 'development',
    });
  } catch (error) {
    console.error('Failed to start application:', error);
    process.exit(1);
  }
}

void bootstrap();
