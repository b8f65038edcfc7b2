import { INestApplication, ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';
import { ConfigurationService } from './config/configuration.service';

/** Pipes, filters and CORS shared by the server and the integration tests */
export function configureApp(app: INestApplication, configService: ConfigurationService): void {
  app.enableCors({
    origin: configService.frontendUrl,
    methods: 'GET,HEAD,POST',
    credentials: false,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.useGlobalFilters(new GlobalExceptionFilter());
}

export function setupSwagger(app: INestApplication): void {
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('XML Invoice Extractor')
      .setDescription('Extracts normalized invoice records from CFDI, UBL, CII and generic XML invoices')
      .setVersion('1.0')
      .build(),
  );
  SwaggerModule.setup('docs', app, document);
}
