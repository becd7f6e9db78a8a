import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });

  configureApp(app);

  // CORS
  app.enableCors({
    origin: '*',
    methods: 'GET,POST',
  });

  // Swagger
  const swagger = new DocumentBuilder()
    .setTitle('Handelsregister API')
    .setDescription(
      'Búsqueda de empresas en el registro mercantil alemán (handelsregister.de). HTTP puro, sin browser.\n\n' +
      '**Autenticación:** `Authorization: Bearer <token>`; el token se obtiene con `POST /api/token`.\n\n' +
      '**Públicos:** `/api/token`, `/api/bundesland`, `/api/health`, `/api/docs`.',
    )
    .setVersion('1.0')
    .addBearerAuth({ type: 'http', scheme: 'bearer', bearerFormat: 'JWT' }, 'bearer')
    .addTag('Search', 'Búsqueda en el registro')
    .build();

  const document = SwaggerModule.createDocument(app, swagger);
  SwaggerModule.setup('docs', app, document);

  const config = app.get(ConfigService);
  const port = config.get<number>('registry.port', 5000);
  const host = config.get<string>('registry.host', '127.0.0.1');
  await app.listen(port, host);

  const logger = new Logger('Bootstrap');
  logger.log(`🚀 Handelsregister API corriendo en http://${host}:${port}`);
  logger.log(`📚 Swagger docs en http://${host}:${port}/docs`);
}

bootstrap().catch((err: Error) => {
  new Logger('Bootstrap').error(`❌ No se pudo arrancar: ${err.message}`, err.stack);
  process.exit(1);
});
