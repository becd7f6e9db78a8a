import { INestApplication, ValidationPipe } from '@nestjs/common';
import { RegistryExceptionFilter } from './infrastructure/http/filters/registry-exception.filter';
import { validationExceptionFactory } from './infrastructure/http/validation/validation-exception.factory';

/**
 * Prefijo, validación y filtro de errores globales.
 * Compartido por main.ts y los tests e2e.
 */
export function configureApp(app: INestApplication): void {
  app.setGlobalPrefix('api');

  // Validación global (class-validator)
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
      transformOptions: { enableImplicitConversion: true },
      exceptionFactory: validationExceptionFactory,
    }),
  );

  app.useGlobalFilters(new RegistryExceptionFilter());
}
