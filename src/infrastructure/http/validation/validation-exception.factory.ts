import { ValidationError } from 'class-validator';
import { RequestValidationError } from '../../../domain/errors/registry.errors';

function validValuesOf(error: ValidationError): string[] | undefined {
  for (const context of Object.values(error.contexts ?? {})) {
    const values: unknown = context?.validValues;
    if (Array.isArray(values) && values.every((v): v is string => typeof v === 'string')) {
      return values;
    }
  }
  return undefined;
}

function flatten(errors: ValidationError[]): ValidationError[] {
  return errors.flatMap((e) => [e, ...flatten(e.children ?? [])]);
}

/**
 * exceptionFactory del ValidationPipe global: convierte los errores de
 * class-validator en un RequestValidationError (400) con los valores
 * aceptados cuando el validador los declara en su contexto.
 */
export function validationExceptionFactory(errors: ValidationError[]): RequestValidationError {
  const all = flatten(errors).filter((e) => e.constraints);
  const messages = all.flatMap((e) => Object.values(e.constraints ?? {}));
  const message = Array.from(new Set(messages)).join('; ');
  const validValues = all.map(validValuesOf).find((values) => values !== undefined);

  return new RequestValidationError(message || 'Invalid request', validValues);
}
