import { registerDecorator, ValidationArguments, ValidationOptions } from 'class-validator';
import { isStateCode, STATE_CODES } from '../../../domain/states/state-registry';

function invalidCodes(value: unknown): string[] {
  if (!Array.isArray(value)) return [String(value)];
  return value.map(String).filter((code) => !isStateCode(code));
}

/**
 * Valida una lista de códigos de Bundesland.
 * El mensaje nombra todos los códigos inválidos y el contexto lleva
 * la lista de códigos aceptados (`validValues`).
 */
export function IsStateCodeList(options?: ValidationOptions) {
  return (object: object, propertyName: string): void => {
    registerDecorator({
      name: 'isStateCodeList',
      target: object.constructor,
      propertyName,
      options: {
        ...options,
        context: { validValues: [...STATE_CODES] },
      },
      validator: {
        validate(value: unknown): boolean {
          return invalidCodes(value).length === 0;
        },
        defaultMessage(args: ValidationArguments): string {
          return (
            `Invalid bundesland code(s): ${invalidCodes(args.value).join(', ')}. ` +
            `Valid codes: ${STATE_CODES.join(', ')}`
          );
        },
      },
    });
  };
}
