import type { Request } from 'express';

/** Payload firmado de un token de servicio (sin `exp`) */
export interface ServiceTokenClaims {
  service: string;
  iat?: number;
}

/** Request con el token ya verificado por ServiceTokenGuard */
export interface ServiceRequest extends Request {
  serviceToken?: ServiceTokenClaims;
}

export function isServiceTokenClaims(value: unknown): value is ServiceTokenClaims {
  return (
    typeof value === 'object' &&
    value !== null &&
    'service' in value &&
    typeof value.service === 'string'
  );
}
