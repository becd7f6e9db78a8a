import { Injectable } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { isServiceTokenClaims } from './service-token.claims';

/**
 * Límite de peticiones por llamador.
 * Con token verificado la identidad es el servicio; sin token, la IP.
 * Debe ejecutarse después de ServiceTokenGuard.
 */
@Injectable()
export class ServiceThrottlerGuard extends ThrottlerGuard {
  protected async getTracker(req: Record<string, unknown>): Promise<string> {
    if (isServiceTokenClaims(req.serviceToken)) {
      return `service:${req.serviceToken.service}`;
    }
    return typeof req.ip === 'string' ? req.ip : 'unknown';
  }
}
