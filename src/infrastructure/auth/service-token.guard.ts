import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { IS_PUBLIC_ROUTE } from './public.decorator';
import { ServiceRequest } from './service-token.claims';
import { ServiceTokenService } from './service-token.service';

const BEARER_PREFIX = 'Bearer ';

/**
 * Extrae el token del header Authorization.
 * Acepta "Bearer <token>" o el token a secas.
 */
export function extractToken(header: string | undefined): string {
  const value = header?.trim() ?? '';
  if (!value) {
    throw new UnauthorizedException('Missing authentication token');
  }
  if (value === BEARER_PREFIX.trim()) {
    throw new UnauthorizedException('Invalid Authorization header format');
  }
  if (value.startsWith(BEARER_PREFIX)) {
    const token = value.slice(BEARER_PREFIX.length).trim();
    if (!token) throw new UnauthorizedException('Missing authentication token');
    return token;
  }
  return value;
}

/**
 * Guard global que exige un token de servicio firmado.
 *
 * Todos los endpoints son protegidos por defecto.
 * Usa @Public() para excluir un endpoint (ej: healthcheck).
 */
@Injectable()
export class ServiceTokenGuard implements CanActivate {
  private readonly logger = new Logger(ServiceTokenGuard.name);

  constructor(
    private readonly tokens: ServiceTokenService,
    private readonly reflector: Reflector,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_ROUTE, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) return true;

    const request = context.switchToHttp().getRequest<ServiceRequest>();

    try {
      const token = extractToken(request.headers.authorization);
      request.serviceToken = this.tokens.verify(token);
    } catch (err) {
      this.logger.warn(`🚫 Token rechazado desde ${request.ip}: ${(err as Error).message}`);
      throw err;
    }

    return true;
  }
}
