import { Injectable, Logger, OnModuleInit, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { DEFAULT_JWT_SECRET } from '../../shared/config/registry.config';
import { ServiceTokenClaims } from './service-token.claims';

/**
 * Emisión y verificación de tokens servicio-a-servicio (JWT HS256).
 * Los tokens no caducan: solo se comprueba la firma.
 */
@Injectable()
export class ServiceTokenService implements OnModuleInit {
  private readonly logger = new Logger(ServiceTokenService.name);

  constructor(
    private readonly jwt: JwtService,
    private readonly config: ConfigService,
  ) {}

  onModuleInit(): void {
    const secret = this.config.get<string>('registry.jwtSecret', DEFAULT_JWT_SECRET);
    if (secret === DEFAULT_JWT_SECRET) {
      this.logger.warn(
        '⚠️  JWT_SECRET_KEY no configurada, usando la clave por defecto (insegura).',
      );
    }
  }

  issue(serviceName: string): string {
    const claims: ServiceTokenClaims = { service: serviceName };
    const token = this.jwt.sign(claims);
    this.logger.log(`🔑 Token emitido para "${serviceName}"`);
    return token;
  }

  verify(token: string): ServiceTokenClaims {
    try {
      return this.jwt.verify<ServiceTokenClaims>(token, { ignoreExpiration: true });
    } catch (err) {
      throw new UnauthorizedException(`Invalid token: ${(err as Error).message}`);
    }
  }
}
