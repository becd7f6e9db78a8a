import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { ThrottlerModule } from '@nestjs/throttler';
import { SearchController } from './controllers/search.controller';
import { TokenController } from './controllers/token.controller';
import { StatesController } from './controllers/states.controller';
import { MetaController } from './controllers/meta.controller';
import { SearchOrchestratorService } from '../../application/services/search-orchestrator.service';
import { BoundedSearchService } from '../../application/services/bounded-search.service';
import { HttpPortalTransportFactory } from '../adapters/portal-http.adapter';
import { FileResultCache } from '../adapters/file-result-cache.adapter';
import { RegisterResultExtractor } from '../adapters/register-result-extractor.adapter';
import { PortalSessionFactory } from '../portal/portal-session.factory';
import { ServiceTokenService } from '../auth/service-token.service';
import { ServiceTokenGuard } from '../auth/service-token.guard';
import { PORTAL_TRANSPORT_FACTORY } from '../../domain/ports/portal-transport.port';
import { RESULT_CACHE_PORT } from '../../domain/ports/result-cache.port';
import { DEFAULT_JWT_SECRET } from '../../shared/config/registry.config';
import { parseRateLimit } from '../../shared/utils/rate-limit';

@Module({
  imports: [
    ConfigModule,
    // Tokens de servicio HS256, sin expiración
    JwtModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        secret: config.get<string>('registry.jwtSecret', DEFAULT_JWT_SECRET),
        signOptions: { algorithm: 'HS256' },
        verifyOptions: { algorithms: ['HS256'] },
      }),
    }),
    // Límite por llamador a partir de RATE_LIMIT_DEFAULT ("100 per hour")
    ThrottlerModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const rateLimit = config.get<string>('registry.rateLimit', '100 per hour');
        const { limit, ttlMs } = parseRateLimit(rateLimit);
        return {
          throttlers: [{ ttl: ttlMs, limit }],
          errorMessage: rateLimit,
        };
      },
    }),
  ],
  controllers: [SearchController, TokenController, StatesController, MetaController],
  providers: [
    // Adaptadores de infraestructura (implementan los puertos del dominio)
    {
      provide: PORTAL_TRANSPORT_FACTORY,
      useClass: HttpPortalTransportFactory,
    },
    {
      provide: RESULT_CACHE_PORT,
      useClass: FileResultCache,
    },
    PortalSessionFactory,
    RegisterResultExtractor,
    // Servicios de aplicación
    SearchOrchestratorService,
    BoundedSearchService,
    // Autenticación: todos los endpoints exigen token salvo @Public()
    ServiceTokenService,
    {
      provide: APP_GUARD,
      useClass: ServiceTokenGuard,
    },
  ],
  exports: [BoundedSearchService, ServiceTokenService],
})
export class RegistryModule {}
