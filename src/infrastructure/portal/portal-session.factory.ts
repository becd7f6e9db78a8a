import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  PORTAL_TRANSPORT_FACTORY,
  PortalTransportFactory,
} from '../../domain/ports/portal-transport.port';
import { RegistryPortalSession } from './registry-portal.session';

/**
 * Crea una sesión nueva (transporte y cookies propios) por búsqueda.
 */
@Injectable()
export class PortalSessionFactory {
  private readonly baseUrl: string;

  constructor(
    private readonly config: ConfigService,
    @Inject(PORTAL_TRANSPORT_FACTORY)
    private readonly transports: PortalTransportFactory,
  ) {
    this.baseUrl = this.config.get<string>(
      'registry.portal.baseUrl',
      'https://www.handelsregister.de',
    );
  }

  create(debug: boolean): RegistryPortalSession {
    return new RegistryPortalSession(this.transports.create({ debug }), this.baseUrl, debug);
  }
}
