import { Inject, Injectable, Logger } from '@nestjs/common';
import { Company } from '../../domain/entities/company.entity';
import { SearchQuery } from '../../domain/entities/search-query.entity';
import { RESULT_CACHE_PORT, ResultCachePort } from '../../domain/ports/result-cache.port';
import { PortalSessionFactory } from '../../infrastructure/portal/portal-session.factory';
import { RegisterResultExtractor } from '../../infrastructure/adapters/register-result-extractor.adapter';

/**
 * Orquestador de búsquedas en el Handelsregister.
 *
 * Funciona así:
 * 1. Si no se fuerza (`bypassCache`), busca el HTML en caché por palabra clave.
 *    Un acierto se extrae directamente, sin tocar la red.
 * 2. Si no hay caché (o se fuerza), abre una sesión nueva contra el portal,
 *    envía la búsqueda y guarda el HTML (sobrescribiendo si ya existía).
 * 3. Extrae las empresas del HTML. Sin filas → [].
 *
 * Los errores de la sesión se propagan tal cual.
 */
@Injectable()
export class SearchOrchestratorService {
  private readonly logger = new Logger(SearchOrchestratorService.name);

  constructor(
    @Inject(RESULT_CACHE_PORT) private readonly cache: ResultCachePort,
    private readonly sessions: PortalSessionFactory,
    private readonly extractor: RegisterResultExtractor,
  ) {}

  async search(query: SearchQuery, signal?: AbortSignal): Promise<Company[]> {
    if (!query.bypassCache) {
      const cached = await this.cache.get(query.keywords);
      if (cached !== null) {
        this.logger.log(`📦 Caché: "${query.keywords}"`);
        return this.extractor.extract(cached);
      }
    }

    this.logger.log(
      `🌐 Portal: "${query.keywords}" | modo: ${query.matchMode}` +
        (query.stateFilter.length ? ` | estados: ${query.stateFilter.join(',')}` : '') +
        (query.bypassCache ? ' | forzado' : ''),
    );

    const session = this.sessions.create(query.debug);
    await session.open(signal);
    const { html, warnings } = await session.submitSearch(query, signal);

    if (warnings.length > 0) {
      this.logger.debug(`${warnings.length} filtro(s) de estado no aplicados`);
    }

    // Plazo vencido durante el último envío: no se guarda nada
    signal?.throwIfAborted();
    await this.cache.put(query.keywords, html);

    const companies = this.extractor.extract(html);
    this.logger.log(`✅ ${companies.length} empresa(s) para "${query.keywords}"`);
    return companies;
  }
}
