import { Controller, Get, Logger, Query, UseGuards } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { BoundedSearchService } from '../../../application/services/bounded-search.service';
import { Company } from '../../../domain/entities/company.entity';
import { MatchMode } from '../../../domain/enums/match-mode.enum';
import { SearchQuery } from '../../../domain/entities/search-query.entity';
import { isStateCode } from '../../../domain/states/state-registry';
import { ServiceThrottlerGuard } from '../../auth/service-throttler.guard';
import { SearchRegistryDto } from '../dtos/search-registry.dto';
import { CompanyResponseDto } from '../dtos/company-response.dto';

@ApiTags('Search')
@ApiSecurity('bearer')
@Controller('search')
export class SearchController {
  private readonly logger = new Logger(SearchController.name);

  constructor(private readonly search: BoundedSearchService) {}

  /**
   * GET /api/search?keywords=Gasag%20AG&mode=all&bundesland=BE,HH
   *
   * Busca empresas en el Handelsregister. Token + límite por servicio.
   * Sin resultados → [].
   */
  @Get()
  @UseGuards(ServiceThrottlerGuard)
  @ApiOperation({
    summary: 'Buscar empresas por palabras clave',
    description:
      'Emula el formulario de búsqueda avanzada del portal y devuelve las empresas ' +
      'de la primera página de resultados. Usa la caché por palabra clave salvo `force=true`.',
  })
  @ApiResponse({ status: 200, type: [CompanyResponseDto] })
  @ApiResponse({ status: 504, description: 'La búsqueda superó REQUEST_TIMEOUT' })
  async searchCompanies(@Query() dto: SearchRegistryDto): Promise<Company[]> {
    const query: SearchQuery = {
      keywords: dto.keywords,
      matchMode: dto.mode ?? MatchMode.ALL,
      stateFilter: (dto.bundesland ?? []).filter(isStateCode),
      bypassCache: dto.force ?? false,
      debug: dto.debug ?? false,
    };

    this.logger.log(
      `🔍 Search: "${query.keywords}" | mode: ${query.matchMode}` +
        (query.stateFilter.length ? ` | bundesland: ${query.stateFilter.join(',')}` : ''),
    );

    return this.search.search(query);
  }
}
