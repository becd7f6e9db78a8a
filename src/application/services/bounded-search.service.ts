import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Company } from '../../domain/entities/company.entity';
import { SearchQuery } from '../../domain/entities/search-query.entity';
import { PipelineTimeoutError } from '../../domain/errors/registry.errors';
import { runWithDeadline } from '../../shared/utils/deadline';
import { SearchOrchestratorService } from './search-orchestrator.service';

/**
 * Ejecuta cada búsqueda con un tiempo máximo (REQUEST_TIMEOUT).
 *
 * Al vencer el plazo se aborta la señal que recibe el transporte y se
 * responde con timeout; la petición al portal puede seguir viva un rato.
 */
@Injectable()
export class BoundedSearchService {
  private readonly logger = new Logger(BoundedSearchService.name);
  readonly timeoutSeconds: number;

  constructor(
    private readonly orchestrator: SearchOrchestratorService,
    private readonly config: ConfigService,
  ) {
    this.timeoutSeconds = this.config.get<number>('registry.requestTimeoutSeconds', 30);
  }

  async search(query: SearchQuery): Promise<Company[]> {
    try {
      return await runWithDeadline(
        (signal) => this.orchestrator.search(query, signal),
        this.timeoutSeconds * 1000,
        () => new PipelineTimeoutError(this.timeoutSeconds),
      );
    } catch (err) {
      if (err instanceof PipelineTimeoutError) {
        this.logger.warn(`⏱️  Timeout (${this.timeoutSeconds}s) buscando "${query.keywords}"`);
      }
      throw err;
    }
  }
}
