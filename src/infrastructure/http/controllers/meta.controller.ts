import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Public } from '../../auth/public.decorator';
import { buildApiDocs } from '../api-docs';

export const SERVICE_NAME = 'handelsregister-api';

@ApiTags('Meta')
@Public()
@Controller()
export class MetaController {
  private readonly rateLimit: string;
  private readonly requestTimeoutSeconds: number;

  constructor(config: ConfigService) {
    this.rateLimit = config.get<string>('registry.rateLimit', '100 per hour');
    this.requestTimeoutSeconds = config.get<number>('registry.requestTimeoutSeconds', 30);
  }

  /**
   * GET /api/health
   */
  @Get('health')
  @ApiOperation({ summary: 'Health check' })
  health() {
    return {
      status: 'ok',
      service: SERVICE_NAME,
      config: {
        rate_limit: this.rateLimit,
        request_timeout: this.requestTimeoutSeconds,
      },
    };
  }

  @Get('docs')
  @ApiOperation({ summary: 'Descripción estática de la API' })
  docs() {
    return buildApiDocs({
      rateLimit: this.rateLimit,
      requestTimeoutSeconds: this.requestTimeoutSeconds,
    });
  }
}
