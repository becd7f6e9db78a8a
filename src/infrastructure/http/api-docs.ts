import { MATCH_MODE_VALUES } from '../../domain/enums/match-mode.enum';
import { STATE_CODES } from '../../domain/states/state-registry';

export interface ApiDocsSettings {
  rateLimit: string;
  requestTimeoutSeconds: number;
}

/**
 * Descripción estática de la API (GET /api/docs).
 * La interfaz interactiva está en /docs (Swagger).
 */
export function buildApiDocs({ rateLimit, requestTimeoutSeconds }: ApiDocsSettings) {
  return {
    authentication: {
      type: 'JWT',
      header: 'Authorization: Bearer <token>',
      description: 'Service-to-service authentication without expiration',
    },
    rate_limiting: {
      default: rateLimit,
      description: 'Rate limit applied per service token, or per IP address without one',
    },
    request_timeout: {
      value: `${requestTimeoutSeconds} seconds`,
      description: 'Maximum time allowed for request processing',
    },
    endpoints: {
      '/api/token': {
        method: 'POST',
        authentication: false,
        rate_limited: true,
        description: 'Generate JWT token for service authentication',
        body: {
          service_name: { type: 'string', required: true },
        },
      },
      '/api/search': {
        method: 'GET',
        authentication: true,
        rate_limited: true,
        description: 'Search for companies by keywords',
        parameters: {
          keywords: { type: 'string', required: true },
          mode: { type: 'string', required: false, default: 'all', values: [...MATCH_MODE_VALUES] },
          bundesland: {
            type: 'string',
            required: false,
            description: 'Comma-separated state codes',
            values: [...STATE_CODES],
          },
          force: { type: 'boolean', required: false, default: false },
          debug: { type: 'boolean', required: false, default: false },
        },
      },
      '/api/bundesland': {
        method: 'GET',
        authentication: false,
        description: 'Resolve a state name (German or English) to its code',
        parameters: { name: { type: 'string', required: true } },
      },
      '/api/bundesland/list': {
        method: 'GET',
        authentication: false,
        description: 'List all 16 states with their codes',
      },
      '/api/health': { method: 'GET', authentication: false, description: 'Health check' },
      '/api/docs': { method: 'GET', authentication: false, description: 'API documentation' },
    },
    environment_variables: {
      JWT_SECRET_KEY: 'Secret key for JWT signing (default: default-secret-key-change-in-production)',
      RATE_LIMIT_DEFAULT: `Rate limit string (default: 100 per hour, current: ${rateLimit})`,
      REQUEST_TIMEOUT: `Request timeout in seconds (default: 30, current: ${requestTimeoutSeconds})`,
    },
  };
}
