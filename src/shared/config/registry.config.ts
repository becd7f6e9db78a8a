import { registerAs } from '@nestjs/config';
import * as os from 'os';
import * as path from 'path';

/** Clave de firma por defecto: INSEGURA, solo para desarrollo local */
export const DEFAULT_JWT_SECRET = 'default-secret-key-change-in-production';

export const registryConfig = registerAs('registry', () => ({
  /** Puerto y host del servicio */
  port: parseInt(process.env.REGISTRY_API_PORT || '5000', 10),
  host: process.env.REGISTRY_API_HOST || '127.0.0.1',

  /** Clave simétrica (HS256) para firmar tokens de servicio */
  jwtSecret: process.env.JWT_SECRET_KEY || DEFAULT_JWT_SECRET,

  /** Límite por llamador, formato "100 per hour" */
  rateLimit: process.env.RATE_LIMIT_DEFAULT || '100 per hour',

  /** Tiempo máximo por búsqueda (segundos, admite decimales) */
  requestTimeoutSeconds: parseFloat(process.env.REQUEST_TIMEOUT || '30'),

  portal: {
    baseUrl: process.env.PORTAL_BASE_URL || 'https://www.handelsregister.de',
    /** Timeout de cada petición HTTP individual (ms) */
    httpTimeoutMs: parseInt(process.env.PORTAL_HTTP_TIMEOUT_MS || '10000', 10),
    /** Proxy SOCKS opcional (socks5h://host:port) */
    proxyUrl: process.env.PORTAL_PROXY_URL || null,
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/15.5 Safari/605.1.15',
    acceptLanguage: 'en-GB,en;q=0.9',
  },

  /** Directorio de la caché de resultados (un fichero por palabra clave) */
  cacheDir:
    process.env.REGISTRY_CACHE_DIR || path.join(os.tmpdir(), 'handelsregister_cache'),
}));

export type RegistryConfig = ReturnType<typeof registryConfig>;
