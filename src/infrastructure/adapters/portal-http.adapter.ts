import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as http from 'http';
import * as https from 'https';
import * as zlib from 'zlib';
import { SocksProxyAgent } from 'socks-proxy-agent';
import {
  PortalFormSubmission,
  PortalPage,
  PortalTransportFactory,
  PortalTransportPort,
} from '../../domain/ports/portal-transport.port';
import { PortalTransportError } from '../../domain/errors/registry.errors';

const MAX_REDIRECTS = 5;

export interface PortalHttpOptions {
  userAgent: string;
  acceptLanguage: string;
  timeoutMs: number;
  proxyUrl: string | null;
  debug: boolean;
}

interface RawResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

/**
 * Cliente HTTP con cookies para una sesión contra el portal.
 *
 * HTTP puro (módulos http/https de Node), sin browser:
 * - cookie jar propio por instancia (el portal es JSF y depende de JSESSIONID)
 * - sigue redirecciones (301/302/303 → GET)
 * - descomprime gzip / deflate / br
 * - Referer de la última página visitada
 */
export class PortalHttpClient implements PortalTransportPort {
  private readonly logger = new Logger(PortalHttpClient.name);
  private readonly cookies = new Map<string, string>();
  private readonly agent: SocksProxyAgent | undefined;
  private referer: string | null = null;

  constructor(private readonly options: PortalHttpOptions) {
    this.agent = options.proxyUrl ? new SocksProxyAgent(options.proxyUrl) : undefined;
  }

  async get(url: string, signal?: AbortSignal): Promise<PortalPage> {
    return this.navigate('GET', url, null, signal);
  }

  async submit(submission: PortalFormSubmission, signal?: AbortSignal): Promise<PortalPage> {
    const encoded = new URLSearchParams(submission.fields).toString();

    if (submission.method === 'GET') {
      const target = new URL(submission.action);
      target.search = encoded;
      return this.navigate('GET', target.toString(), null, signal);
    }

    return this.navigate('POST', submission.action, encoded, signal);
  }

  // ──────────────────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────────────────

  private async navigate(
    method: 'GET' | 'POST',
    url: string,
    body: string | null,
    signal?: AbortSignal,
  ): Promise<PortalPage> {
    let currentUrl = url;
    let currentMethod = method;
    let currentBody = body;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const response = await this.request(currentMethod, currentUrl, currentBody, signal);
      this.storeCookies(response.headers);

      const location = response.headers.location;
      if (response.status >= 300 && response.status < 400 && location) {
        const next = new URL(location, currentUrl).toString();
        this.debugLog(`↪️  ${response.status} → ${next}`);
        // 307/308 conservan método y cuerpo
        if (response.status !== 307 && response.status !== 308) {
          currentMethod = 'GET';
          currentBody = null;
        }
        currentUrl = next;
        continue;
      }

      if (response.status < 200 || response.status >= 300) {
        throw new PortalTransportError(
          `HTTP ${response.status} desde ${currentUrl}`,
          response.status,
        );
      }

      this.referer = currentUrl;
      return { url: currentUrl, status: response.status, html: response.body };
    }

    throw new PortalTransportError(`Demasiadas redirecciones desde ${url}`);
  }

  private request(
    method: 'GET' | 'POST',
    url: string,
    body: string | null,
    signal?: AbortSignal,
  ): Promise<RawResponse> {
    return new Promise((resolve, reject) => {
      const headers: http.OutgoingHttpHeaders = {
        'User-Agent': this.options.userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': this.options.acceptLanguage,
        'Accept-Encoding': 'gzip, deflate, br',
        Connection: 'keep-alive',
      };
      if (this.referer) headers.Referer = this.referer;
      if (this.cookies.size > 0) headers.Cookie = this.cookieHeader();
      if (body !== null) {
        headers['Content-Type'] = 'application/x-www-form-urlencoded';
        headers['Content-Length'] = Buffer.byteLength(body);
      }

      this.debugLog(`➡️  ${method} ${url}`);

      const requestOptions: https.RequestOptions = { method, headers, agent: this.agent, signal };
      const onResponse = (res: http.IncomingMessage): void => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', (err) => reject(new PortalTransportError(`${method} ${url}: ${err.message}`)));
        res.on('end', () => {
          try {
            const decoded = this.decode(Buffer.concat(chunks), res.headers['content-encoding']);
            this.debugLog(`⬅️  ${res.statusCode ?? 0} ${url} (${decoded.length} chars)`);
            resolve({ status: res.statusCode ?? 0, headers: res.headers, body: decoded });
          } catch (err) {
            reject(new PortalTransportError(`No se pudo decodificar ${url}: ${(err as Error).message}`));
          }
        });
      };

      const req = url.startsWith('https')
        ? https.request(url, requestOptions, onResponse)
        : http.request(url, requestOptions, onResponse);

      req.on('error', (err) => reject(new PortalTransportError(`${method} ${url}: ${err.message}`)));
      req.setTimeout(this.options.timeoutMs, () => {
        req.destroy(new Error(`Timeout tras ${this.options.timeoutMs}ms`));
      });

      if (body !== null) req.write(body);
      req.end();
    });
  }

  private decode(raw: Buffer, encoding: string | undefined): string {
    switch (encoding) {
      case 'gzip':
        return zlib.gunzipSync(raw).toString('utf-8');
      case 'deflate':
        return zlib.inflateSync(raw).toString('utf-8');
      case 'br':
        return zlib.brotliDecompressSync(raw).toString('utf-8');
      default:
        return raw.toString('utf-8');
    }
  }

  private storeCookies(headers: http.IncomingHttpHeaders): void {
    for (const line of headers['set-cookie'] ?? []) {
      const pair = line.split(';')[0];
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
  }

  private cookieHeader(): string {
    return Array.from(this.cookies.entries())
      .map(([name, value]) => `${name}=${value}`)
      .join('; ');
  }

  private debugLog(message: string): void {
    if (this.options.debug) this.logger.debug(message);
  }
}

/**
 * Fábrica de clientes: un cliente (y un cookie jar) nuevo por búsqueda.
 */
@Injectable()
export class HttpPortalTransportFactory implements PortalTransportFactory {
  constructor(private readonly config: ConfigService) {}

  create(options: { debug: boolean }): PortalTransportPort {
    return new PortalHttpClient({
      userAgent: this.config.get<string>('registry.portal.userAgent', 'Mozilla/5.0'),
      acceptLanguage: this.config.get<string>('registry.portal.acceptLanguage', 'en-GB,en;q=0.9'),
      timeoutMs: this.config.get<number>('registry.portal.httpTimeoutMs', 10000),
      proxyUrl: this.config.get<string | null>('registry.portal.proxyUrl', null),
      debug: options.debug,
    });
  }
}
