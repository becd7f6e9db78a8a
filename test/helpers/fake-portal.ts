import { readFileSync } from 'fs';
import * as path from 'path';
import {
  PortalFormSubmission,
  PortalPage,
  PortalTransportFactory,
  PortalTransportPort,
} from '../../src/domain/ports/portal-transport.port';
import { ResultCachePort } from '../../src/domain/ports/result-cache.port';

export const FAKE_PORTAL_URL = 'https://portal.test';

export function fixture(name: string): string {
  return readFileSync(path.join(__dirname, '..', 'fixtures', name), 'utf-8');
}

export interface FakePortalPages {
  start: string;
  advancedSearch: string;
  results: string;
}

export function portalPages(overrides: Partial<FakePortalPages> = {}): FakePortalPages {
  return {
    start: fixture('start.html'),
    advancedSearch: fixture('advanced-search.html'),
    results: fixture('results.html'),
    ...overrides,
  };
}

export interface RecordedRequest {
  method: 'GET' | 'POST';
  url: string;
  fields: Array<[string, string]>;
}

/**
 * Portal en memoria: inicio → búsqueda avanzada → resultados,
 * según la `action` del formulario enviado.
 */
export class FakePortalTransport implements PortalTransportPort {
  readonly requests: RecordedRequest[] = [];

  constructor(private readonly pages: FakePortalPages = portalPages()) {}

  async get(url: string): Promise<PortalPage> {
    this.requests.push({ method: 'GET', url, fields: [] });
    return { url, status: 200, html: this.pages.start };
  }

  async submit(submission: PortalFormSubmission): Promise<PortalPage> {
    this.requests.push({
      method: submission.method,
      url: submission.action,
      fields: submission.fields,
    });
    const html = submission.action.endsWith('/welcome.xhtml')
      ? this.pages.advancedSearch
      : this.pages.results;
    return { url: submission.action, status: 200, html };
  }

  /** Campos del último envío de formulario */
  lastFields(): Array<[string, string]> {
    return this.requests[this.requests.length - 1]?.fields ?? [];
  }
}

/** Transporte que nunca responde; rechaza al abortarse la señal */
export class HangingPortalTransport implements PortalTransportPort {
  get(_url: string, signal?: AbortSignal): Promise<PortalPage> {
    return this.hang(signal);
  }

  submit(_submission: PortalFormSubmission, signal?: AbortSignal): Promise<PortalPage> {
    return this.hang(signal);
  }

  private hang(signal?: AbortSignal): Promise<PortalPage> {
    return new Promise((_, reject) => {
      const abort = signal;
      if (abort) abort.addEventListener('abort', () => reject(abort.reason), { once: true });
    });
  }
}

export class FakeTransportFactory implements PortalTransportFactory {
  readonly created: PortalTransportPort[] = [];

  constructor(private readonly make: () => PortalTransportPort = () => new FakePortalTransport()) {}

  create(): PortalTransportPort {
    const transport = this.make();
    this.created.push(transport);
    return transport;
  }
}

export class InMemoryResultCache implements ResultCachePort {
  readonly entries = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async put(key: string, html: string): Promise<void> {
    this.entries.set(key, html);
  }
}
