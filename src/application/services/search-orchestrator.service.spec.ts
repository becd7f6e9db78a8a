import { ConfigService } from '@nestjs/config';
import { MatchMode } from '../../domain/enums/match-mode.enum';
import { SearchQuery } from '../../domain/entities/search-query.entity';
import { UpstreamStructuralError } from '../../domain/errors/registry.errors';
import { PortalFormSubmission, PortalPage } from '../../domain/ports/portal-transport.port';
import { PortalSessionFactory } from '../../infrastructure/portal/portal-session.factory';
import { RegisterResultExtractor } from '../../infrastructure/adapters/register-result-extractor.adapter';
import {
  FAKE_PORTAL_URL,
  FakePortalTransport,
  FakeTransportFactory,
  InMemoryResultCache,
  fixture,
  portalPages,
} from '../../../test/helpers/fake-portal';
import { SearchOrchestratorService } from './search-orchestrator.service';

/** Aborta la señal justo cuando llega la página de resultados */
class LateResultsTransport extends FakePortalTransport {
  constructor(private readonly controller: AbortController) {
    super();
  }

  async submit(submission: PortalFormSubmission): Promise<PortalPage> {
    const page = await super.submit(submission);
    if (!submission.action.endsWith('/welcome.xhtml')) {
      this.controller.abort(new Error('deadline passed'));
    }
    return page;
  }
}

function query(overrides: Partial<SearchQuery> = {}): SearchQuery {
  return {
    keywords: 'Muster',
    matchMode: MatchMode.ALL,
    stateFilter: [],
    bypassCache: false,
    debug: false,
    ...overrides,
  };
}

describe('SearchOrchestratorService', () => {
  let cache: InMemoryResultCache;
  let transports: FakeTransportFactory;
  let orchestrator: SearchOrchestratorService;

  function build(factory: FakeTransportFactory = new FakeTransportFactory()): void {
    transports = factory;
    const config = new ConfigService({ registry: { portal: { baseUrl: FAKE_PORTAL_URL } } });
    orchestrator = new SearchOrchestratorService(
      cache,
      new PortalSessionFactory(config, transports),
      new RegisterResultExtractor(),
    );
  }

  beforeEach(() => {
    cache = new InMemoryResultCache();
    build();
  });

  it('fetches from the portal on a miss and stores the raw document', async () => {
    const companies = await orchestrator.search(query());

    expect(transports.created).toHaveLength(1);
    expect(cache.entries.get('Muster')).toBe(fixture('results.html'));
    expect(companies.map((c) => c.registerNumber)).toEqual(['HRB 12345 B', 'HRA 999 HB']);
    expect(companies[1].statusNormalized).toBe('IN_LIQUIDATION');
    expect(companies[0].history).toEqual([
      { name: '1.) Muster Gasversorgung GmbH', location: 'Berlin' },
    ]);
  });

  it('serves a cache hit without touching the network', async () => {
    await cache.put('Muster', fixture('results.html'));

    const companies = await orchestrator.search(query());

    expect(transports.created).toHaveLength(0);
    expect(companies).toHaveLength(2);
  });

  it('returns the same companies from the cache as from the portal', async () => {
    const fresh = await orchestrator.search(query({ bypassCache: true }));
    const cached = await orchestrator.search(query());

    expect(transports.created).toHaveLength(1);
    expect(cached).toEqual(fresh);
  });

  it('bypasses and overwrites the cache when forced', async () => {
    await cache.put('Muster', '<html>stale</html>');

    const companies = await orchestrator.search(query({ bypassCache: true }));

    expect(transports.created).toHaveLength(1);
    expect(companies).toHaveLength(2);
    expect(cache.entries.get('Muster')).toBe(fixture('results.html'));
  });

  it('keys the cache by keywords only', async () => {
    await orchestrator.search(query({ matchMode: MatchMode.ALL }));
    await orchestrator.search(query({ matchMode: MatchMode.EXACT }));

    expect(transports.created).toHaveLength(1);
    expect(Array.from(cache.entries.keys())).toEqual(['Muster']);
  });

  it('returns [] when the portal has no results', async () => {
    build(
      new FakeTransportFactory(
        () => new FakePortalTransport(portalPages({ results: fixture('no-results.html') })),
      ),
    );

    await expect(orchestrator.search(query())).resolves.toEqual([]);
  });

  it('does not write the cache when the signal aborts during the last submit', async () => {
    const controller = new AbortController();
    build(new FakeTransportFactory(() => new LateResultsTransport(controller)));

    await expect(orchestrator.search(query(), controller.signal)).rejects.toThrow('deadline passed');
    expect(cache.entries.size).toBe(0);
  });

  it('propagates session failures and writes nothing', async () => {
    build(
      new FakeTransportFactory(
        () => new FakePortalTransport(portalPages({ advancedSearch: '<html><body></body></html>' })),
      ),
    );

    await expect(orchestrator.search(query())).rejects.toBeInstanceOf(UpstreamStructuralError);
    expect(cache.entries.size).toBe(0);
  });
});
