import { ConfigService } from '@nestjs/config';
import { MatchMode } from '../../domain/enums/match-mode.enum';
import { PipelineTimeoutError } from '../../domain/errors/registry.errors';
import { PortalSessionFactory } from '../../infrastructure/portal/portal-session.factory';
import { RegisterResultExtractor } from '../../infrastructure/adapters/register-result-extractor.adapter';
import {
  FAKE_PORTAL_URL,
  FakeTransportFactory,
  HangingPortalTransport,
  InMemoryResultCache,
} from '../../../test/helpers/fake-portal';
import { BoundedSearchService } from './bounded-search.service';
import { SearchOrchestratorService } from './search-orchestrator.service';

const QUERY = {
  keywords: 'Muster',
  matchMode: MatchMode.ALL,
  stateFilter: [],
  bypassCache: false,
  debug: false,
};

function boundedSearch(transports: FakeTransportFactory, cache = new InMemoryResultCache()) {
  const config = new ConfigService({
    registry: { requestTimeoutSeconds: 0.05, portal: { baseUrl: FAKE_PORTAL_URL } },
  });
  const orchestrator = new SearchOrchestratorService(
    cache,
    new PortalSessionFactory(config, transports),
    new RegisterResultExtractor(),
  );
  return new BoundedSearchService(orchestrator, config);
}

describe('BoundedSearchService', () => {
  it('returns results within the deadline', async () => {
    const service = boundedSearch(new FakeTransportFactory());
    await expect(service.search(QUERY)).resolves.toHaveLength(2);
  });

  it('fails with a timeout error instead of an empty result', async () => {
    const service = boundedSearch(new FakeTransportFactory(() => new HangingPortalTransport()));

    const outcome = service.search(QUERY);

    await expect(outcome).rejects.toBeInstanceOf(PipelineTimeoutError);
    await expect(outcome).rejects.toThrow('Request exceeded timeout of 0.05 seconds');
  });

  it('does not cache a timed-out search', async () => {
    const cache = new InMemoryResultCache();
    const service = boundedSearch(
      new FakeTransportFactory(() => new HangingPortalTransport()),
      cache,
    );

    await expect(service.search(QUERY)).rejects.toBeInstanceOf(PipelineTimeoutError);
    expect(cache.entries.size).toBe(0);
  });
});
