import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { InMemoryKeyValueStore, RateProviderClient } from '@fxrates/rates';
import { createTestApp } from './support/test-app';

describe('Health and metrics (e2e)', () => {
  let app: INestApplication;
  let store: InMemoryKeyValueStore;
  let upstream: jest.Mocked<RateProviderClient>;

  beforeEach(async () => {
    ({ app, store, upstream } = await createTestApp());
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /health', () => {
    it('reports UP while the cache answers', async () => {
      const response = await request(app.getHttpServer()).get('/health').expect(200);

      expect(response.body).toEqual({
        status: 'UP',
        timestamp: expect.any(String),
        checks: { cache: 'up' },
      });
    });

    it('reports DEGRADED when the cache is down', async () => {
      jest.spyOn(store, 'ping').mockResolvedValue(false);

      const response = await request(app.getHttpServer()).get('/health').expect(200);

      expect(response.body).toMatchObject({ status: 'DEGRADED', checks: { cache: 'down' } });
    });
  });

  describe('GET /metrics', () => {
    it('exposes rate pipeline counters in Prometheus text format', async () => {
      upstream.fetchLatestRates.mockResolvedValue({
        rates: { INR: 82.5 },
        timestamp: new Date('2024-05-10T00:00:00.000Z'),
      });
      await request(app.getHttpServer()).get('/v1/latest?base=USD&symbol=INR').expect(200);

      const response = await request(app.getHttpServer()).get('/metrics').expect(200);

      expect(response.headers['content-type']).toMatch(/^text\/plain/);
      expect(response.text).toContain('# TYPE fx_rates_cache_lookups_total counter');
      expect(response.text).toContain('fx_rates_cache_lookups_total{kind="latest",result="miss"} 1');
    });
  });
});
