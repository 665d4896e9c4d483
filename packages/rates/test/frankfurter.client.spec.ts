import { Server } from 'http';
import express, { Request, Response } from 'express';
import { Logger } from '@nestjs/common';
import { FrankfurterClient, FrankfurterClientOptions } from '../src/providers/frankfurter.client';
import { UpstreamError } from '../src/errors';
import { RatesMetrics, noopMetrics } from '../src/metrics';

type Handler = (req: Request, res: Response) => void;

function listen(app: express.Express): Promise<Server> {
  return new Promise((resolve) => {
    const server = app.listen(0, '127.0.0.1', () => resolve(server));
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
}

function portOf(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return address.port;
}

describe('FrankfurterClient', () => {
  let server: Server;
  let baseUrl: string;
  let handler: Handler;
  let hits: Array<{ path: string; query: Request['query'] }>;
  let outcomes: string[];

  const metrics: RatesMetrics = {
    ...noopMetrics,
    recordUpstreamRequest: (call, outcome) => {
      outcomes.push(`${call}:${outcome}`);
    },
  };

  function client(overrides: Partial<FrankfurterClientOptions> = {}): FrankfurterClient {
    return new FrankfurterClient(
      { baseUrl, timeoutMs: 2_000, maxRetries: 2, retryBaseDelayMs: 1, ...overrides },
      metrics,
    );
  }

  beforeAll(async () => {
    const app = express();
    app.use((req, res) => {
      hits.push({ path: req.path, query: req.query });
      handler(req, res);
    });
    server = await listen(app);
    baseUrl = `http://127.0.0.1:${portOf(server)}`;
  });

  afterAll(() => close(server));

  beforeEach(() => {
    hits = [];
    outcomes = [];
  });

  afterEach(() => jest.restoreAllMocks());

  describe('fetchLatestRates', () => {
    it('asks for the base and targets and keeps supported numeric rates', async () => {
      handler = (_req, res) => {
        res.json({ amount: 1, base: 'USD', date: '2024-05-10', rates: { INR: 82.5, EUR: 0.92, XAU: 0.0004 } });
      };

      const result = await client().fetchLatestRates('USD', ['INR', 'EUR']);

      expect(result).toEqual({
        rates: { INR: 82.5, EUR: 0.92 },
        timestamp: new Date('2024-05-10T00:00:00.000Z'),
      });
      expect(hits).toEqual([{ path: '/latest', query: { from: 'USD', to: 'INR,EUR' } }]);
      expect(outcomes).toEqual(['latest:success']);
    });

    it('ignores a trailing slash on the base URL', async () => {
      handler = (_req, res) => {
        res.json({ date: '2024-05-10', rates: { JPY: 162.89 } });
      };

      await client({ baseUrl: `${baseUrl}/` }).fetchLatestRates('EUR', ['JPY']);

      expect(hits[0].path).toBe('/latest');
    });

    it('fails at once on a non-2xx answer', async () => {
      handler = (_req, res) => {
        res.status(503).json({ message: 'maintenance' });
      };

      const failure = client().fetchLatestRates('USD', ['INR']);

      await expect(failure).rejects.toBeInstanceOf(UpstreamError);
      await expect(failure).rejects.toMatchObject({
        message: 'upstream latest request failed with HTTP status 503',
        status: 503,
      });
      expect(hits).toHaveLength(1);
      expect(outcomes).toEqual(['latest:failure']);
    });

    it('rejects a body without rates', async () => {
      handler = (_req, res) => {
        res.json({ date: '2024-05-10' });
      };

      await expect(client().fetchLatestRates('USD', ['INR'])).rejects.toThrow(
        'upstream latest response has no rates object',
      );
    });

    it('rejects a body with an unusable date', async () => {
      handler = (_req, res) => {
        res.json({ date: 'today', rates: { INR: 82.5 } });
      };

      await expect(client().fetchLatestRates('USD', ['INR'])).rejects.toThrow(
        'upstream latest response has an invalid date: today',
      );
    });

    it('does not send a request that is already cancelled', async () => {
      handler = (_req, res) => {
        res.json({ date: '2024-05-10', rates: {} });
      };
      const controller = new AbortController();
      controller.abort();

      await expect(client().fetchLatestRates('USD', ['INR'], controller.signal)).rejects.toThrow(
        'upstream latest request was cancelled',
      );
      expect(hits).toHaveLength(0);
    });
  });

  describe('fetchTimeSeriesRates', () => {
    it('requests the range path and keeps numeric rates per day', async () => {
      handler = (_req, res) => {
        res.json({
          amount: 1,
          base: 'EUR',
          start_date: '2024-05-06',
          end_date: '2024-05-07',
          rates: {
            '2024-05-06': { USD: 1.07, JPY: 167.2 },
            '2024-05-07': { USD: 1.08, JPY: 'n/a' },
            '2024-05-08': null,
          },
        });
      };

      const result = await client().fetchTimeSeriesRates(
        new Date('2024-05-06T00:00:00.000Z'),
        new Date('2024-05-07T00:00:00.000Z'),
        'EUR',
        ['USD', 'JPY'],
      );

      expect(result).toEqual({
        base: 'EUR',
        startDate: '2024-05-06',
        endDate: '2024-05-07',
        rates: {
          '2024-05-06': { USD: 1.07, JPY: 167.2 },
          '2024-05-07': { USD: 1.08 },
        },
      });
      expect(hits).toEqual([{ path: '/2024-05-06..2024-05-07', query: { from: 'EUR', to: 'USD,JPY' } }]);
      expect(outcomes).toEqual(['timeseries:success']);
    });

    it('rejects a body that is not an object', async () => {
      handler = (_req, res) => {
        res.json([1, 2, 3]);
      };

      await expect(
        client().fetchTimeSeriesRates(
          new Date('2024-05-06T00:00:00.000Z'),
          new Date('2024-05-06T00:00:00.000Z'),
          'EUR',
          ['USD'],
        ),
      ).rejects.toThrow('upstream timeseries response is not a JSON object');
    });
  });

  describe('transport failures', () => {
    let closedUrl: string;

    beforeAll(async () => {
      const closed = await listen(express());
      closedUrl = `http://127.0.0.1:${portOf(closed)}`;
      await close(closed);
    });

    it('retries with backoff and then fails', async () => {
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

      const failure = client({ baseUrl: closedUrl }).fetchLatestRates('USD', ['INR']);

      await expect(failure).rejects.toBeInstanceOf(UpstreamError);
      await expect(failure).rejects.toMatchObject({ status: undefined });
      expect(warn).toHaveBeenCalledTimes(2);
      expect(warn.mock.calls[0][0]).toContain('retry 1/2 in 1ms');
      expect(warn.mock.calls[1][0]).toContain('retry 2/2 in 2ms');
      expect(outcomes).toEqual(['latest:failure']);
    });

    it('does not retry when retries are disabled', async () => {
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

      await expect(client({ baseUrl: closedUrl, maxRetries: 0 }).fetchLatestRates('USD', ['INR'])).rejects.toThrow(
        /^upstream latest request failed: /,
      );
      expect(warn).not.toHaveBeenCalled();
    });
  });
});
