import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  createMockCredentialProvider,
  createMockTransport,
  createRoutingTransport,
  mockConfig,
  response,
  type MockTransport,
} from '../../__mocks__/index.js';
import { StaticCredentialProvider } from '../../auth/credential-provider.js';
import { ClientError, ErrorKind } from '../../errors/index.js';
import { NoopLogger } from '../../observability/logging.js';
import type { TransportRequest } from '../../transport/http-transport.js';
import { createDescriptor } from '../../types/common.js';
import { createClient, createClientFromEnv, type BrokerageClient } from '../client.js';

const PAGE_2 = 'https://api.test.example/instruments/?cursor=2';

function createTestClient(transport: MockTransport, loggedIn = true): BrokerageClient {
  return createClient({
    config: mockConfig(),
    transport,
    credentialProvider: loggedIn ? createMockCredentialProvider() : undefined,
    logger: new NoopLogger(),
  });
}

function reasonOf(error: unknown): string | undefined {
  return error instanceof ClientError ? error.reason : undefined;
}

describe('BrokerageClient', () => {
  describe('request helpers', () => {
    it('should send a GET with query parameters', async () => {
      const transport = createMockTransport(response(200, { symbol: 'ABC' }));
      const client = createTestClient(transport);

      const result = await client.get('quotes', '/quotes/ABC/', { bounds: 'regular' });

      expect(result).toEqual({ ok: true, value: { symbol: 'ABC' } });
      expect(transport.send.mock.calls[0][0]).toMatchObject({
        method: 'GET',
        path: '/quotes/ABC/',
        params: { bounds: 'regular' },
      });
    });

    it('should send a form-encoded POST without a credential', async () => {
      const transport = createMockTransport(response(200, { access_token: 'test-token', expires_in: 86400 }));
      const client = createTestClient(transport, false);

      const result = await client.post('auth', '/oauth2/token/', { username: 'trader', password: 'test-secret' }, {
        encoding: 'form',
        authenticated: false,
      });

      expect(result.ok).toBe(true);
      const [request] = transport.send.mock.calls[0];
      expect(request.bodyEncoding).toBe('form');
      expect(request.body).toEqual({ username: 'trader', password: 'test-secret' });
      expect(request.headers['Authorization']).toBeUndefined();
    });

    it('should not cache POST requests', async () => {
      const transport = createMockTransport(response(201, { id: 'order-1' }));
      const client = createTestClient(transport);

      await client.post('orders', '/orders/', { symbol: 'ABC', quantity: 1 });
      await client.post('orders', '/orders/', { symbol: 'ABC', quantity: 1 });

      expect(transport.send).toHaveBeenCalledTimes(2);
    });

    it('should cache idempotent POSTs per body', async () => {
      const transport = createMockTransport();
      transport.send.mockImplementation(async (request: TransportRequest) => response(200, { echo: request.body }));
      const client = createTestClient(transport);

      const a = await client.post('quotes', '/marketdata/query/', { symbol: 'AAA' }, { idempotent: true });
      const b = await client.post('quotes', '/marketdata/query/', { symbol: 'BBB' }, { idempotent: true });
      const again = await client.post('quotes', '/marketdata/query/', { symbol: 'AAA' }, { idempotent: true });

      expect(a).toEqual({ ok: true, value: { echo: { symbol: 'AAA' } } });
      expect(b).toEqual({ ok: true, value: { echo: { symbol: 'BBB' } } });
      expect(again).toEqual({ ok: true, value: { echo: { symbol: 'AAA' } } });
      expect(transport.send).toHaveBeenCalledTimes(2);
    });

    it('should send a DELETE', async () => {
      const transport = createMockTransport(response(204));
      const client = createTestClient(transport);

      const result = await client.delete('orders', '/orders/order-1/');

      expect(result).toEqual({ ok: true, value: undefined });
      expect(transport.send.mock.calls[0][0].method).toBe('DELETE');
    });

    it('should shape execute results with a schema', async () => {
      const transport = createMockTransport(response(200, { symbol: 'ABC', tradeable: true }));
      const client = createTestClient(transport);
      const schema = z.object({ symbol: z.string(), tradeable: z.boolean() });

      const result = await client.execute(
        createDescriptor({ method: 'GET', group: 'instruments', path: '/instruments/ABC/' }),
        { parse: body => schema.parse(body) }
      );

      expect(result).toEqual({ ok: true, value: { symbol: 'ABC', tradeable: true } });
    });

    it('should run many descriptors in input order', async () => {
      const transport = createRoutingTransport({
        '/instruments/A/': response(200, { symbol: 'A' }),
        '/instruments/C/': response(200, { symbol: 'C' }),
      });
      const client = createTestClient(transport);

      const results = await client.executeAll(
        ['A', 'B', 'C'].map(symbol =>
          createDescriptor({ method: 'GET', group: 'instruments', path: `/instruments/${symbol}/` })
        )
      );

      expect(results[0]).toEqual({ ok: true, value: { symbol: 'A' } });
      expect(results[1].ok).toBe(false);
      expect(results[2]).toEqual({ ok: true, value: { symbol: 'C' } });
    });
  });

  describe('list responses', () => {
    it('should return the results list', async () => {
      const transport = createMockTransport(response(200, { results: [{ symbol: 'ABC' }, { symbol: 'XYZ' }] }));
      const client = createTestClient(transport);

      const result = await client.getResults('quotes', '/quotes/', { symbols: 'ABC,XYZ' });

      expect(result).toEqual({ ok: true, value: [{ symbol: 'ABC' }, { symbol: 'XYZ' }] });
    });

    it('should reject a body without a results list', async () => {
      const transport = createMockTransport(response(200, { symbol: 'ABC' }));
      const client = createTestClient(transport);

      const result = await client.getResults('accounts', '/accounts/');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Response for /accounts/ has no results list');
        expect(reasonOf(result.error)).toBe('invalid_response');
      }
    });

    it('should return the first result, or undefined for an empty list', async () => {
      const transport = createRoutingTransport({
        '/accounts/': response(200, { results: [{ account_number: 'ACC-1' }, { account_number: 'ACC-2' }] }),
        '/positions/': response(200, { results: [] }),
      });
      const client = createTestClient(transport);

      expect(await client.getFirst('accounts', '/accounts/')).toEqual({ ok: true, value: { account_number: 'ACC-1' } });
      expect(await client.getFirst('positions', '/positions/')).toEqual({ ok: true, value: undefined });
    });
  });

  describe('getAllPages', () => {
    it('should follow next links and concatenate results', async () => {
      const transport = createRoutingTransport({
        '/instruments/': response(200, { results: [{ symbol: 'A' }], next: PAGE_2 }),
        [PAGE_2]: response(200, { results: [{ symbol: 'B' }], next: null }),
      });
      const client = createTestClient(transport);

      const result = await client.getAllPages('instruments', '/instruments/', { active: true });

      expect(result).toEqual({ ok: true, value: [{ symbol: 'A' }, { symbol: 'B' }] });
      expect(transport.send.mock.calls[0][0].params).toEqual({ active: true });
      expect(transport.send.mock.calls[1][0].path).toBe(PAGE_2);
      expect(transport.send.mock.calls[1][0].params).toBeUndefined();
    });

    it('should fail the walk when a page fails', async () => {
      const transport = createRoutingTransport({
        '/instruments/': response(200, { results: [{ symbol: 'A' }], next: PAGE_2 }),
      });
      const client = createTestClient(transport);

      const result = await client.getAllPages('instruments', '/instruments/');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(ErrorKind.ClientError);
        expect(reasonOf(result.error)).toBe('not_found');
      }
    });

    it('should stop when a next link loops back', async () => {
      const transport = createRoutingTransport({
        '/instruments/': response(200, { results: [{ symbol: 'A' }], next: PAGE_2 }),
        [PAGE_2]: response(200, { results: [{ symbol: 'B' }], next: PAGE_2 }),
      });
      const client = createTestClient(transport);

      const result = await client.getAllPages('instruments', '/instruments/');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(`Pagination of /instruments/ loops back to ${PAGE_2}`);
      }
    });

    it('should stop after maxPages', async () => {
      const transport = createRoutingTransport({
        '/instruments/': response(200, { results: [{ symbol: 'A' }], next: PAGE_2 }),
        [PAGE_2]: response(200, { results: [{ symbol: 'B' }], next: null }),
      });
      const client = createTestClient(transport);

      const result = await client.getAllPages('instruments', '/instruments/', undefined, { maxPages: 1 });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Pagination of /instruments/ exceeded 1 pages');
      }
      expect(transport.send).toHaveBeenCalledTimes(1);
    });
  });

  describe('login state', () => {
    it('should refuse authenticated calls until logged in', async () => {
      const transport = createMockTransport(response(200, { results: [] }));
      const client = createTestClient(transport, false);

      const refused = await client.get('accounts', '/accounts/');
      expect(refused.ok).toBe(false);
      if (!refused.ok) {
        expect(reasonOf(refused.error)).toBe('not_logged_in');
        expect(refused.error.message).toBe('GET /accounts/ can only be called when logged in');
      }

      client.login(createMockCredentialProvider());
      expect(client.isLoggedIn()).toBe(true);
      expect((await client.get('accounts', '/accounts/')).ok).toBe(true);

      client.logout();
      expect(client.isLoggedIn()).toBe(false);
    });

    it('should not serve one account the cached responses of another', async () => {
      const transport = createMockTransport();
      transport.send.mockImplementation(async (request: TransportRequest) =>
        response(200, { owner: request.headers['Authorization'] })
      );
      const client = createClient({
        config: mockConfig(),
        transport,
        credentialProvider: new StaticCredentialProvider('alice'),
        logger: new NoopLogger(),
      });

      const first = await client.get('accounts', '/accounts/');
      client.logout();
      client.login(new StaticCredentialProvider('bob'));
      const second = await client.get('accounts', '/accounts/');

      expect(first).toEqual({ ok: true, value: { owner: 'Bearer alice' } });
      expect(second).toEqual({ ok: true, value: { owner: 'Bearer bob' } });
      expect(transport.send).toHaveBeenCalledTimes(2);
    });
  });

  describe('configuration', () => {
    it('should expose a frozen copy of the resolved configuration', () => {
      const client = createTestClient(createMockTransport());

      const config = client.getConfig();

      expect(Object.isFrozen(config)).toBe(true);
      expect(config.baseUrl).toBe('https://api.test.example');
      expect(config.cache.capacity).toBe(500);
    });

    it('should share its limiter, breakers and cache', async () => {
      const transport = createMockTransport(response(200, { symbol: 'ABC' }));
      const client = createTestClient(transport);

      await client.get('quotes', '/quotes/ABC/');

      expect(client.getRateLimiter().getRemaining('quotes')).toBe(99);
      expect(client.getCircuitBreakers().get('quotes').getState()).toBe('closed');
      expect(client.getCache().size).toBe(1);
    });
  });
});

describe('createClientFromEnv', () => {
  it('should configure and log in from the environment', async () => {
    const transport = createMockTransport(response(200, { results: [] }));

    const client = createClientFromEnv(
      { transport, logger: new NoopLogger() },
      {
        BROKERAGE_BASE_URL: 'https://api.test.example',
        BROKERAGE_ACCESS_TOKEN: 'test-token',
        BROKERAGE_MAX_ATTEMPTS: '2',
      }
    );

    expect(client.isLoggedIn()).toBe(true);
    expect(client.getConfig().retry.maxAttempts).toBe(2);

    await client.get('accounts', '/accounts/');
    expect(transport.send.mock.calls[0][0].headers['Authorization']).toBe('Bearer test-token');
  });

  it('should stay logged out without a token', () => {
    const client = createClientFromEnv({ transport: createMockTransport(), logger: new NoopLogger() }, {});

    expect(client.isLoggedIn()).toBe(false);
  });
});
