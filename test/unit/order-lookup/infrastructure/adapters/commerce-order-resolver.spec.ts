import { CommerceClient } from '@/modules/order-lookup/infrastructure/adapters/commerce-http/commerce-client';
import { SearchInlineOrderResolver } from '@/modules/order-lookup/infrastructure/adapters/commerce-http/search-inline.order-resolver';
import { SearchThenDetailOrderResolver } from '@/modules/order-lookup/infrastructure/adapters/commerce-http/search-then-detail.order-resolver';
import { PrometheusMetricsAdapter } from '@/modules/order-lookup/infrastructure/adapters/metrics/prometheus-metrics.adapter';
import {
  buildCommerceOrder,
  buildTestConfig,
  commerceRoutes,
  commerceUrl,
  type FakeRoute,
  installFetchRoutes,
  requestUrl,
  toResponse,
} from '../../../../fixtures/order-lookup/gateway.fixtures';

describe('commerce order resolvers', () => {
  const originalFetch = global.fetch;

  afterEach(() => {
    jest.restoreAllMocks();
    global.fetch = originalFetch;
  });

  function buildResolvers(overrides: Record<string, string> = {}) {
    const metrics = new PrometheusMetricsAdapter();
    const client = new CommerceClient(buildTestConfig(overrides), metrics);

    return {
      metrics,
      client,
      searchThenDetail: new SearchThenDetailOrderResolver(client),
      searchInline: new SearchInlineOrderResolver(client),
    };
  }

  describe('SearchThenDetailOrderResolver', () => {
    it('resolves an order owned by the customer in three calls', async () => {
      const fetchMock = installFetchRoutes(commerceRoutes());
      const { searchThenDetail } = buildResolvers();

      const result = await searchThenDetail.resolveOrder({
        requestId: 'req-1',
        orderNumber: 40500,
        customerEmail: 'jane@example.com',
      });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.order.customerId).toBe('cust-1');
        expect(result.order.lineItems).toEqual([
          { title: 'Wine A', quantity: 2 },
          { title: 'Wine B', quantity: 1 },
        ]);
      }
      expect(fetchMock.mock.calls.map(([input]) => String(input))).toEqual([
        commerceUrl('/orders?q=40500'),
        commerceUrl('/orders/ord-1'),
        commerceUrl('/customers/cust-1'),
      ]);
    });

    it('authenticates with basic credentials and the tenant header', async () => {
      const fetchMock = installFetchRoutes(commerceRoutes());
      const { searchThenDetail } = buildResolvers();

      await searchThenDetail.resolveOrder({
        requestId: 'req-1',
        orderNumber: 40500,
        customerEmail: 'jane@example.com',
      });

      const init = fetchMock.mock.calls[0][1];
      expect(init?.method).toBe('GET');
      expect(init?.headers).toEqual({
        Accept: 'application/json',
        Authorization: `Basic ${Buffer.from('test-app:test-secret').toString('base64')}`,
        tenant: 'test-tenant',
      });
    });

    it('makes no call without a customer email', async () => {
      const fetchMock = installFetchRoutes(commerceRoutes());
      const { searchThenDetail } = buildResolvers();

      const result = await searchThenDetail.resolveOrder({
        requestId: 'req-1',
        orderNumber: 40500,
      });

      expect(result).toEqual({ ok: false, reason: 'missing_email' });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('rejects a customer whose emails do not match', async () => {
      installFetchRoutes(commerceRoutes({ customerEmails: ['someone@example.com'] }));
      const { searchThenDetail } = buildResolvers();

      const result = await searchThenDetail.resolveOrder({
        requestId: 'req-1',
        orderNumber: 40500,
        customerEmail: 'jane@example.com',
      });

      expect(result).toEqual({ ok: false, reason: 'email_mismatch' });
    });

    it('treats a search without an exact match as not found', async () => {
      installFetchRoutes({
        [commerceUrl('/orders?q=40500')]: {
          status: 200,
          body: { orders: [{ id: 'ord-2', orderNumber: 405001 }] },
        },
      });
      const { searchThenDetail } = buildResolvers();

      const result = await searchThenDetail.resolveOrder({
        requestId: 'req-1',
        orderNumber: 40500,
        customerEmail: 'jane@example.com',
      });

      expect(result).toEqual({ ok: false, reason: 'no_exact_match' });
    });

    it('reports a failed search and counts the upstream error', async () => {
      installFetchRoutes({
        [commerceUrl('/orders?q=40500')]: { status: 503, body: 'upstream down' },
      });
      const { searchThenDetail, metrics } = buildResolvers();

      const result = await searchThenDetail.resolveOrder({
        requestId: 'req-1',
        orderNumber: 40500,
        customerEmail: 'jane@example.com',
      });

      expect(result).toEqual({ ok: false, reason: 'search_failed' });
      expect(metrics.renderPrometheus()).toContain(
        'order_lookup_upstream_calls_total{system="commerce",result="error"} 1',
      );
    });

    it('reports a missing order detail', async () => {
      const routes = commerceRoutes();
      routes[commerceUrl('/orders/ord-1')] = { status: 404 };
      installFetchRoutes(routes);
      const { searchThenDetail } = buildResolvers();

      const result = await searchThenDetail.resolveOrder({
        requestId: 'req-1',
        orderNumber: 40500,
        customerEmail: 'jane@example.com',
      });

      expect(result).toEqual({ ok: false, reason: 'detail_unavailable' });
    });

    it('reports an order without a customer link', async () => {
      installFetchRoutes(commerceRoutes({ order: buildCommerceOrder({ customerId: null }) }));
      const { searchThenDetail } = buildResolvers();

      const result = await searchThenDetail.resolveOrder({
        requestId: 'req-1',
        orderNumber: 40500,
        customerEmail: 'jane@example.com',
      });

      expect(result).toEqual({ ok: false, reason: 'missing_customer_link' });
    });

    it.each<[string, FakeRoute]>([
      ['a server error', { status: 500, body: { error: 'boom' } }],
      ['a missing customer', { status: 404 }],
    ])('fails closed when the customer fetch returns %s', async (_label, route) => {
      const routes = commerceRoutes();
      routes[commerceUrl('/customers/cust-1')] = route;
      const fetchMock = installFetchRoutes(routes);
      const { searchThenDetail } = buildResolvers();

      const result = await searchThenDetail.resolveOrder({
        requestId: 'req-1',
        orderNumber: 40500,
        customerEmail: 'jane@example.com',
      });

      expect(result).toEqual({ ok: false, reason: 'customer_unavailable' });
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('fails closed when the customer fetch hits a network error', async () => {
      const routes = commerceRoutes();
      const fetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>(async (input) => {
        const url = requestUrl(input);
        if (url === commerceUrl('/customers/cust-1')) {
          throw new TypeError('fetch failed');
        }
        return toResponse(routes[url] ?? { status: 404 });
      });
      global.fetch = fetchMock;
      const { searchThenDetail } = buildResolvers();

      const result = await searchThenDetail.resolveOrder({
        requestId: 'req-1',
        orderNumber: 40500,
        customerEmail: 'jane@example.com',
      });

      expect(result).toEqual({ ok: false, reason: 'customer_unavailable' });
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('treats a network failure as a failed search', async () => {
      global.fetch = jest
        .fn<Promise<Response>, Parameters<typeof fetch>>()
        .mockRejectedValue(new TypeError('fetch failed'));
      const { searchThenDetail } = buildResolvers();

      const result = await searchThenDetail.resolveOrder({
        requestId: 'req-1',
        orderNumber: 40500,
        customerEmail: 'jane@example.com',
      });

      expect(result).toEqual({ ok: false, reason: 'search_failed' });
    });

    it('does not call the order system without credentials', async () => {
      const fetchMock = installFetchRoutes(commerceRoutes());
      const { searchThenDetail } = buildResolvers({ COMMERCE_APP_SECRET: '' });

      const result = await searchThenDetail.resolveOrder({
        requestId: 'req-1',
        orderNumber: 40500,
        customerEmail: 'jane@example.com',
      });

      expect(result).toEqual({ ok: false, reason: 'search_failed' });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('SearchInlineOrderResolver', () => {
    it('reads the order from the search entry in two calls', async () => {
      const fetchMock = installFetchRoutes({
        [commerceUrl('/orders?q=40500')]: {
          status: 200,
          body: { orders: [buildCommerceOrder()] },
        },
        [commerceUrl('/customers/cust-1')]: {
          status: 200,
          body: { emails: ['jane@example.com'] },
        },
      });
      const { searchInline } = buildResolvers();

      const result = await searchInline.resolveOrder({
        requestId: 'req-1',
        orderNumber: 40500,
        customerEmail: ' Jane@Example.com ',
      });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.order.fulfillmentStatus).toBe('Fulfilled');
        expect(result.order.shippingStatus).toBe('Delivered');
      }
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });
  });
});

describe('CommerceClient', () => {
  const originalFetch = global.fetch;

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('classifies a timeout', async () => {
    global.fetch = jest.fn<Promise<Response>, Parameters<typeof fetch>>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const error = new Error('The operation was aborted');
            error.name = 'AbortError';
            reject(error);
          });
        }),
    );
    const client = new CommerceClient(
      buildTestConfig({ COMMERCE_TIMEOUT_MS: '500' }),
      new PrometheusMetricsAdapter(),
    );

    await expect(client.getJson('/orders?q=40500', 'req-1')).resolves.toEqual({
      status: 'error',
      errorCode: 'timeout',
      statusCode: 0,
    });
  });

  it('treats a non-JSON success body as no data', async () => {
    installFetchRoutes({ [commerceUrl('/customers/cust-1')]: { status: 200, body: '<html>' } });
    const client = new CommerceClient(buildTestConfig(), new PrometheusMetricsAdapter());

    await expect(client.getJson('/customers/cust-1', 'req-1')).resolves.toEqual({
      status: 'no_data',
    });
  });
});
