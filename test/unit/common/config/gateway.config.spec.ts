import { validateEnv } from '@/common/config/env.validation';
import { buildGatewayConfig } from '@/common/config/gateway.config';

describe('buildGatewayConfig', () => {
  it('builds a frozen config grouped by concern', () => {
    const config = buildGatewayConfig(
      validateEnv({
        API_KEY: 'test-secret',
        COMMERCE_BASE_URL: 'https://commerce.test/v1/',
        TRACKING_BASE_URL: 'https://tracking.test/api//',
        TRACKING_ENABLED: 'true',
        TRACKING_API_KEY: 'test-tracking-key',
        SUPPORT_CONTACT: 'help@example.com',
      }),
    );

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.commerce)).toBe(true);
    expect(config.apiKey).toBe('test-secret');
    expect(config.supportContact).toBe('help@example.com');
    expect(config.mode).toBe('commerce');
    expect(config.commerce.baseUrl).toBe('https://commerce.test/v1');
    expect(config.tracking).toEqual({
      enabled: true,
      baseUrl: 'https://tracking.test/api',
      apiKey: 'test-tracking-key',
      userKey: undefined,
      password: undefined,
      customerNo: undefined,
      timeoutMs: 3000,
    });
    expect(config.ipAllowlist).toEqual({
      enforced: true,
      allowedIps: ['34.228.46.223', '34.230.166.144'],
    });
  });

  it('compiles the order identifier pattern', () => {
    const config = buildGatewayConfig(validateEnv({}));

    expect(config.orderIdPattern.test('40500')).toBe(true);
    expect(config.orderIdPattern.test('#40500')).toBe(false);
    expect(config.orderIdPattern.test('123')).toBe(false);
  });
});
