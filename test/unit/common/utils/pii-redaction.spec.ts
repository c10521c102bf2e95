import { maskEmail, redactSensitiveData } from '@/common/utils/pii-redaction';

describe('pii-redaction', () => {
  it('redacts credentials and masks emails', () => {
    const redacted = redactSensitiveData({
      customer_email: 'jane@example.com',
      api_key: 'test-api-key',
      authorization: 'Bearer test-token',
      note: 'sent Basic dGVzdDp0ZXN0',
      emails: ['ann@example.org'],
      upstream: {
        userKey: 'test-user-key',
        password: 'test-password',
        appSecret: 'test-secret',
      },
    });

    expect(redacted).toEqual({
      customer_email: 'j***@example.com',
      api_key: '[REDACTED]',
      authorization: '[REDACTED]',
      note: 'sent Basic [REDACTED]',
      emails: ['a***@example.org'],
      upstream: {
        userKey: '[REDACTED]',
        password: '[REDACTED]',
        appSecret: '[REDACTED]',
      },
    });
  });

  it('keeps non-sensitive values intact', () => {
    const redacted = redactSensitiveData({
      event: 'order_lookup_completed',
      request_id: 'req-1',
      outcome: 'found',
      details: { status_code: 503 },
    });

    expect(redacted).toEqual({
      event: 'order_lookup_completed',
      request_id: 'req-1',
      outcome: 'found',
      details: { status_code: 503 },
    });
  });

  it('marks circular references', () => {
    const meta: Record<string, unknown> = { event: 'loop' };
    meta.self = meta;

    expect(redactSensitiveData(meta)).toEqual({ event: 'loop', self: '[CIRCULAR]' });
  });

  it('maskEmail redacts values that are not emails', () => {
    expect(maskEmail('not-an-email')).toBe('[REDACTED]');
    expect(maskEmail(null)).toBe('[REDACTED]');
    expect(maskEmail(' Jane@Example.com ')).toBe('J***@Example.com');
  });
});
