import {
  normalizeOrderIdentifier,
  parseOrderNumber,
} from '@/modules/order-lookup/domain/order-identifier';

const DEFAULT_PATTERN = /^\d{4,6}$/;

describe('normalizeOrderIdentifier', () => {
  it('accepts identifiers matching the pattern', () => {
    expect(normalizeOrderIdentifier('40500', DEFAULT_PATTERN)).toEqual({
      ok: true,
      identifier: { raw: '40500', canonical: '40500', orderNumber: 40500 },
    });
  });

  it('matches after trimming but keeps the raw form', () => {
    expect(normalizeOrderIdentifier(' 40500 ', DEFAULT_PATTERN)).toEqual({
      ok: true,
      identifier: { raw: ' 40500 ', canonical: '40500', orderNumber: 40500 },
    });
  });

  it('rejects identifiers outside the pattern', () => {
    for (const raw of ['abc', '123', '1234567', '', '40 500', '#40500']) {
      expect(normalizeOrderIdentifier(raw, DEFAULT_PATTERN)).toEqual({
        ok: false,
        code: 'invalid_identifier',
      });
    }
  });

  it('strips a leading # when the configured pattern allows it', () => {
    expect(normalizeOrderIdentifier('#40500', /^#?\d{4,6}$/)).toEqual({
      ok: true,
      identifier: { raw: '#40500', canonical: '40500', orderNumber: 40500 },
    });
  });

  it('rejects pattern matches that are not integers', () => {
    expect(normalizeOrderIdentifier('ab12', /^\w{4}$/)).toEqual({
      ok: false,
      code: 'invalid_identifier',
    });
  });
});

describe('parseOrderNumber', () => {
  it('reads integers and digit strings', () => {
    expect(parseOrderNumber(40500)).toBe(40500);
    expect(parseOrderNumber(' 0042 ')).toBe(42);
  });

  it('rejects everything else', () => {
    expect(parseOrderNumber(-1)).toBeUndefined();
    expect(parseOrderNumber(4.5)).toBeUndefined();
    expect(parseOrderNumber('4.5')).toBeUndefined();
    expect(parseOrderNumber('-3')).toBeUndefined();
    expect(parseOrderNumber(null)).toBeUndefined();
    expect(parseOrderNumber('99999999999999999999')).toBeUndefined();
  });
});
