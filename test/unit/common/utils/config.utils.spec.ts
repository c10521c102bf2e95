import { clampAtLeast, resolveBooleanFlag, resolveNumber } from '@/common/utils/config.utils';

describe('config.utils', () => {
  describe('resolveBooleanFlag', () => {
    it('reads recognized strings case-insensitively', () => {
      expect(resolveBooleanFlag(' TRUE ', false)).toBe(true);
      expect(resolveBooleanFlag('on', false)).toBe(true);
      expect(resolveBooleanFlag('No', true)).toBe(false);
      expect(resolveBooleanFlag('0', true)).toBe(false);
    });

    it('returns booleans as given', () => {
      expect(resolveBooleanFlag(false, true)).toBe(false);
    });

    it('falls back for unknown values', () => {
      expect(resolveBooleanFlag('maybe', true)).toBe(true);
      expect(resolveBooleanFlag(undefined, false)).toBe(false);
      expect(resolveBooleanFlag(1, false)).toBe(false);
    });
  });

  describe('resolveNumber', () => {
    it('uses the fallback for blank values', () => {
      expect(resolveNumber('PORT', undefined, 8080)).toBe(8080);
      expect(resolveNumber('PORT', '  ', 8080)).toBe(8080);
    });

    it('parses numeric strings', () => {
      expect(resolveNumber('PORT', '9090', 8080)).toBe(9090);
    });

    it('throws with the variable name on garbage', () => {
      expect(() => resolveNumber('COMMERCE_TIMEOUT_MS', 'soon', 3000)).toThrow(
        'Invalid number value for COMMERCE_TIMEOUT_MS: soon',
      );
    });
  });

  it('clampAtLeast raises values below the floor', () => {
    expect(clampAtLeast(100, 500)).toBe(500);
    expect(clampAtLeast(750, 500)).toBe(750);
  });
});
