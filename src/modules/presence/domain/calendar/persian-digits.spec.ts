import { describe, it, expect } from 'vitest';
import { toAsciiDigits, toPersianDigits } from './persian-digits';

describe('Persian digits', () => {
  it('should transliterate every ASCII digit', () => {
    expect(toPersianDigits('0123456789')).toBe('۰۱۲۳۴۵۶۷۸۹');
  });

  it('should leave other characters untouched', () => {
    expect(toPersianDigits('2:45 مجموع')).toBe('۲:۴۵ مجموع');
  });

  it('should transliterate Persian digits back to ASCII', () => {
    expect(toAsciiDigits('۰:۴۸')).toBe('0:48');
    expect(toAsciiDigits('۱۲:۰۰:۰۵')).toBe('12:00:05');
  });

  it('should accept mixed digit sets', () => {
    expect(toAsciiDigits('1۲3')).toBe('123');
  });
});
