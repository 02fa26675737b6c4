import { describe, expect, it } from 'vitest';

import { parseDecimalAmount, parseMinorUnits } from './amount.util';

describe('parseMinorUnits', (): void => {
  it('converts hex nano amounts', (): void => {
    expect(parseMinorUnits('0x3b9aca00', 9)).toBe(1);
    expect(parseMinorUnits('0x0', 9)).toBe(0);
  });

  it('converts negative hex deltas', (): void => {
    expect(parseMinorUnits('-0x77359400', 9)).toBe(-2);
  });

  it('converts decimal nano amounts with fractions', (): void => {
    expect(parseMinorUnits('1500000000', 9)).toBe(1.5);
  });

  it('keeps precision for amounts above the safe integer range', (): void => {
    expect(parseMinorUnits('123456789000000000', 9)).toBe(123456789);
  });

  it('rejects non-numeric input', (): void => {
    expect(parseMinorUnits('0xzz', 9)).toBeNull();
    expect(parseMinorUnits('12.5', 9)).toBeNull();
    expect(parseMinorUnits('', 9)).toBeNull();
  });
});

describe('parseDecimalAmount', (): void => {
  it('parses decimal token amounts', (): void => {
    expect(parseDecimalAmount('250.75')).toBe(250.75);
    expect(parseDecimalAmount(' 42 ')).toBe(42);
  });

  it('rejects malformed values', (): void => {
    expect(parseDecimalAmount('1e5')).toBeNull();
    expect(parseDecimalAmount('abc')).toBeNull();
  });
});
