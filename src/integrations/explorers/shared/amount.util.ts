const HEX_PATTERN: RegExp = /^(-)?0x([0-9a-f]+)$/i;
const INTEGER_PATTERN: RegExp = /^-?\d+$/;
const DECIMAL_PATTERN: RegExp = /^-?\d+(?:\.\d+)?$/;

export const UNKNOWN_ADDRESS: string = 'unknown';

/**
 * Converts an integer amount in the smallest unit (hex `0x…` or decimal digits, optionally
 * negative) into token units. Returns null for anything else.
 */
export const parseMinorUnits = (raw: string, decimals: number): number | null => {
  const trimmed: string = raw.trim();
  let minorUnits: bigint;

  const hexMatch: RegExpMatchArray | null = HEX_PATTERN.exec(trimmed);

  if (hexMatch !== null) {
    const magnitude: bigint = BigInt(`0x${hexMatch[2] ?? '0'}`);
    minorUnits = hexMatch[1] === '-' ? -magnitude : magnitude;
  } else if (INTEGER_PATTERN.test(trimmed)) {
    minorUnits = BigInt(trimmed);
  } else {
    return null;
  }

  const divisor: bigint = 10n ** BigInt(decimals);
  const whole: bigint = minorUnits / divisor;
  const fraction: bigint = minorUnits % divisor;

  return Number(whole) + Number(fraction) / Number(divisor);
};

export const parseDecimalAmount = (raw: string): number | null => {
  const trimmed: string = raw.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }

  const value: number = Number(trimmed);
  return Number.isFinite(value) ? value : null;
};
