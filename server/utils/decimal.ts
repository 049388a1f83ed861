const SCALE = 100_000_000n;

export type Decimal = bigint;

export function parseDecimal(value: string): Decimal {
  const raw = String(value).trim();
  if (!raw) {
    throw new Error('decimal_empty');
  }
  const sign = raw.startsWith('-') ? -1n : 1n;
  const normalized = raw.replace(/^[+-]/, '');
  if (!/^\d+(\.\d+)?$/.test(normalized)) {
    throw new Error(`decimal_invalid:${value}`);
  }
  const [wholePart, fracPart = ''] = normalized.split('.');
  const whole = BigInt(wholePart || '0');

  const padded = fracPart.padEnd(8, '0');
  let frac = BigInt(padded.slice(0, 8) || '0');

  if (fracPart.length > 8) {
    const roundDigit = Number(fracPart[8] || '0');
    if (roundDigit >= 5) {
      frac += 1n;
      if (frac >= SCALE) {
        frac = 0n;
        return sign * ((whole + 1n) * SCALE);
      }
    }
  }

  return sign * (whole * SCALE + frac);
}

/** Fixed-point from a float, rounded at the eighth decimal. */
export function decimalFromNumber(value: number): Decimal {
  if (!Number.isFinite(value)) {
    throw new Error(`decimal_invalid:${value}`);
  }
  return parseDecimal(value.toFixed(8));
}

export function decimalToNumber(value: Decimal): number {
  return Number(value) / Number(SCALE);
}

export function mulDecimal(a: Decimal, b: Decimal): Decimal {
  return (a * b) / SCALE;
}
