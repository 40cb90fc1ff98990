const DECIMAL_PATTERN = /^[+-]?\d+(\.\d+)?$/;

/**
 * Convert a decimal amount in whole currency units ("1.50", "1,50", 1.5)
 * to integer cents. Returns NaN for anything that is not a plain decimal,
 * so class-validator's @IsInt() rejects it.
 */
export function toCents(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.round(value * 100) : NaN;
  }
  if (typeof value !== 'string') {
    return NaN;
  }

  const normalized = value.trim().replace(',', '.');
  if (!DECIMAL_PATTERN.test(normalized)) {
    return NaN;
  }

  return Math.round(Number(normalized) * 100);
}

/**
 * Format cents as a decimal string with two fraction digits, e.g. -150 -> "-1.50"
 */
export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const absolute = Math.abs(cents);
  const whole = Math.floor(absolute / 100);
  const fraction = String(absolute % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}
