import { Decimal } from '@/lib/math';
import { ArithmeticDegenerateError, InvalidParameterError } from './errors';

/**
 * Parses a runtime value into a finite Decimal.
 * Accepts Decimal, finite numbers and numeric strings; anything else is null.
 */
export function parseDecimal(value: unknown): Decimal | null {
  if (value instanceof Decimal) return value.isFinite() ? value : null;
  if (typeof value === 'number') return Number.isFinite(value) ? new Decimal(value) : null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '' || !Number.isFinite(Number(trimmed))) return null;
    return new Decimal(trimmed);
  }
  return null;
}

export function requireNumber(value: unknown, field: string, message = `${field} must be a number.`): Decimal {
  const parsed = parseDecimal(value);
  if (parsed === null) {
    throw new InvalidParameterError(field, message);
  }
  return parsed;
}

export function requireNonNegative(value: unknown, field: string, label = field): Decimal {
  const message = `${label} must be a non-negative number.`;
  const parsed = requireNumber(value, field, message);
  if (parsed.lt(0)) {
    throw new InvalidParameterError(field, message);
  }
  return parsed;
}

export function requirePositive(value: unknown, field: string, label = field): Decimal {
  const message = `${label} must be a positive number.`;
  const parsed = requireNumber(value, field, message);
  if (parsed.lte(0)) {
    throw new InvalidParameterError(field, message);
  }
  return parsed;
}

/** 0 < value < 1 */
export function requireOpenUnitInterval(value: unknown, field: string, label = field): Decimal {
  const message = `${label} must be a number between 0 and 1 (exclusive).`;
  const parsed = requireNumber(value, field, message);
  if (parsed.lte(0) || parsed.gte(1)) {
    throw new InvalidParameterError(field, message);
  }
  return parsed;
}

export function requireRateSequence(value: unknown, field: string, label = field): Decimal[] {
  const message = `${label} must be a list of numbers.`;
  if (!Array.isArray(value)) {
    throw new InvalidParameterError(field, message);
  }
  const rates = value.map((rate: unknown) => requireNumber(rate, field, message));
  if (rates.length === 0) {
    throw new InvalidParameterError(
      field,
      `${label} cannot be empty. Please set growth rates for projection period.`
    );
  }
  return rates;
}

export function requirePositiveInteger(value: unknown, field: string, label = field): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new InvalidParameterError(field, `${label} must be a positive integer.`);
  }
  return value;
}

/**
 * The Gordon Growth denominator (r − g) must be positive.
 */
export function assertDiscountExceedsGrowth(
  discountRate: Decimal,
  growthRate: Decimal,
  discountLabel: string,
  growthLabel: string
): void {
  if (discountRate.lte(growthRate)) {
    throw new ArithmeticDegenerateError(
      `${discountLabel} (${discountRate.toString()}) must be greater than the ${growthLabel} ` +
        `(${growthRate.toString()}) for a stable terminal value calculation.`,
      discountLabel
    );
  }
}
