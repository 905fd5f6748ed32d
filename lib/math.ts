import { Decimal } from 'decimal.js';

export { Decimal };

export const ZERO = new Decimal(0);
export const ONE = new Decimal(1);

/**
 * Converts input to Decimal. Decimal instances pass through untouched.
 */
export function toDecimal(value: Decimal.Value): Decimal {
  if (value instanceof Decimal) return value;
  return new Decimal(value);
}

/**
 * Basic arithmetic operations ensuring Decimal type return
 */
export const FinMath = {
  sum: (values: readonly Decimal[]) => values.reduce((acc, value) => acc.plus(value), ZERO),
  // (1 + rate × step): the linear-in-year growth factor of the statement projection
  linearGrowth: (rate: Decimal.Value, step: number) => ONE.plus(new Decimal(rate).times(step)),
};
