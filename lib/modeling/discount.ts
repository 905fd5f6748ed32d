import { Decimal, ONE } from '@/lib/math';

export function discountFactor(rate: Decimal, period: number): Decimal {
  return ONE.plus(rate).pow(period);
}

export function presentValue(amount: Decimal, rate: Decimal, period: number): Decimal {
  return amount.div(discountFactor(rate, period));
}

/**
 * Discounts a yearly series; the flow at index i belongs to year i + 1.
 */
export function discountSeries(flows: readonly Decimal[], rate: Decimal): Decimal[] {
  return flows.map((flow, index) => presentValue(flow, rate, index + 1));
}
