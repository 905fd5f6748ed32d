import { Decimal, ONE } from '@/lib/math';
import { presentValue } from './discount';
import type { DcfConventions } from './types';
import { assertDiscountExceedsGrowth } from './validation';

export interface TerminalValue {
  terminalValue: Decimal;
  presentValueOfTerminalValue: Decimal;
}

/**
 * Gordon Growth Model: TV = base × (1 + g) / (r − g).
 */
export function gordonGrowthValue(
  baseFlow: Decimal,
  discountRate: Decimal,
  growthRate: Decimal,
  labels: { discount: string; growth: string } = { discount: 'Discount rate', growth: 'terminal growth rate' }
): Decimal {
  assertDiscountExceedsGrowth(discountRate, growthRate, labels.discount, labels.growth);
  return baseFlow.mul(ONE.plus(growthRate)).div(discountRate.minus(growthRate));
}

export function computeTerminalValue(params: {
  projectedFcf: readonly Decimal[];
  presentValues: readonly Decimal[];
  discountRate: Decimal;
  growthRate: Decimal;
  conventions: DcfConventions;
  labels?: { discount: string; growth: string };
}): TerminalValue {
  const { projectedFcf, presentValues, discountRate, growthRate, conventions, labels } = params;

  const series = conventions.terminalBase === 'projected' ? projectedFcf : presentValues;
  const baseFlow = series[series.length - 1];

  const terminalValue = gordonGrowthValue(baseFlow, discountRate, growthRate, labels);
  const presentValueOfTerminalValue = presentValue(
    terminalValue,
    discountRate,
    projectedFcf.length + conventions.terminalDiscountOffset
  );

  return { terminalValue, presentValueOfTerminalValue };
}
