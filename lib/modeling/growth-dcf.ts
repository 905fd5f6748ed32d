import { FinMath } from '@/lib/math';
import { discountSeries } from './discount';
import { InvalidParameterError } from './errors';
import { projectGrowthCashFlows } from './projection';
import { enterpriseValue, netCashEquityValue, perShareValue } from './rollup';
import { computeTerminalValue } from './terminal-value';
import type { DcfConventions, GrowthDcfParameters, ProjectionResult } from './types';
import { assertDiscountExceedsGrowth } from './validation';

export const GROWTH_CONVENTIONS: DcfConventions = Object.freeze({
  strategy: 'growth',
  terminalBase: 'projected',
  terminalDiscountOffset: 0,
  nonPositiveShares: 'zero',
});

const LABELS = { discount: 'WACC', growth: 'terminal growth rate' };

/**
 * DCF from a current FCF and a per-year growth path.
 *
 * Takes the parameter object as given: `createGrowthParameters` is where the
 * construction-time checks live. A share count of zero or less yields a
 * per-share value of 0.
 */
export function computeGrowthDcf(params: GrowthDcfParameters): ProjectionResult {
  const { wacc, terminalGrowthRate } = params;

  assertDiscountExceedsGrowth(wacc, terminalGrowthRate, LABELS.discount, LABELS.growth);

  if (params.growthRates.length === 0) {
    throw new InvalidParameterError(
      'growthRates',
      'Growth rates list cannot be empty. Please set growth rates for projection period.'
    );
  }

  const warnings: string[] = [];
  if (params.currentFcf.lte(0)) {
    const warning =
      'Current FCF is zero or negative. DCF might not be appropriate or projections need careful review.';
    console.warn(`[GrowthDCF] ${warning}`);
    warnings.push(warning);
  }

  const projectedFcf = projectGrowthCashFlows(params.currentFcf, params.growthRates);
  const presentValues = discountSeries(projectedFcf, wacc);

  const { terminalValue, presentValueOfTerminalValue } = computeTerminalValue({
    projectedFcf,
    presentValues,
    discountRate: wacc,
    growthRate: terminalGrowthRate,
    conventions: GROWTH_CONVENTIONS,
    labels: LABELS,
  });

  const enterprise = enterpriseValue(presentValues, presentValueOfTerminalValue);
  const equity = netCashEquityValue(enterprise, params.cashAndEquivalents, params.totalDebt);

  return {
    strategy: 'growth',
    years: projectedFcf.map((freeCashFlow, index) => ({
      year: index + 1,
      freeCashFlow,
      presentValue: presentValues[index],
    })),
    projectedFcf,
    presentValues,
    presentValueOfFcf: FinMath.sum(presentValues),
    terminalValue,
    presentValueOfTerminalValue,
    enterpriseValue: enterprise,
    equityValue: equity,
    perShareValue: perShareValue(equity, params.sharesOutstanding, GROWTH_CONVENTIONS),
    discountRate: wacc,
    terminalGrowthRate,
    warnings,
  };
}
