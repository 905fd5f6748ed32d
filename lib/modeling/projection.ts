import { Decimal, FinMath, ONE } from '@/lib/math';
import type { BaseYearInputs } from './statement-inputs';
import type { StatementDrivers, StatementForecastParameters } from './types';

/**
 * Compounds the current FCF by each year's growth rate.
 * FCF[k] = FCF[k-1] × (1 + g[k]), FCF[0] = current FCF.
 */
export function projectGrowthCashFlows(currentFcf: Decimal, growthRates: readonly Decimal[]): Decimal[] {
  const projected: Decimal[] = [];
  let lastFcf = currentFcf;

  for (const rate of growthRates) {
    lastFcf = lastFcf.mul(ONE.plus(rate));
    projected.push(lastFcf);
  }

  return projected;
}

/**
 * Unlevered FCF = EBIT × (1 − t) + D&A + ΔWC + CapEx.
 * ΔWC and CapEx enter with their own sign; CapEx is a negative outflow.
 */
export function unleveredFreeCashFlow(drivers: StatementDrivers, taxRate: Decimal): Decimal {
  return drivers.ebit
    .mul(ONE.minus(taxRate))
    .plus(drivers.nonCashCharges)
    .plus(drivers.changeInWorkingCapital)
    .plus(drivers.capitalExpenditure);
}

export interface StatementProjectionYear {
  year: number;
  drivers: StatementDrivers;
  freeCashFlow: Decimal;
}

/**
 * Rolls the base-year drivers forward. Each year's growth factor is
 * (1 + year × rate), applied to the previous year's running value.
 * D&A follows the earnings growth rate.
 */
export function projectStatementCashFlows(
  base: BaseYearInputs,
  forecast: StatementForecastParameters
): StatementProjectionYear[] {
  const years: StatementProjectionYear[] = [];

  let drivers: StatementDrivers = {
    ebit: base.ebit,
    nonCashCharges: base.nonCashCharges,
    changeInWorkingCapital: base.changeInWorkingCapital,
    capitalExpenditure: base.capitalExpenditure,
  };

  for (let yr = 1; yr <= forecast.forecastPeriod; yr++) {
    const earningsFactor = FinMath.linearGrowth(forecast.earningsGrowthRate, yr);

    drivers = {
      ebit: drivers.ebit.mul(earningsFactor),
      nonCashCharges: drivers.nonCashCharges.mul(earningsFactor),
      changeInWorkingCapital: drivers.changeInWorkingCapital.mul(forecast.workingCapitalDecay),
      capitalExpenditure: drivers.capitalExpenditure.mul(FinMath.linearGrowth(forecast.capExGrowthRate, yr)),
    };

    years.push({
      year: yr,
      drivers,
      freeCashFlow: unleveredFreeCashFlow(drivers, base.taxRate),
    });
  }

  return years;
}
