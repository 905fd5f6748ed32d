import { FinMath } from '@/lib/math';
import { ENTERPRISE_VALUE_ITEMS } from '@/lib/statements/line-items';
import { discountSeries } from './discount';
import { projectStatementCashFlows } from './projection';
import { enterpriseValue, perShareValue, statementEquityValue } from './rollup';
import { extractBaseYearInputs, readLineItem } from './statement-inputs';
import { computeTerminalValue } from './terminal-value';
import type { DcfConventions, ProjectionResult, StatementDcfParameters, ValuationOptions } from './types';
import { assertDiscountExceedsGrowth } from './validation';

/**
 * The terminal value grows the final year's discounted flow and is discounted
 * one year beyond the forecast horizon.
 */
export const STATEMENT_CONVENTIONS: DcfConventions = Object.freeze({
  strategy: 'statement',
  terminalBase: 'discounted',
  terminalDiscountOffset: 1,
  nonPositiveShares: 'throw',
});

const LABELS = { discount: 'Discount rate', growth: 'perpetual growth rate' };

function calendarLabel(baseDate: string, year: number): string | undefined {
  const baseYear = Number.parseInt(baseDate.slice(0, 4), 10);
  return Number.isNaN(baseYear) ? undefined : String(baseYear + year);
}

/**
 * DCF from financial statements: derives the base year from the statement
 * records, projects unlevered FCF and nets the enterprise-value statement's
 * debt and cash entries.
 */
export async function computeStatementDcf(
  params: StatementDcfParameters,
  options: ValuationOptions = {}
): Promise<ProjectionResult> {
  const { forecast, statements } = params;

  assertDiscountExceedsGrowth(forecast.discountRate, forecast.perpetualGrowthRate, LABELS.discount, LABELS.growth);

  const base = await extractBaseYearInputs(statements, options.manualInput);
  const projection = projectStatementCashFlows(base, forecast);

  const projectedFcf = projection.map((year) => year.freeCashFlow);
  const presentValues = discountSeries(projectedFcf, forecast.discountRate);

  const { terminalValue, presentValueOfTerminalValue } = computeTerminalValue({
    projectedFcf,
    presentValues,
    discountRate: forecast.discountRate,
    growthRate: forecast.perpetualGrowthRate,
    conventions: STATEMENT_CONVENTIONS,
    labels: LABELS,
  });

  const evStatement = statements.enterpriseValue;
  const totalDebt = readLineItem(evStatement, ENTERPRISE_VALUE_ITEMS.TOTAL_DEBT, 'enterpriseValue', 0);
  const cashEntry = readLineItem(evStatement, ENTERPRISE_VALUE_ITEMS.CASH_AND_EQUIVALENTS, 'enterpriseValue', 0);
  const shares = readLineItem(evStatement, ENTERPRISE_VALUE_ITEMS.NUMBER_OF_SHARES, 'enterpriseValue', 0);

  const enterprise = enterpriseValue(presentValues, presentValueOfTerminalValue);
  const equity = statementEquityValue(enterprise, totalDebt, cashEntry);

  return {
    strategy: 'statement',
    ticker: params.ticker,
    valuationDate: base.date,
    years: projection.map((year, index) => ({
      year: year.year,
      label: calendarLabel(base.date, year.year),
      freeCashFlow: year.freeCashFlow,
      presentValue: presentValues[index],
      drivers: year.drivers,
    })),
    projectedFcf,
    presentValues,
    presentValueOfFcf: FinMath.sum(presentValues),
    terminalValue,
    presentValueOfTerminalValue,
    enterpriseValue: enterprise,
    equityValue: equity,
    perShareValue: perShareValue(equity, shares, STATEMENT_CONVENTIONS),
    discountRate: forecast.discountRate,
    terminalGrowthRate: forecast.perpetualGrowthRate,
    warnings: [],
  };
}
