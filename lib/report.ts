import { Decimal } from './math';
import type { ProjectionResult } from './modeling';

const separator = '='.repeat(60);

/**
 * Scientific notation with a two-digit exponent, e.g. 8.51E+03.
 */
export function formatScientific(value: Decimal.Value, digits = 2): string {
  const [mantissa, exponent] = new Decimal(value).toExponential(digits).split('e');
  const sign = exponent.startsWith('-') ? '-' : '+';
  return `${mantissa}E${sign}${exponent.replace(/^[+-]/, '').padStart(2, '0')}`;
}

export function formatMoney(value: Decimal): string {
  return `$${value.toFixed(2)}`;
}

/**
 * Per-year breakdown of the statement strategy: discounted flow and drivers.
 */
export function renderProjectionTable(result: ProjectionResult): string[] {
  const lines = [
    `Forecasting flows for ${result.years.length} years out, starting at ${result.valuationDate ?? 'n/a'}.`,
    '         DFCF   |    EBIT   |    D&A    |    CWC     |   CAP_EX   | ',
  ];

  for (const year of result.years) {
    const cells = [`${year.label ?? `Y${year.year}`}  `, `${formatScientific(year.presentValue)} | `];
    if (year.drivers) {
      const { ebit, nonCashCharges, changeInWorkingCapital, capitalExpenditure } = year.drivers;
      for (const value of [ebit, nonCashCharges, changeInWorkingCapital, capitalExpenditure]) {
        cells.push(`${formatScientific(value)} | `);
      }
    }
    lines.push(cells.join(' '));
  }

  return lines;
}

export function renderStatementSummary(result: ProjectionResult): string[] {
  const ticker = result.ticker ?? 'N/A';
  return [
    `Enterprise Value for ${ticker}: $${formatScientific(result.enterpriseValue)}.`,
    `Equity Value for ${ticker}: $${formatScientific(result.equityValue)}.`,
    `Per share value for ${ticker}: $${formatScientific(result.perShareValue)}.`,
  ];
}

export function renderGrowthSummary(result: ProjectionResult): string[] {
  const flows = result.projectedFcf.map((fcf) => fcf.toDecimalPlaces(2).toString()).join(', ');
  const horizon = result.projectedFcf.length;

  return [
    '--- DCF Valuation Results ---',
    `Projected FCFs (Year 1-${horizon}): [${flows}]`,
    `Present Value of FCFs: ${formatMoney(result.presentValueOfFcf)}`,
    `Terminal Value (End of Year ${horizon}): ${formatMoney(result.terminalValue)}`,
    `Present Value of Terminal Value: ${formatMoney(result.presentValueOfTerminalValue)}`,
    `Enterprise Value: ${formatMoney(result.enterpriseValue)}`,
    `Equity Value: ${formatMoney(result.equityValue)}`,
    `Intrinsic Value Per Share: ${formatMoney(result.perShareValue)}`,
  ];
}

export function renderReport(result: ProjectionResult): string[] {
  const body =
    result.strategy === 'statement'
      ? [...renderProjectionTable(result), '', ...renderStatementSummary(result)]
      : renderGrowthSummary(result);

  return [separator, ...body, ...result.warnings.map((warning) => `Warning: ${warning}`), separator];
}
