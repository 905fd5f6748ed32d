import { Decimal } from '@/lib/math';
import { MIN_STATEMENT_RECORDS, STATEMENT_LABELS, type StatementKind } from '@/lib/statements/line-items';
import { InvalidParameterError } from './errors';
import type {
  FinancialStatementSnapshot,
  GrowthDcfInputs,
  GrowthDcfParameters,
  StatementDcfInputs,
  StatementDcfParameters,
  StatementRecord,
} from './types';
import {
  requireNonNegative,
  requireNumber,
  requireOpenUnitInterval,
  requirePositive,
  requirePositiveInteger,
  requireRateSequence,
} from './validation';

/** Applied when a growth-strategy input is omitted. */
export const GROWTH_DCF_DEFAULTS = Object.freeze({
  terminalGrowthRate: new Decimal(0.02),
  wacc: new Decimal(0.1),
  cashAndEquivalents: new Decimal(0),
  totalDebt: new Decimal(0),
  sharesOutstanding: new Decimal(1),
});

/**
 * Placeholder policy: the change in working capital decays by 30% a year.
 * Overridable per forecast through `workingCapitalDecay`.
 */
export const WORKING_CAPITAL_DECAY = new Decimal(0.7);

/**
 * Validates growth-strategy inputs and returns a frozen parameter set.
 * The WACC > terminal growth invariant is checked when the valuation runs.
 */
export function createGrowthParameters(inputs: GrowthDcfInputs): GrowthDcfParameters {
  const defaults = GROWTH_DCF_DEFAULTS;

  const growthRates = Object.freeze(requireRateSequence(inputs.growthRates, 'growthRates', 'Growth rates'));

  return Object.freeze({
    currentFcf: requireNonNegative(inputs.currentFcf, 'currentFcf', 'Current FCF'),
    growthRates,
    terminalGrowthRate: requireNumber(
      inputs.terminalGrowthRate ?? defaults.terminalGrowthRate,
      'terminalGrowthRate',
      'Terminal growth rate must be a number.'
    ),
    wacc: requireOpenUnitInterval(inputs.wacc ?? defaults.wacc, 'wacc', 'WACC'),
    cashAndEquivalents: requireNonNegative(
      inputs.cashAndEquivalents ?? defaults.cashAndEquivalents,
      'cashAndEquivalents',
      'Cash and equivalents'
    ),
    totalDebt: requireNonNegative(inputs.totalDebt ?? defaults.totalDebt, 'totalDebt', 'Total debt'),
    sharesOutstanding: requirePositive(
      inputs.sharesOutstanding ?? defaults.sharesOutstanding,
      'sharesOutstanding',
      'Shares outstanding'
    ),
  });
}

function requireStatementSequence(
  records: readonly StatementRecord[] | undefined,
  kind: StatementKind
): readonly StatementRecord[] {
  if (!records || records.length < MIN_STATEMENT_RECORDS) {
    throw new InvalidParameterError(
      kind,
      `At least ${MIN_STATEMENT_RECORDS} ${STATEMENT_LABELS[kind]} records are required (most recent first).`
    );
  }
  return Object.freeze(records.map((record) => Object.freeze({ ...record })));
}

function requireSnapshot(statements: FinancialStatementSnapshot): FinancialStatementSnapshot {
  if (!statements.enterpriseValue || typeof statements.enterpriseValue !== 'object') {
    throw new InvalidParameterError('enterpriseValue', 'An enterprise-value statement is required.');
  }

  return Object.freeze({
    incomeStatements: requireStatementSequence(statements.incomeStatements, 'income'),
    balanceStatements: requireStatementSequence(statements.balanceStatements, 'balance'),
    cashFlowStatements: requireStatementSequence(statements.cashFlowStatements, 'cashflow'),
    enterpriseValue: Object.freeze({ ...statements.enterpriseValue }),
  });
}

/**
 * Validates statement-strategy inputs and returns a frozen parameter set.
 * Line items themselves are read (and checked) only when the valuation runs.
 */
export function createStatementParameters(inputs: StatementDcfInputs): StatementDcfParameters {
  const { forecast } = inputs;

  return Object.freeze({
    ticker: inputs.ticker,
    statements: requireSnapshot(inputs.statements),
    forecast: Object.freeze({
      discountRate: requirePositive(forecast.discountRate, 'discountRate', 'Discount rate'),
      forecastPeriod: requirePositiveInteger(forecast.forecastPeriod, 'forecastPeriod', 'Forecast period'),
      earningsGrowthRate: requireNumber(forecast.earningsGrowthRate, 'earningsGrowthRate'),
      capExGrowthRate: requireNumber(forecast.capExGrowthRate, 'capExGrowthRate'),
      perpetualGrowthRate: requireNumber(forecast.perpetualGrowthRate, 'perpetualGrowthRate'),
      workingCapitalDecay: requireNonNegative(
        forecast.workingCapitalDecay ?? WORKING_CAPITAL_DECAY,
        'workingCapitalDecay',
        'Working capital decay'
      ),
    }),
  });
}
