import type { Decimal } from '@/lib/math';

// ============================================================================
// Financial Statements (statement strategy input)
// ============================================================================

/** A stored line-item value: numeric, numeric text, or absent. */
export type StatementValue = number | string | null | undefined;

export interface StatementRecord {
  date: string; // YYYY-MM-DD of the fiscal period end
  [lineItem: string]: StatementValue;
}

export type EnterpriseValueRecord = Record<string, StatementValue>;

/**
 * Statement sequences are ordered most recent first: index 0 is the base
 * year, index 1 the prior year.
 */
export interface FinancialStatementSnapshot {
  incomeStatements: readonly StatementRecord[];
  balanceStatements: readonly StatementRecord[];
  cashFlowStatements: readonly StatementRecord[];
  enterpriseValue: EnterpriseValueRecord;
}

// ============================================================================
// Parameters
// ============================================================================

export type GrowthDcfInputs = {
  currentFcf: Decimal.Value;
  growthRates: readonly Decimal.Value[];
  terminalGrowthRate?: Decimal.Value;
  wacc?: Decimal.Value;
  cashAndEquivalents?: Decimal.Value;
  totalDebt?: Decimal.Value;
  sharesOutstanding?: Decimal.Value;
};

export type GrowthDcfParameters = Readonly<{
  currentFcf: Decimal;
  growthRates: readonly Decimal[];
  terminalGrowthRate: Decimal;
  wacc: Decimal;
  cashAndEquivalents: Decimal;
  totalDebt: Decimal;
  sharesOutstanding: Decimal;
}>;

export type StatementForecastInputs = {
  discountRate: Decimal.Value;
  forecastPeriod: number;
  earningsGrowthRate: Decimal.Value;
  capExGrowthRate: Decimal.Value;
  perpetualGrowthRate: Decimal.Value;
  workingCapitalDecay?: Decimal.Value;
};

export type StatementForecastParameters = Readonly<{
  discountRate: Decimal;
  forecastPeriod: number;
  earningsGrowthRate: Decimal;
  capExGrowthRate: Decimal;
  perpetualGrowthRate: Decimal;
  workingCapitalDecay: Decimal;
}>;

export type StatementDcfInputs = {
  ticker: string;
  statements: FinancialStatementSnapshot;
  forecast: StatementForecastInputs;
};

export type StatementDcfParameters = Readonly<{
  ticker: string;
  statements: FinancialStatementSnapshot;
  forecast: StatementForecastParameters;
}>;

// ============================================================================
// Strategy Conventions
// ============================================================================

export type DcfStrategy = 'growth' | 'statement';

/**
 * Conventions on which the two strategies disagree. They are declared, not
 * reconciled.
 */
export interface DcfConventions {
  strategy: DcfStrategy;
  // Gordon Growth base: final projected flow, or final flow after discounting
  terminalBase: 'projected' | 'discounted';
  // PV(TV) exponent = forecast years + offset
  terminalDiscountOffset: number;
  // Per-share value with no shares: 0, or ArithmeticDegenerateError
  nonPositiveShares: 'zero' | 'throw';
}

// ============================================================================
// Results
// ============================================================================

export interface StatementDrivers {
  ebit: Decimal;
  nonCashCharges: Decimal;
  changeInWorkingCapital: Decimal;
  capitalExpenditure: Decimal;
}

export interface ProjectionYear {
  year: number; // 1-based forecast year
  label?: string; // calendar year, when a base date is known
  freeCashFlow: Decimal;
  presentValue: Decimal;
  drivers?: StatementDrivers;
}

export interface ProjectionResult {
  strategy: DcfStrategy;
  ticker?: string;
  valuationDate?: string;
  years: ProjectionYear[];
  projectedFcf: Decimal[];
  presentValues: Decimal[];
  presentValueOfFcf: Decimal;
  terminalValue: Decimal;
  presentValueOfTerminalValue: Decimal;
  enterpriseValue: Decimal;
  equityValue: Decimal;
  perShareValue: Decimal;
  discountRate: Decimal;
  terminalGrowthRate: Decimal;
  warnings: string[];
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Supplies a value the statements do not carry. Called with a human-readable
 * prompt; may answer synchronously or not.
 */
export type ManualInputProvider = (prompt: string) => Decimal.Value | Promise<Decimal.Value>;

export type ValuationRequest =
  | { strategy: 'growth'; parameters: GrowthDcfParameters }
  | { strategy: 'statement'; parameters: StatementDcfParameters };

export interface ValuationOptions {
  manualInput?: ManualInputProvider;
}
