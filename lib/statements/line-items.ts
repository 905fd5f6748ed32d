// Line-item keys as the statement provider names them.

export const INCOME_ITEMS = {
  EBIT: 'EBIT',
  INCOME_TAX_EXPENSE: 'Income Tax Expense',
  EARNINGS_BEFORE_TAX: 'Earnings before Tax',
} as const;

export const BALANCE_ITEMS = {
  TOTAL_ASSETS: 'Total assets',
  TOTAL_NON_CURRENT_ASSETS: 'Total non-current assets',
} as const;

export const CASH_FLOW_ITEMS = {
  DEPRECIATION_AMORTIZATION: 'Depreciation & Amortization',
  CAPITAL_EXPENDITURE: 'Capital Expenditure',
} as const;

// The cash entry is stored with the sign of a deduction from enterprise value.
export const ENTERPRISE_VALUE_ITEMS = {
  TOTAL_DEBT: '+ Total Debt',
  CASH_AND_EQUIVALENTS: '- Cash & Cash Equivalents',
  NUMBER_OF_SHARES: 'Number of Shares',
} as const;

export type StatementKind = 'income' | 'balance' | 'cashflow' | 'enterpriseValue';

export const STATEMENT_LABELS: Record<StatementKind, string> = {
  income: 'income statement',
  balance: 'balance sheet',
  cashflow: 'cash-flow statement',
  enterpriseValue: 'enterprise-value statement',
};

// Forecasting needs the base year and the year before it.
export const MIN_STATEMENT_RECORDS = 2;
