import { Decimal } from '@/lib/math';
import {
  BALANCE_ITEMS,
  CASH_FLOW_ITEMS,
  INCOME_ITEMS,
  STATEMENT_LABELS,
  type StatementKind,
} from '@/lib/statements/line-items';
import { ArithmeticDegenerateError, InteractiveInputRequiredError, MissingStatementFieldError } from './errors';
import type { FinancialStatementSnapshot, ManualInputProvider, StatementValue } from './types';
import { parseDecimal, requireNumber } from './validation';

export interface BaseYearInputs {
  date: string;
  ebit: Decimal;
  taxRate: Decimal;
  nonCashCharges: Decimal;
  changeInWorkingCapital: Decimal;
  capitalExpenditure: Decimal;
}

/** Used when no provider is injected: a missing EBIT cannot be resolved. */
export const rejectManualInput: ManualInputProvider = (prompt) => {
  throw new InteractiveInputRequiredError(prompt, INCOME_ITEMS.EBIT);
};

export function ebitPrompt(date: string): string {
  return `EBIT missing. Enter EBIT on ${date} or skip: `;
}

/**
 * Reads a required line item as a Decimal.
 */
export function readLineItem(
  record: Readonly<Record<string, StatementValue>>,
  lineItem: string,
  kind: StatementKind,
  index: number
): Decimal {
  const raw = record[lineItem];
  if (raw === undefined || raw === null || raw === '') {
    throw new MissingStatementFieldError(STATEMENT_LABELS[kind], index, lineItem);
  }
  return requireNumber(raw, lineItem, `"${lineItem}" in ${STATEMENT_LABELS[kind]} record ${index} is not numeric.`);
}

// Net current assets as the balance sheet reports them (current liabilities are ignored).
function currentAssets(record: Readonly<Record<string, StatementValue>>, index: number): Decimal {
  return readLineItem(record, BALANCE_ITEMS.TOTAL_ASSETS, 'balance', index).minus(
    readLineItem(record, BALANCE_ITEMS.TOTAL_NON_CURRENT_ASSETS, 'balance', index)
  );
}

async function resolveEbit(
  statements: FinancialStatementSnapshot,
  manualInput: ManualInputProvider
): Promise<Decimal> {
  const base = statements.incomeStatements[0];
  const reported = parseDecimal(base[INCOME_ITEMS.EBIT]);

  if (reported !== null && !reported.isZero()) {
    return reported;
  }

  const answer = await manualInput(ebitPrompt(base.date));
  return requireNumber(answer, INCOME_ITEMS.EBIT, `Manual EBIT for ${base.date} must be a number.`);
}

/**
 * Derives the base-year inputs of the statement strategy.
 * Index 0 of each sequence is the base year, index 1 the prior year.
 */
export async function extractBaseYearInputs(
  statements: FinancialStatementSnapshot,
  manualInput: ManualInputProvider = rejectManualInput
): Promise<BaseYearInputs> {
  const income = statements.incomeStatements[0];
  const [balance, priorBalance] = statements.balanceStatements;
  const cashFlow = statements.cashFlowStatements[0];

  const ebit = await resolveEbit(statements, manualInput);

  const taxExpense = readLineItem(income, INCOME_ITEMS.INCOME_TAX_EXPENSE, 'income', 0);
  const earningsBeforeTax = readLineItem(income, INCOME_ITEMS.EARNINGS_BEFORE_TAX, 'income', 0);
  if (earningsBeforeTax.isZero()) {
    throw new ArithmeticDegenerateError(
      `Cannot derive an effective tax rate: "${INCOME_ITEMS.EARNINGS_BEFORE_TAX}" is zero on ${income.date}.`,
      INCOME_ITEMS.EARNINGS_BEFORE_TAX
    );
  }

  return {
    date: income.date,
    ebit,
    taxRate: taxExpense.div(earningsBeforeTax),
    nonCashCharges: readLineItem(cashFlow, CASH_FLOW_ITEMS.DEPRECIATION_AMORTIZATION, 'cashflow', 0),
    changeInWorkingCapital: currentAssets(balance, 0).minus(currentAssets(priorBalance, 1)),
    capitalExpenditure: readLineItem(cashFlow, CASH_FLOW_ITEMS.CAPITAL_EXPENDITURE, 'cashflow', 0),
  };
}
