import assert from "node:assert/strict";
import type { Decimal } from "../lib/math";
import type { FinancialStatementSnapshot, StatementRecord } from "../lib/modeling/types";

export const approxEqual = (actual: Decimal | number, expected: number, tolerance = 1e-6) => {
  const value = typeof actual === "number" ? actual : actual.toNumber();
  assert.ok(
    Math.abs(value - expected) <= tolerance,
    `Expected ${value} to be within ${tolerance} of ${expected}`
  );
};

type SnapshotOverrides = {
  income?: Partial<StatementRecord>;
  balance?: Partial<StatementRecord>;
  priorBalance?: Partial<StatementRecord>;
  cashflow?: Partial<StatementRecord>;
  enterpriseValue?: FinancialStatementSnapshot["enterpriseValue"];
};

/**
 * Base year 2023: EBIT 1000, tax 200 / 800, D&A 100, CapEx -150,
 * net current assets 2000 against 1900 the year before.
 */
export function buildSnapshot(overrides: SnapshotOverrides = {}): FinancialStatementSnapshot {
  return {
    incomeStatements: [
      {
        date: "2023-12-31",
        EBIT: 1000,
        "Income Tax Expense": 200,
        "Earnings before Tax": 800,
        ...overrides.income,
      },
      { date: "2022-12-31", EBIT: 900, "Income Tax Expense": 180, "Earnings before Tax": 720 },
    ],
    balanceStatements: [
      {
        date: "2023-12-31",
        "Total assets": 5000,
        "Total non-current assets": 3000,
        ...overrides.balance,
      },
      {
        date: "2022-12-31",
        "Total assets": 4800,
        "Total non-current assets": 2900,
        ...overrides.priorBalance,
      },
    ],
    cashFlowStatements: [
      {
        date: "2023-12-31",
        "Depreciation & Amortization": 100,
        "Capital Expenditure": -150,
        ...overrides.cashflow,
      },
      { date: "2022-12-31", "Depreciation & Amortization": 95, "Capital Expenditure": -140 },
    ],
    enterpriseValue: overrides.enterpriseValue ?? {
      "+ Total Debt": 500,
      "- Cash & Cash Equivalents": 300,
      "Number of Shares": 100,
    },
  };
}
