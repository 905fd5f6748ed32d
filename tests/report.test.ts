import test from "node:test";
import assert from "node:assert/strict";
import { computeGrowthDcf, computeStatementDcf, createGrowthParameters, createStatementParameters } from "../lib/modeling";
import { formatScientific, renderGrowthSummary, renderProjectionTable, renderReport, renderStatementSummary } from "../lib/report";
import { buildSnapshot } from "./helpers";

const statementResult = () =>
  computeStatementDcf(
    createStatementParameters({
      ticker: "TEST",
      statements: buildSnapshot(),
      forecast: {
        discountRate: 0.1,
        forecastPeriod: 3,
        earningsGrowthRate: 0.05,
        capExGrowthRate: 0.045,
        perpetualGrowthRate: 0.02,
      },
    })
  );

const growthResult = () =>
  computeGrowthDcf(
    createGrowthParameters({
      currentFcf: 100,
      growthRates: [0.15, 0.1, 0.08, 0.05, 0.03],
      terminalGrowthRate: 0.02,
      wacc: 0.09,
      cashAndEquivalents: 50,
      totalDebt: 20,
      sharesOutstanding: 100,
    })
  );

test("formatScientific prints two mantissa decimals and a two-digit exponent", () => {
  assert.equal(formatScientific(8513.958391740773), "8.51E+03");
  assert.equal(formatScientific(-156.75), "-1.57E+02");
  assert.equal(formatScientific(0.00123), "1.23E-03");
  assert.equal(formatScientific(0), "0.00E+00");
  assert.equal(formatScientific("1500000000000"), "1.50E+12");
});

test("renderProjectionTable lists each year's discounted flow and drivers", async () => {
  const lines = renderProjectionTable(await statementResult());

  assert.equal(lines[0], "Forecasting flows for 3 years out, starting at 2023-12-31.");
  assert.equal(lines[1], "         DFCF   |    EBIT   |    D&A    |    CWC     |   CAP_EX   | ");
  assert.equal(lines[2], "2024   7.33E+02 |  1.05E+03 |  1.05E+02 |  7.00E+01 |  -1.57E+02 | ");
  assert.equal(lines.length, 5);
});

test("renderStatementSummary reports values for the ticker", async () => {
  assert.deepEqual(renderStatementSummary(await statementResult()), [
    "Enterprise Value for TEST: $8.51E+03.",
    "Equity Value for TEST: $8.31E+03.",
    "Per share value for TEST: $8.31E+01.",
  ]);
});

test("renderGrowthSummary rounds only for display", () => {
  assert.deepEqual(renderGrowthSummary(growthResult()), [
    "--- DCF Valuation Results ---",
    "Projected FCFs (Year 1-5): [115, 126.5, 136.62, 143.45, 147.75]",
    "Present Value of FCFs: $515.13",
    "Terminal Value (End of Year 5): $2152.99",
    "Present Value of Terminal Value: $1399.30",
    "Enterprise Value: $1914.43",
    "Equity Value: $1944.43",
    "Intrinsic Value Per Share: $19.44",
  ]);
});

test("renderReport appends warnings", (t) => {
  t.mock.method(console, "warn", () => {});
  const result = computeGrowthDcf(createGrowthParameters({ currentFcf: 0, growthRates: [0.1] }));
  const lines = renderReport(result);

  assert.equal(
    lines[lines.length - 2],
    "Warning: Current FCF is zero or negative. DCF might not be appropriate or projections need careful review."
  );
  assert.equal(lines[0], "=".repeat(60));
});
