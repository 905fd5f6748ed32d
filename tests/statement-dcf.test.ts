import test from "node:test";
import assert from "node:assert/strict";
import {
  ArithmeticDegenerateError,
  computeStatementDcf,
  createStatementParameters,
  MissingStatementFieldError,
  runValuation,
} from "../lib/modeling";
import { approxEqual, buildSnapshot } from "./helpers";

const forecast = {
  discountRate: 0.1,
  forecastPeriod: 3,
  earningsGrowthRate: 0.05,
  capExGrowthRate: 0.045,
  perpetualGrowthRate: 0.02,
};

const build = (statements = buildSnapshot(), overrides: Partial<typeof forecast> = {}) =>
  createStatementParameters({ ticker: "TEST", statements, forecast: { ...forecast, ...overrides } });

test("computeStatementDcf values the company from its statements", async () => {
  const result = await computeStatementDcf(build());

  assert.equal(result.strategy, "statement");
  assert.equal(result.ticker, "TEST");
  assert.equal(result.valuationDate, "2023-12-31");
  assert.deepEqual(
    result.projectedFcf.map((fcf) => fcf.toString()),
    ["805.75", "859.8925", "969.3892375"]
  );
  assert.equal(result.presentValues[0].toString(), "732.5");
  approxEqual(result.presentValues[1], 710.6549586776857);
  approxEqual(result.presentValues[2], 728.3164819684446);
  approxEqual(result.terminalValue, 9286.035145097669);
  approxEqual(result.presentValueOfTerminalValue, 6342.486951094643);
  approxEqual(result.enterpriseValue, 8513.958391740773);
  approxEqual(result.equityValue, 8313.958391740773);
  approxEqual(result.perShareValue, 83.13958391740772);
});

test("computeStatementDcf labels forecast years from the base-year date", async () => {
  const result = await computeStatementDcf(build());

  assert.deepEqual(
    result.years.map((year) => year.label),
    ["2024", "2025", "2026"]
  );
  assert.equal(result.years[0].drivers?.ebit.toString(), "1050");
});

test("computeStatementDcf nets debt and adds the stored cash entry", async () => {
  const result = await computeStatementDcf(build());

  assert.ok(result.equityValue.equals(result.enterpriseValue.minus(500).plus(300)));
  assert.ok(result.perShareValue.equals(result.equityValue.div(100)));
});

test("computeStatementDcf refuses a discount rate equal to perpetual growth before prompting", async (t) => {
  const provider = t.mock.fn((_prompt: string) => 1000);
  const params = build(buildSnapshot({ income: { EBIT: null } }), { discountRate: 0.02 });

  await assert.rejects(computeStatementDcf(params, { manualInput: provider }), ArithmeticDegenerateError);
  assert.equal(provider.mock.callCount(), 0);
});

test("computeStatementDcf uses the manual EBIT when the statement has none", async (t) => {
  const provider = t.mock.fn((_prompt: string) => 1000);
  const result = await computeStatementDcf(build(buildSnapshot({ income: { EBIT: null } })), {
    manualInput: provider,
  });

  assert.equal(provider.mock.callCount(), 1);
  assert.equal(provider.mock.calls[0].arguments[0], "EBIT missing. Enter EBIT on 2023-12-31 or skip: ");
  approxEqual(result.enterpriseValue, 8513.958391740773);
});

test("computeStatementDcf fails on a zero share count", async () => {
  const statements = buildSnapshot({
    enterpriseValue: { "+ Total Debt": 500, "- Cash & Cash Equivalents": 300, "Number of Shares": 0 },
  });

  await assert.rejects(computeStatementDcf(build(statements)), ArithmeticDegenerateError);
});

test("computeStatementDcf reports a missing enterprise-value entry", async () => {
  const statements = buildSnapshot({
    enterpriseValue: { "- Cash & Cash Equivalents": 300, "Number of Shares": 100 },
  });

  await assert.rejects(computeStatementDcf(build(statements)), (error: unknown) => {
    assert.ok(error instanceof MissingStatementFieldError);
    assert.equal(error.statement, "enterprise-value statement");
    assert.equal(error.field, "+ Total Debt");
    return true;
  });
});

test("runValuation dispatches the statement strategy with its options", async (t) => {
  const provider = t.mock.fn((_prompt: string) => 1000);
  const result = await runValuation(
    { strategy: "statement", parameters: build(buildSnapshot({ income: { EBIT: 0 } })) },
    { manualInput: provider }
  );

  assert.equal(provider.mock.callCount(), 1);
  approxEqual(result.perShareValue, 83.13958391740772);
});
