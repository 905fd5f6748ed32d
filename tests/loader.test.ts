import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { computeStatementDcf, createStatementParameters, InvalidParameterError } from "../lib/modeling";
import { loadStatementFile, parseStatementFile } from "../lib/statements/loader";
import { approxEqual } from "./helpers";

const fixture = path.join(__dirname, "fixtures", "statements.json");

test("loadStatementFile maps the file onto a statement snapshot", async () => {
  const loaded = await loadStatementFile(fixture);

  assert.equal(loaded.ticker, "TEST");
  assert.equal(loaded.statements.incomeStatements.length, 2);
  assert.equal(loaded.statements.balanceStatements[1].date, "2022-12-31");
  assert.equal(loaded.statements.cashFlowStatements[0]["Capital Expenditure"], "-150");
  assert.equal(loaded.statements.enterpriseValue["Number of Shares"], 100);
});

test("a loaded statement file values end to end", async () => {
  const loaded = await loadStatementFile(fixture);
  const params = createStatementParameters({
    ticker: loaded.ticker ?? "N/A",
    statements: loaded.statements,
    forecast: {
      discountRate: 0.1,
      forecastPeriod: 3,
      earningsGrowthRate: 0.05,
      capExGrowthRate: 0.045,
      perpetualGrowthRate: 0.02,
    },
  });
  const result = await computeStatementDcf(params);

  approxEqual(result.perShareValue, 83.13958391740772);
});

test("parseStatementFile points at the offending field", () => {
  assert.throws(
    () =>
      parseStatementFile({
        income: "not a list",
        balance: [],
        cashflow: [],
        enterpriseValue: {},
      }),
    { name: "InvalidParameterError", field: "income" }
  );

  assert.throws(
    () =>
      parseStatementFile({
        income: [{ EBIT: 1 }],
        balance: [],
        cashflow: [],
        enterpriseValue: {},
      }),
    { field: "income.0.date" }
  );

  assert.throws(
    () =>
      parseStatementFile({
        income: [{ date: "2023-12-31", EBIT: true }],
        balance: [],
        cashflow: [],
        enterpriseValue: {},
      }),
    { field: "income.0.EBIT" }
  );
});

test("loadStatementFile rejects malformed JSON", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "dcf-statements-"));
  const file = path.join(dir, "broken.json");
  await writeFile(file, "{ not json", "utf8");

  await assert.rejects(loadStatementFile(file), InvalidParameterError);
});
