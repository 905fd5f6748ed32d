import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { InvalidParameterError } from '@/lib/modeling/errors';
import type { FinancialStatementSnapshot } from '@/lib/modeling/types';

const statementValueSchema = z.union([z.number(), z.string(), z.null()]);

const statementRecordSchema = z
  .object({
    date: z.string().trim().min(1),
  })
  .catchall(statementValueSchema);

/**
 * Statements as exported by the data provider, most recent record first.
 */
export const statementFileSchema = z.object({
  ticker: z.string().trim().min(1).optional(),
  income: z.array(statementRecordSchema),
  balance: z.array(statementRecordSchema),
  cashflow: z.array(statementRecordSchema),
  enterpriseValue: z.record(statementValueSchema),
});

export type StatementFile = z.infer<typeof statementFileSchema>;

export interface LoadedStatements {
  ticker?: string;
  statements: FinancialStatementSnapshot;
}

export function parseStatementFile(data: unknown): LoadedStatements {
  const result = statementFileSchema.safeParse(data);

  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.join('.') || 'statements';
    throw new InvalidParameterError(path, `Invalid statement file at "${path}": ${issue.message}`);
  }

  const file = result.data;
  return {
    ticker: file.ticker,
    statements: {
      incomeStatements: file.income,
      balanceStatements: file.balance,
      cashFlowStatements: file.cashflow,
      enterpriseValue: file.enterpriseValue,
    },
  };
}

export async function loadStatementFile(filePath: string): Promise<LoadedStatements> {
  const content = await readFile(filePath, 'utf8');

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidParameterError('file', `Statement file ${filePath} is not valid JSON: ${reason}`);
  }

  return parseStatementFile(data);
}
