import { createGrowthParameters, createStatementParameters } from './modeling/parameters';
import { InvalidParameterError } from './modeling/errors';
import type { GrowthDcfInputs, StatementForecastInputs, ValuationRequest } from './modeling/types';
import { loadStatementFile, type LoadedStatements } from './statements/loader';

export const USAGE = `Usage:
  npm run dcf -- --strategy growth --fcf <n> --growth <r1,r2,...> [--terminal-growth <r>] [--wacc <r>]
                 [--cash <n>] [--debt <n>] [--shares <n>]
  npm run dcf -- --strategy statement --file <statements.json> [--ticker <symbol>] [--discount-rate <r>]
                 [--period <years>] [--earnings-growth <r>] [--capex-growth <r>] [--perpetual-growth <r>]
                 [--cwc-decay <r>]

Environment:
  DCF_MANUAL_EBIT       EBIT to use when the base-year income statement has none
  DCF_NON_INTERACTIVE   1/true: never prompt for a missing EBIT`;

export const STATEMENT_FORECAST_DEFAULTS: StatementForecastInputs = {
  discountRate: 0.1,
  forecastPeriod: 5,
  earningsGrowthRate: 0.05,
  capExGrowthRate: 0.045,
  perpetualGrowthRate: 0.02,
};

export type CliOptions =
  | { strategy: 'help' }
  | { strategy: 'growth'; inputs: GrowthDcfInputs }
  | { strategy: 'statement'; file: string; ticker?: string; forecast: StatementForecastInputs };

const GROWTH_FLAGS = new Set(['strategy', 'fcf', 'growth', 'terminal-growth', 'wacc', 'cash', 'debt', 'shares']);

const STATEMENT_FLAGS = new Set([
  'strategy',
  'file',
  'ticker',
  'discount-rate',
  'period',
  'earnings-growth',
  'capex-growth',
  'perpetual-growth',
  'cwc-decay',
]);

function rejectUnknownFlags(flags: Map<string, string>, allowed: Set<string>): void {
  for (const name of flags.keys()) {
    if (!allowed.has(name)) {
      throw new InvalidParameterError(name, `Unknown flag --${name}`);
    }
  }
}

function readFlags(args: string[]): Map<string, string> {
  const flags = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      flags.set('help', 'true');
    } else if (arg.startsWith('--') && args[i + 1] !== undefined && !args[i + 1].startsWith('--')) {
      flags.set(arg.slice(2), args[i + 1]);
      i++;
    } else {
      throw new InvalidParameterError(arg, `Unexpected argument: ${arg}`);
    }
  }

  return flags;
}

function requireFlag(flags: Map<string, string>, name: string): string {
  const value = flags.get(name);
  if (value === undefined) {
    throw new InvalidParameterError(name, `Missing required flag --${name}`);
  }
  return value;
}

/**
 * Maps command-line flags to valuation inputs. Values stay as text; numeric
 * validation happens when the parameters are built.
 */
export function parseArgs(args: string[]): CliOptions {
  const flags = readFlags(args);

  if (flags.has('help') || args.length === 0) {
    return { strategy: 'help' };
  }

  const strategy = flags.get('strategy') ?? 'growth';

  if (strategy === 'growth') {
    rejectUnknownFlags(flags, GROWTH_FLAGS);
    return {
      strategy,
      inputs: {
        currentFcf: requireFlag(flags, 'fcf'),
        growthRates: requireFlag(flags, 'growth').split(',').map((rate) => rate.trim()),
        terminalGrowthRate: flags.get('terminal-growth'),
        wacc: flags.get('wacc'),
        cashAndEquivalents: flags.get('cash'),
        totalDebt: flags.get('debt'),
        sharesOutstanding: flags.get('shares'),
      },
    };
  }

  if (strategy === 'statement') {
    rejectUnknownFlags(flags, STATEMENT_FLAGS);
    const defaults = STATEMENT_FORECAST_DEFAULTS;
    const period = flags.get('period');
    return {
      strategy,
      file: requireFlag(flags, 'file'),
      ticker: flags.get('ticker'),
      forecast: {
        discountRate: flags.get('discount-rate') ?? defaults.discountRate,
        forecastPeriod: period === undefined ? defaults.forecastPeriod : Number(period),
        earningsGrowthRate: flags.get('earnings-growth') ?? defaults.earningsGrowthRate,
        capExGrowthRate: flags.get('capex-growth') ?? defaults.capExGrowthRate,
        perpetualGrowthRate: flags.get('perpetual-growth') ?? defaults.perpetualGrowthRate,
        workingCapitalDecay: flags.get('cwc-decay'),
      },
    };
  }

  throw new InvalidParameterError('strategy', `Unknown strategy "${strategy}" (expected growth or statement)`);
}

/**
 * Turns parsed options into a valuation request. The ticker comes from
 * --ticker, then from the statement file, then falls back to N/A.
 */
export async function buildValuationRequest(
  options: CliOptions,
  load: (file: string) => Promise<LoadedStatements> = loadStatementFile
): Promise<ValuationRequest | null> {
  switch (options.strategy) {
    case 'help':
      return null;
    case 'growth':
      return { strategy: 'growth', parameters: createGrowthParameters(options.inputs) };
    case 'statement': {
      console.log(`[DCF] Loading statements from ${options.file}`);
      const loaded = await load(options.file);
      const ticker = options.ticker ?? loaded.ticker ?? 'N/A';
      return {
        strategy: 'statement',
        parameters: createStatementParameters({
          ticker,
          statements: loaded.statements,
          forecast: options.forecast,
        }),
      };
    }
  }
}
