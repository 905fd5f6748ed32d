/**
 * DCF Valuation Script
 *
 * Runs one valuation from command-line parameters (growth strategy) or from a
 * statement file (statement strategy) and prints the report.
 *
 * Usage:
 *   npm run dcf -- --strategy growth --fcf 100 --growth 0.15,0.10,0.08,0.05,0.03 --wacc 0.09
 *   npm run dcf -- --strategy statement --file statements.json --period 5
 */

import { buildValuationRequest, parseArgs, USAGE } from '../lib/cli';
import { getManualInputConfig } from '../lib/config';
import { resolveManualInput } from '../lib/manual-input';
import { runValuation, ValuationError } from '../lib/modeling';
import { renderReport } from '../lib/report';

async function main() {
  const request = await buildValuationRequest(parseArgs(process.argv.slice(2)));

  if (!request) {
    console.log(USAGE);
    return;
  }

  console.log(`[DCF] Running ${request.strategy} valuation...`);

  const result = await runValuation(request, {
    manualInput: resolveManualInput(getManualInputConfig()),
  });

  for (const line of renderReport(result)) {
    console.log(line);
  }
}

main().catch((error) => {
  if (error instanceof ValuationError) {
    console.error(`[DCF] ${error.name}: ${error.message}`);
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});
