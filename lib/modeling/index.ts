import { computeGrowthDcf } from './growth-dcf';
import { computeStatementDcf } from './statement-dcf';
import type { ProjectionResult, ValuationOptions, ValuationRequest } from './types';

export { computeGrowthDcf, GROWTH_CONVENTIONS } from './growth-dcf';
export { computeStatementDcf, STATEMENT_CONVENTIONS } from './statement-dcf';
export {
  createGrowthParameters,
  createStatementParameters,
  GROWTH_DCF_DEFAULTS,
  WORKING_CAPITAL_DECAY,
} from './parameters';
export { extractBaseYearInputs, ebitPrompt, rejectManualInput } from './statement-inputs';
export {
  ArithmeticDegenerateError,
  InteractiveInputRequiredError,
  InvalidParameterError,
  MissingStatementFieldError,
  ValuationError,
  ValuationErrorCode,
} from './errors';
export type { BaseYearInputs } from './statement-inputs';
export type {
  DcfConventions,
  DcfStrategy,
  FinancialStatementSnapshot,
  GrowthDcfInputs,
  GrowthDcfParameters,
  ManualInputProvider,
  ProjectionResult,
  ProjectionYear,
  StatementDcfInputs,
  StatementDcfParameters,
  StatementRecord,
  ValuationOptions,
  ValuationRequest,
} from './types';

/**
 * Runs one valuation with the strategy the request names.
 */
export async function runValuation(
  request: ValuationRequest,
  options: ValuationOptions = {}
): Promise<ProjectionResult> {
  switch (request.strategy) {
    case 'growth':
      return computeGrowthDcf(request.parameters);
    case 'statement':
      return computeStatementDcf(request.parameters, options);
  }
}
