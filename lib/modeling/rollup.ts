import { Decimal, FinMath, ZERO } from '@/lib/math';
import { ArithmeticDegenerateError } from './errors';
import type { DcfConventions } from './types';

export function enterpriseValue(presentValues: readonly Decimal[], presentValueOfTerminalValue: Decimal): Decimal {
  return FinMath.sum(presentValues).plus(presentValueOfTerminalValue);
}

/** Equity = EV + cash − debt */
export function netCashEquityValue(enterprise: Decimal, cash: Decimal, debt: Decimal): Decimal {
  return enterprise.plus(cash).minus(debt);
}

/**
 * Equity from an enterprise-value statement: EV − debt + cash entry.
 * The cash entry keeps the sign it was stored with.
 */
export function statementEquityValue(enterprise: Decimal, totalDebt: Decimal, cashEntry: Decimal): Decimal {
  return enterprise.minus(totalDebt).plus(cashEntry);
}

export function perShareValue(equity: Decimal, shares: Decimal, conventions: DcfConventions): Decimal {
  if (conventions.nonPositiveShares === 'zero') {
    return shares.lte(0) ? ZERO : equity.div(shares);
  }

  if (shares.isZero()) {
    throw new ArithmeticDegenerateError('Cannot derive a per-share value: share count is zero.', 'sharesOutstanding');
  }
  return equity.div(shares);
}
