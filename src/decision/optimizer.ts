import type { DecisionConfig, LoanOffer } from './types.js';

export type OptimizeResult = ({ ok: true } & LoanOffer) | { ok: false; code: 'NoValidLoan' };

export function capacity(modifier: number, periodMonths: number): number {
  return modifier * periodMonths;
}

/**
 * Smallest period >= the requested one whose capacity reaches minAmount,
 * with the amount capped at maxAmount. Never shortens the term.
 */
export function optimizeLoan(
  args: { modifier: number; periodMonths: number },
  config: Pick<DecisionConfig, 'minAmount' | 'maxAmount' | 'maxPeriod'>,
): OptimizeResult {
  if (args.modifier <= 0) return { ok: false, code: 'NoValidLoan' };
  for (let period = args.periodMonths; period <= config.maxPeriod; period++) {
    const cap = capacity(args.modifier, period);
    if (cap >= config.minAmount) {
      return { ok: true, loanAmount: Math.min(config.maxAmount, cap), loanPeriod: period };
    }
  }
  return { ok: false, code: 'NoValidLoan' };
}
