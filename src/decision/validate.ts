import type { Dayjs } from 'dayjs';
import { checkAge } from './age.js';
import type { DecisionConfig, FailureCode, LoanRequest } from './types.js';

function within(n: number, lo: number, hi: number): boolean {
  return Number.isInteger(n) && n >= lo && n <= hi;
}

/**
 * Returns the first rule the request breaks, or null.
 * Order: age, amount, period.
 */
export function validateRequest(
  request: LoanRequest,
  birthDate: Dayjs,
  now: Date,
  config: DecisionConfig,
): FailureCode | null {
  const age = checkAge(
    { birthDate, periodMonths: request.requestedPeriodMonths, country: request.country, now },
    config,
  );
  if (!age.eligible) return 'AgeRestricted';
  if (!within(request.requestedAmount, config.minAmount, config.maxAmount)) return 'InvalidAmount';
  if (!within(request.requestedPeriodMonths, config.minPeriod, config.maxPeriod)) return 'InvalidPeriod';
  return null;
}
