import type { Decision, DecisionFailure, FailureCode, LoanOffer } from './types.js';

export const FAILURE_MESSAGES: Record<FailureCode, string> = {
  MalformedIdentityCode: 'Invalid personal ID code!',
  AgeRestricted: 'Loan cannot be issued due to age restrictions!',
  InvalidAmount: 'Invalid loan amount!',
  InvalidPeriod: 'Invalid loan period!',
  NoValidLoan: 'No valid loan found!',
};

export function failure(code: FailureCode): DecisionFailure {
  return { code, message: FAILURE_MESSAGES[code] };
}

export function rejected(code: FailureCode): Decision {
  return { ok: false, failure: failure(code) };
}

export class DecisionError extends Error {
  failure: DecisionFailure;
  constructor(f: DecisionFailure) {
    super(f.message);
    this.name = 'DecisionError';
    this.failure = f;
  }
}

export class ConfigError extends Error {
  issues: string[];
  constructor(issues: string[]) {
    super(`invalid decision config: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Unwraps an approved decision, throwing `DecisionError` for any failure. */
export function assertApproved(decision: Decision): LoanOffer {
  if (!decision.ok) throw new DecisionError(decision.failure);
  return { loanAmount: decision.loanAmount, loanPeriod: decision.loanPeriod };
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}
