import type { Logger } from 'pino';
import { defaultLogger } from '../log.js';
import { resolveCountry } from './country.js';
import { rejected } from './errors.js';
import { optimizeLoan } from './optimizer.js';
import { isValidPersonalCode, parsePersonalCode } from './personalCode.js';
import { creditModifier } from './segments.js';
import type { Decision, DecisionConfig, LoanRequest } from './types.js';
import { validateRequest } from './validate.js';

export type DecideContext = {
  config: DecisionConfig;
  now: Date;
  verifyPersonalCode: (code: string) => boolean;
};

export type DecisionEngineDeps = {
  config: DecisionConfig;
  clock?: () => Date;
  verifyPersonalCode?: (code: string) => boolean;
  logger?: Logger;
};

export interface DecisionEngine {
  readonly config: DecisionConfig;
  evaluate(identityCode: string, requestedAmount: number, requestedPeriodMonths: number, country: string): Decision;
}

/**
 * Largest approvable loan for one request.
 * verify code -> parse -> validate -> modifier -> optimize
 * Every failure comes back as a Decision; nothing is thrown for bad input.
 */
export function decide(request: LoanRequest, ctx: DecideContext): Decision {
  const { config } = ctx;
  if (config.verifyChecksum && !ctx.verifyPersonalCode(request.identityCode)) {
    return rejected('MalformedIdentityCode');
  }
  const parsed = parsePersonalCode(request.identityCode);
  if (!parsed.ok) return rejected(parsed.code);

  const invalid = validateRequest(request, parsed.birthDate, ctx.now, config);
  if (invalid) return rejected(invalid);

  const modifier = creditModifier(parsed.segmentKey, config);
  if (modifier === 0) return rejected('NoValidLoan');

  const offer = optimizeLoan({ modifier, periodMonths: request.requestedPeriodMonths }, config);
  if (!offer.ok) return rejected(offer.code);
  return { ok: true, loanAmount: offer.loanAmount, loanPeriod: offer.loanPeriod };
}

export function createDecisionEngine(deps: DecisionEngineDeps): DecisionEngine {
  const config = deps.config;
  const clock = deps.clock ?? (() => new Date());
  const verifyPersonalCode = deps.verifyPersonalCode ?? isValidPersonalCode;
  const log = deps.logger ?? defaultLogger();

  return {
    config,
    evaluate(identityCode, requestedAmount, requestedPeriodMonths, country) {
      const resolved = resolveCountry(country);
      if (resolved.fallback) {
        log.warn({ country, fallback: resolved.country }, 'unknown country');
      }
      const decision = decide(
        { identityCode, requestedAmount, requestedPeriodMonths, country: resolved.country },
        { config, now: clock(), verifyPersonalCode },
      );
      log.debug({
        country: resolved.country,
        requestedAmount,
        requestedPeriodMonths,
        outcome: decision.ok ? 'approved' : decision.failure.code,
      }, 'decision');
      return decision;
    },
  };
}
