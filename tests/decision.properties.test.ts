import { describe, test, expect } from '@jest/globals';
import { checkDigit, createDecisionEngine, parseDecisionConfig } from '../src/decision/index.js';

const NOW = new Date(2024, 5, 15);
const config = parseDecisionConfig({}, {});
const engine = createDecisionEngine({ config, clock: () => NOW });

// born 1990-01-01 with serial picked so the last four digits start at `prefix`
function codeWithSerial(prefix: string): string {
  const first10 = `3900101${prefix}`;
  return first10 + String(checkDigit(first10));
}

const AMOUNTS = [2000, 3500, 5000, 7777, 10000];
const PERIODS = [12, 18, 24, 37, 48, 60];

describe('decision properties', () => {
  test('package entry exposes validated, frozen config', () => {
    expect(Object.isFrozen(config)).toBe(true);
    expect(config.maxPeriod).toBe(60);
  });

  test('non-debt approvals never shorten the term or exceed the maximum', () => {
    for (const prefix of ['250', '420', '499', '500', '610', '749', '750', '999']) {
      const code = codeWithSerial(prefix);
      for (const amount of AMOUNTS) {
        for (const period of PERIODS) {
          const d = engine.evaluate(code, amount, period, 'Estonia');
          if (!d.ok) {
            expect(d.failure.code).toBe('NoValidLoan');
            continue;
          }
          expect(d.loanPeriod).toBeGreaterThanOrEqual(period);
          expect(d.loanPeriod).toBeLessThanOrEqual(config.maxPeriod);
          expect(d.loanAmount).toBeLessThanOrEqual(config.maxAmount);
          expect(d.loanAmount).toBeGreaterThanOrEqual(config.minAmount);
        }
      }
    }
  });

  test('debt segment is always rejected', () => {
    for (const prefix of ['000', '100', '249']) {
      const code = codeWithSerial(prefix);
      for (const amount of AMOUNTS) {
        for (const period of PERIODS) {
          const d = engine.evaluate(code, amount, period, 'Estonia');
          expect(d.ok ? 'approved' : d.failure.code).toBe('NoValidLoan');
        }
      }
    }
  });

  test('amounts outside the bounds are invalid for any period', () => {
    const code = codeWithSerial('750');
    for (const amount of [0, 1999, 10001, 50000]) {
      for (const period of PERIODS) {
        const d = engine.evaluate(code, amount, period, 'Estonia');
        expect(d.ok ? 'approved' : d.failure.code).toBe('InvalidAmount');
      }
    }
  });

  test('periods outside the bounds are invalid for any amount', () => {
    const code = codeWithSerial('750');
    for (const period of [0, 6, 11, 61, 72]) {
      for (const amount of AMOUNTS) {
        const d = engine.evaluate(code, amount, period, 'Estonia');
        expect(d.ok ? 'approved' : d.failure.code).toBe('InvalidPeriod');
      }
    }
  });

  test('segment 1 with a small maximum period finds no loan', () => {
    const tight = createDecisionEngine({ config: parseDecisionConfig({ maxPeriod: 19 }, {}), clock: () => NOW });
    const d = tight.evaluate(codeWithSerial('300'), 5000, 12, 'Estonia');
    expect(d.ok ? 'approved' : d.failure.code).toBe('NoValidLoan');
  });
});
