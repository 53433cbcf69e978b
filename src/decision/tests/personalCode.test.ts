import { describe, test, expect } from '@jest/globals';
import { checkDigit, isValidPersonalCode, parsePersonalCode } from '../personalCode.js';

describe('personal code parsing', () => {
  test('reads birth date and segment key', () => {
    const res = parsePersonalCode('39001015007');
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.birthDate.format('YYYY-MM-DD')).toBe('1990-01-01');
    expect(res.segmentKey).toBe(5007);
  });

  test('century digit picks the century', () => {
    const year = (code: string) => {
      const res = parsePersonalCode(code);
      return res.ok ? res.birthDate.year() : null;
    };
    expect(year('19001017500')).toBe(1890);
    expect(year('39001017502')).toBe(1990);
    expect(year('45001015000')).toBe(1950);
    expect(year('51001017508')).toBe(2010);
    expect(year('89001017500')).toBe(2090);
  });

  test('leading zeros in the segment key', () => {
    const res = parsePersonalCode('39001010000');
    expect(res.ok && res.segmentKey).toBe(0);
  });

  test('rejects short codes', () => {
    expect(parsePersonalCode('3900101')).toEqual({ ok: false, code: 'MalformedIdentityCode', reason: 'length' });
    expect(parsePersonalCode('')).toEqual({ ok: false, code: 'MalformedIdentityCode', reason: 'length' });
  });

  test('rejects non-digit sections', () => {
    expect(parsePersonalCode('39001O15007')).toEqual({ ok: false, code: 'MalformedIdentityCode', reason: 'not_digits' });
    expect(parsePersonalCode('3900101500x')).toEqual({ ok: false, code: 'MalformedIdentityCode', reason: 'not_digits' });
  });

  test('rejects unknown century digits', () => {
    expect(parsePersonalCode('09001015007')).toEqual({ ok: false, code: 'MalformedIdentityCode', reason: 'century' });
    expect(parsePersonalCode('99001015007')).toEqual({ ok: false, code: 'MalformedIdentityCode', reason: 'century' });
  });

  test('rejects impossible dates', () => {
    for (const code of ['39013015007', '39001325007', '39002305007', '39000015007', '39102295007']) {
      expect(parsePersonalCode(code)).toEqual({ ok: false, code: 'MalformedIdentityCode', reason: 'date' });
    }
  });

  test('accepts leap day in a leap year', () => {
    const res = parsePersonalCode('50002295007');
    expect(res.ok && res.birthDate.format('YYYY-MM-DD')).toBe('2000-02-29');
  });
});

describe('personal code checksum', () => {
  test('first weight set', () => {
    expect(checkDigit('3900101500')).toBe(7);
    expect(checkDigit('3900101250')).toBe(6);
  });

  test('falls back to the second weight set on remainder 10', () => {
    // 3*1+7*2+6*3+0*4+5*5+0*6+3*7+0*8+0*9+6*1 = 87, 87 % 11 = 10
    expect(checkDigit('3760503006')).toBe(4);
  });

  test('valid codes', () => {
    expect(isValidPersonalCode('39001015007')).toBe(true);
    expect(isValidPersonalCode('37605030064')).toBe(true);
  });

  test('wrong check digit', () => {
    expect(isValidPersonalCode('39001015008')).toBe(false);
  });

  test('wrong shape', () => {
    expect(isValidPersonalCode('3900101500')).toBe(false);
    expect(isValidPersonalCode('390010150070')).toBe(false);
    expect(isValidPersonalCode('3900101500a')).toBe(false);
  });

  test('checksum alone is not enough when the date is impossible', () => {
    // 3901301500 -> check digit computed, but month 13
    const first10 = '3901301500';
    expect(isValidPersonalCode(first10 + String(checkDigit(first10)))).toBe(false);
  });
});
