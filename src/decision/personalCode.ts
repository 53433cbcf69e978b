// Personal identity codes: GYYMMDDSSSC
//   G    century (and sex) digit
//   YYMMDD birth date
//   SSS  serial, C check digit
// The last four characters double as the credit segment key.

import dayjs from 'dayjs';
import type { Dayjs } from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';

dayjs.extend(customParseFormat);

export const CODE_LENGTH = 11;

const DIGITS = /^\d+$/;

const CENTURY: Record<string, number> = {
  '1': 1800, '2': 1800,
  '3': 1900, '4': 1900,
  '5': 2000, '6': 2000, '7': 2000, '8': 2000,
};

const WEIGHTS_1 = [1, 2, 3, 4, 5, 6, 7, 8, 9, 1];
const WEIGHTS_2 = [3, 4, 5, 6, 7, 8, 9, 1, 2, 3];

export type ParsedPersonalCode = {
  ok: true;
  birthDate: Dayjs;
  segmentKey: number; // 0..9999
};

export type PersonalCodeErr = {
  ok: false;
  code: 'MalformedIdentityCode';
  reason: 'length' | 'not_digits' | 'century' | 'date';
};

function bad(reason: PersonalCodeErr['reason']): PersonalCodeErr {
  return { ok: false, code: 'MalformedIdentityCode', reason };
}

export function parseBirthDate(code: string): Dayjs | PersonalCodeErr['reason'] {
  const head = code.slice(0, 7);
  if (head.length < 7) return 'length';
  if (!DIGITS.test(head)) return 'not_digits';
  const offset = CENTURY[head[0]];
  if (offset === undefined) return 'century';
  const year = offset + Number(head.slice(1, 3));
  // strict parse rejects month 13, day 32, Feb 30 and friends
  const date = dayjs(`${year}-${head.slice(3, 5)}-${head.slice(5, 7)}`, 'YYYY-MM-DD', true);
  return date.isValid() ? date : 'date';
}

export function parsePersonalCode(code: string): ParsedPersonalCode | PersonalCodeErr {
  if (code.length < CODE_LENGTH) return bad('length');
  const tail = code.slice(-4);
  if (!DIGITS.test(tail)) return bad('not_digits');
  const birthDate = parseBirthDate(code);
  if (typeof birthDate === 'string') return bad(birthDate);
  return { ok: true, birthDate, segmentKey: Number(tail) };
}

function weightedRemainder(digits: number[], weights: number[]): number {
  return digits.reduce((acc, d, i) => acc + d * weights[i], 0) % 11;
}

/** Check digit over the first ten digits of a code. */
export function checkDigit(first10: string): number {
  const digits = [...first10].map(Number);
  const r1 = weightedRemainder(digits, WEIGHTS_1);
  if (r1 < 10) return r1;
  const r2 = weightedRemainder(digits, WEIGHTS_2);
  return r2 < 10 ? r2 : 0;
}

export function isValidPersonalCode(code: string): boolean {
  if (code.length !== CODE_LENGTH || !DIGITS.test(code)) return false;
  if (!parsePersonalCode(code).ok) return false;
  return checkDigit(code.slice(0, 10)) === Number(code[10]);
}
