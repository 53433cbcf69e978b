import dayjs from 'dayjs';
import type { Dayjs } from 'dayjs';
import type { Country, DecisionConfig } from './types.js';

export type Age = { years: number; months: number; days: number };

export type AgeCheck =
  | { eligible: true; age: Age }
  | { eligible: false; age: Age; rule: 'minimum-age' | 'maximum-age-at-maturity' };

function monthIndex(d: Dayjs): number {
  return d.year() * 12 + d.month();
}

/**
 * Calendar age from `birth` to `now`. A month counts only once its day of
 * month is reached; the day remainder is measured from that anniversary.
 * Negative for birth dates after `now`.
 */
export function ageBetween(birth: Dayjs, now: Dayjs): Age {
  const start = birth.startOf('day');
  const end = now.startOf('day');
  let totalMonths = monthIndex(end) - monthIndex(start);
  let days = end.date() - start.date();
  if (totalMonths > 0 && days < 0) {
    totalMonths--;
    days = end.diff(start.add(totalMonths, 'month'), 'day');
  } else if (totalMonths < 0 && days > 0) {
    totalMonths++;
    days -= end.daysInMonth();
  }
  return {
    years: Math.trunc(totalMonths / 12),
    months: totalMonths % 12,
    days,
  };
}

export function fractionalYears(age: Age): number {
  return age.years + age.months / 12 + age.days / 365;
}

export function checkAge(
  args: { birthDate: Dayjs; periodMonths: number; country: Country; now: Date },
  config: Pick<DecisionConfig, 'ageOfMajority' | 'lifeExpectancy'>,
): AgeCheck {
  const age = ageBetween(args.birthDate, dayjs(args.now));
  if (age.years < config.ageOfMajority) return { eligible: false, age, rule: 'minimum-age' };
  // only whole years of the loan term count toward maturity age
  const atMaturity = fractionalYears(age) + Math.trunc(args.periodMonths / 12);
  if (atMaturity > config.lifeExpectancy[args.country]) {
    return { eligible: false, age, rule: 'maximum-age-at-maturity' };
  }
  return { eligible: true, age };
}
