import type { Country } from './types.js';

export const COUNTRIES: readonly Country[] = ['Estonia', 'Latvia', 'Lithuania'];

// Unknown countries are scored against the Estonian life expectancy.
export const FALLBACK_COUNTRY: Country = 'Estonia';

export type ResolvedCountry = { country: Country; fallback: boolean };

export function resolveCountry(raw: string): ResolvedCountry {
  const needle = raw.trim().toLowerCase();
  const hit = COUNTRIES.find((c) => c.toLowerCase() === needle);
  if (hit) return { country: hit, fallback: false };
  return { country: FALLBACK_COUNTRY, fallback: true };
}
