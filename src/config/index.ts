import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../decision/errors.js';
import type { DecisionConfig } from '../decision/types.js';

export const DEFAULT_CONFIG: DecisionConfig = deepFreeze({
  minAmount: 2000,
  maxAmount: 10000,
  minPeriod: 12,
  maxPeriod: 60,
  ageOfMajority: 18,
  segmentModifiers: { Segment1: 100, Segment2: 300, Segment3: 1000 },
  lifeExpectancy: { Estonia: 78, Latvia: 75, Lithuania: 76 },
  verifyChecksum: true,
});

const positiveInt = z.number().int().positive();
const years = z.number().positive();

const segmentSchema = z.object({
  Segment1: positiveInt,
  Segment2: positiveInt,
  Segment3: positiveInt,
}).strict();

const lifeSchema = z.object({
  Estonia: years,
  Latvia: years,
  Lithuania: years,
}).strict();

const baseSchema = z.object({
  minAmount: positiveInt,
  maxAmount: positiveInt,
  minPeriod: positiveInt,
  maxPeriod: positiveInt,
  ageOfMajority: z.number().int().min(0),
  segmentModifiers: segmentSchema,
  lifeExpectancy: lifeSchema,
  verifyChecksum: z.boolean(),
}).strict();

// config files may set any subset; nested maps merge key by key
const fileSchema = baseSchema.extend({
  segmentModifiers: segmentSchema.partial(),
  lifeExpectancy: lifeSchema.partial(),
}).partial();

const configSchema = baseSchema
  .refine((c) => c.minAmount <= c.maxAmount, { message: 'minAmount must not exceed maxAmount', path: ['minAmount'] })
  .refine((c) => c.minPeriod <= c.maxPeriod, { message: 'minPeriod must not exceed maxPeriod', path: ['minPeriod'] });

const ENV_NUMBERS = {
  DECISION_MIN_AMOUNT: 'minAmount',
  DECISION_MAX_AMOUNT: 'maxAmount',
  DECISION_MIN_PERIOD: 'minPeriod',
  DECISION_MAX_PERIOD: 'maxPeriod',
  DECISION_AGE_OF_MAJORITY: 'ageOfMajority',
} as const;

type Env = Record<string, string | undefined>;

function deepFreeze(c: DecisionConfig): DecisionConfig {
  Object.freeze(c.segmentModifiers);
  Object.freeze(c.lifeExpectancy);
  return Object.freeze(c);
}

function issuesOf(err: z.ZodError): string[] {
  return err.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
}

function parseBool(v: string): boolean | string {
  const s = v.trim().toLowerCase();
  if (s === 'true' || s === '1') return true;
  if (s === 'false' || s === '0') return false;
  return v; // left for the schema to reject
}

export function envOverrides(env: Env): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(ENV_NUMBERS)) {
    const raw = env[key];
    if (raw !== undefined && raw.trim() !== '') out[field] = Number(raw);
  }
  const checksum = env.DECISION_VERIFY_CHECKSUM;
  if (checksum !== undefined && checksum.trim() !== '') out.verifyChecksum = parseBool(checksum);
  return out;
}

/**
 * Defaults, then `input` (a parsed config file), then env overrides.
 * The result is validated and frozen.
 */
export function parseDecisionConfig(input: unknown = {}, env: Env = process.env): DecisionConfig {
  const file = fileSchema.safeParse(input);
  if (!file.success) throw new ConfigError(issuesOf(file.error));
  const merged = {
    ...DEFAULT_CONFIG,
    ...file.data,
    segmentModifiers: { ...DEFAULT_CONFIG.segmentModifiers, ...file.data.segmentModifiers },
    lifeExpectancy: { ...DEFAULT_CONFIG.lifeExpectancy, ...file.data.lifeExpectancy },
    ...envOverrides(env),
  };
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) throw new ConfigError(issuesOf(parsed.error));
  return deepFreeze(parsed.data);
}

export function configPath(env: Env = process.env): string {
  return env.DECISION_CONFIG
    ? path.resolve(env.DECISION_CONFIG)
    : path.resolve(process.cwd(), 'config', 'decision.json');
}

let cfg: DecisionConfig | null = null;

// For testing: reset the cache
export function resetConfigCache() {
  cfg = null;
}

export function loadDecisionConfig(file: string = configPath(), env: Env = process.env): DecisionConfig {
  let raw: unknown = {};
  if (fs.existsSync(file)) {
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (err) {
      throw new ConfigError([`${file}: ${err instanceof Error ? err.message : String(err)}`]);
    }
  }
  cfg = parseDecisionConfig(raw, env);
  return cfg;
}

export function getDecisionConfig(): DecisionConfig {
  return cfg ?? loadDecisionConfig();
}
