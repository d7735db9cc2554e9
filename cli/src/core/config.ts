/**
 * Routing configuration: named defaults plus environment overrides.
 *
 * The scoring weights and result caps are empirical; they live here so a
 * deployment with a larger tool catalog can tune them without code changes.
 */
import { z } from 'zod';

export interface RoutingSettings {
  /** Keyword-path suggestions kept after ranking. */
  maxSuggestions: number;
  /** Clarify when fewer recognized keywords than this and no candidate tools. */
  clarifyBelowKeywords: number;
  /** Minimum fuzzy score (0-100) for typo recovery. */
  fuzzyThreshold: number;
  /** Added per query keyword that is also a part of the tool name. */
  nameOverlapWeight: number;
  /** Added once when an action verb matches the tool name suffix. */
  actionVerbBonus: number;
}

export const ROUTING_DEFAULTS: Readonly<RoutingSettings> = Object.freeze({
  maxSuggestions: 5,
  clarifyBelowKeywords: 2,
  fuzzyThreshold: 80,
  nameOverlapWeight: 0.5,
  actionVerbBonus: 0.5,
});

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

const envSchema = z.object({
  LEDGER_ROUTER_MAX_SUGGESTIONS: z.coerce.number().int().positive().optional(),
  LEDGER_ROUTER_CLARIFY_BELOW: z.coerce.number().int().min(0).optional(),
  LEDGER_ROUTER_FUZZY_THRESHOLD: z.coerce.number().min(0).max(100).optional(),
  LEDGER_ROUTER_NAME_WEIGHT: z.coerce.number().min(0).optional(),
  LEDGER_ROUTER_VERB_BONUS: z.coerce.number().min(0).optional(),
});

/** Drop blank values so `VAR=` behaves like an unset variable. */
function presentOnly(env: Env): Env {
  const out: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

/**
 * Resolve routing settings from environment variables over the defaults.
 * Throws ConfigError naming every invalid variable.
 */
export function loadRoutingSettings(env: Env = process.env): RoutingSettings {
  const parsed = envSchema.safeParse(presentOnly(env));
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid routing configuration: ${fields.join('; ')}`);
  }
  const e = parsed.data;
  return {
    maxSuggestions: e.LEDGER_ROUTER_MAX_SUGGESTIONS ?? ROUTING_DEFAULTS.maxSuggestions,
    clarifyBelowKeywords: e.LEDGER_ROUTER_CLARIFY_BELOW ?? ROUTING_DEFAULTS.clarifyBelowKeywords,
    fuzzyThreshold: e.LEDGER_ROUTER_FUZZY_THRESHOLD ?? ROUTING_DEFAULTS.fuzzyThreshold,
    nameOverlapWeight: e.LEDGER_ROUTER_NAME_WEIGHT ?? ROUTING_DEFAULTS.nameOverlapWeight,
    actionVerbBonus: e.LEDGER_ROUTER_VERB_BONUS ?? ROUTING_DEFAULTS.actionVerbBonus,
  };
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** LOG_LEVEL if valid; silent under the test runner; info otherwise. */
export function resolveLogLevel(env: Env = process.env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return env.VITEST ? 'silent' : 'info';
}
