/**
 * Environment-driven configuration.
 *
 * Values are read from the process environment (the CLI loads `.env`
 * first), coerced and defaulted by an AJV schema, then cross-checked.
 */

import { Ajv } from 'ajv';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { SAFE_DEFAULTS } from './db/defaults.js';
import { ConfigError } from './errors.js';

export interface VizConfig {
  databaseUrl?: string;
  openaiApiKey?: string;
  model: string;
  statementTimeoutMs: number;
  completionTimeoutMs: number;
  defaultLimit: number;
  maxRows: number;
  maxRetries: number;
  historyTurns: number;
  schemaTtlMs: number;
  schemaTokenBudget: number;
  schemas: string[];
  home: string;
  storePath: string;
  logLevel: string;
}

interface RawConfig {
  databaseUrl?: string;
  openaiApiKey?: string;
  model: string;
  statementTimeoutMs: number;
  completionTimeoutMs: number;
  defaultLimit: number;
  maxRows: number;
  maxRetries: number;
  historyTurns: number;
  schemaTtlMs: number;
  schemaTokenBudget: number;
  schemas: string;
  home?: string;
  logLevel: string;
}

export const DEFAULT_MODEL = 'gpt-4o-mini';

const ENV_KEYS: Record<keyof RawConfig, string> = {
  databaseUrl: 'DATABASE_URL',
  openaiApiKey: 'OPENAI_API_KEY',
  model: 'VIZBOT_MODEL',
  statementTimeoutMs: 'VIZBOT_STATEMENT_TIMEOUT_MS',
  completionTimeoutMs: 'VIZBOT_COMPLETION_TIMEOUT_MS',
  defaultLimit: 'VIZBOT_DEFAULT_LIMIT',
  maxRows: 'VIZBOT_MAX_ROWS',
  maxRetries: 'VIZBOT_MAX_RETRIES',
  historyTurns: 'VIZBOT_HISTORY_TURNS',
  schemaTtlMs: 'VIZBOT_SCHEMA_TTL_MS',
  schemaTokenBudget: 'VIZBOT_SCHEMA_TOKEN_BUDGET',
  schemas: 'VIZBOT_SCHEMAS',
  home: 'VIZBOT_HOME',
  logLevel: 'LOG_LEVEL',
};

const configSchema = {
  type: 'object',
  properties: {
    databaseUrl: { type: 'string', minLength: 1 },
    openaiApiKey: { type: 'string', minLength: 1 },
    model: { type: 'string', minLength: 1, default: DEFAULT_MODEL },
    statementTimeoutMs: { type: 'integer', minimum: 100, default: SAFE_DEFAULTS.statementTimeoutMs },
    completionTimeoutMs: { type: 'integer', minimum: 1000, default: SAFE_DEFAULTS.completionTimeoutMs },
    defaultLimit: { type: 'integer', minimum: 1, default: SAFE_DEFAULTS.defaultLimit },
    maxRows: { type: 'integer', minimum: 1, default: SAFE_DEFAULTS.maxRows },
    maxRetries: { type: 'integer', minimum: 0, maximum: 5, default: SAFE_DEFAULTS.maxRetries },
    historyTurns: { type: 'integer', minimum: 0, maximum: 20, default: SAFE_DEFAULTS.historyTurns },
    schemaTtlMs: { type: 'integer', minimum: 0, default: SAFE_DEFAULTS.schemaTtlMs },
    schemaTokenBudget: { type: 'integer', minimum: 100, default: SAFE_DEFAULTS.schemaTokenBudget },
    schemas: { type: 'string', minLength: 1, default: 'public' },
    home: { type: 'string', minLength: 1 },
    logLevel: {
      type: 'string',
      enum: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      default: 'warn',
    },
  },
  required: [
    'model',
    'statementTimeoutMs',
    'completionTimeoutMs',
    'defaultLimit',
    'maxRows',
    'maxRetries',
    'historyTurns',
    'schemaTtlMs',
    'schemaTokenBudget',
    'schemas',
    'logLevel',
  ],
  additionalProperties: false,
} as const;

const ajv = new Ajv({ allErrors: true, coerceTypes: true, useDefaults: true });
const validateRaw = ajv.compile<RawConfig>(configSchema);

function isConfigKey(key: string): key is keyof RawConfig {
  return Object.hasOwn(ENV_KEYS, key);
}

export function defaultHome(): string {
  return join(homedir(), '.vizbot');
}

/**
 * Build a validated configuration from environment variables.
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VizConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName]?.trim();
    if (value) raw[key] = value;
  }

  if (!validateRaw(raw)) {
    const problems = (validateRaw.errors ?? []).map((e) => {
      const key = e.instancePath.replace(/^\//, '');
      const envName = isConfigKey(key) ? ENV_KEYS[key] : key || '(root)';
      return `${envName} ${e.message ?? 'is invalid'}`;
    });
    throw new ConfigError(problems);
  }

  if (raw.defaultLimit > raw.maxRows) {
    throw new ConfigError([
      `VIZBOT_DEFAULT_LIMIT (${raw.defaultLimit}) must not exceed VIZBOT_MAX_ROWS (${raw.maxRows})`,
    ]);
  }

  const home = raw.home ?? defaultHome();
  return {
    databaseUrl: raw.databaseUrl,
    openaiApiKey: raw.openaiApiKey,
    model: raw.model,
    statementTimeoutMs: raw.statementTimeoutMs,
    completionTimeoutMs: raw.completionTimeoutMs,
    defaultLimit: raw.defaultLimit,
    maxRows: raw.maxRows,
    maxRetries: raw.maxRetries,
    historyTurns: raw.historyTurns,
    schemaTtlMs: raw.schemaTtlMs,
    schemaTokenBudget: raw.schemaTokenBudget,
    schemas: raw.schemas
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
    home,
    storePath: join(home, 'vizbot.db'),
    logLevel: raw.logLevel,
  };
}
