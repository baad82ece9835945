/**
 * Safe session defaults for translation and query execution.
 * Every value can be overridden through the environment (see config.ts).
 */

export const SAFE_DEFAULTS = {
  /** LIMIT injected into queries missing one */
  defaultLimit: 1000,
  /** Hard cap on returned rows, and the LIMIT ceiling */
  maxRows: 5000,
  /** Statement timeout in milliseconds */
  statementTimeoutMs: 15_000,
  /** Completion call timeout in milliseconds */
  completionTimeoutMs: 60_000,
  /** Correction retries after the first completion */
  maxRetries: 2,
  /** Prior turns included in the prompt */
  historyTurns: 3,
  /** Approximate token budget for the schema summary */
  schemaTokenBudget: 1500,
  /** Schema snapshot time-to-live */
  schemaTtlMs: 300_000,
} as const;
