/**
 * Wires config into the pipeline for one command invocation.
 */

import {
  LocalStore,
  type CompletionProvider,
  OpenAIProvider,
  PgPool,
  SchemaCache,
  VizSession,
  fetchSchema,
  type VizConfig,
} from '@vizbot/core';
import { usageError } from './errors.js';

export function openStore(config: VizConfig): LocalStore {
  const store = new LocalStore(config.storePath);
  store.migrate();
  return store;
}

export function openPool(config: VizConfig): PgPool {
  if (!config.databaseUrl) {
    throw usageError('DATABASE_URL is not set. Add it to your shell or .env file.', 'NOT_CONFIGURED');
  }
  return new PgPool({ connectionString: config.databaseUrl });
}

export function openProvider(config: VizConfig): CompletionProvider {
  if (!config.openaiApiKey) {
    throw usageError('OPENAI_API_KEY is not set. Add it to your shell or .env file.', 'NOT_CONFIGURED');
  }
  return new OpenAIProvider({
    apiKey: config.openaiApiKey,
    model: config.model,
    timeoutMs: config.completionTimeoutMs,
  });
}

/** For commands that run hand-written SQL only. */
const noModel: CompletionProvider = {
  name: 'none',
  complete: async () => {
    throw usageError('OPENAI_API_KEY is not set. Add it to your shell or .env file.', 'NOT_CONFIGURED');
  },
};

export interface SessionContext {
  session: VizSession;
  store: LocalStore;
  close(): Promise<void>;
}

/**
 * Pool, completion provider and store for a session. `close` must run
 * once the command is done, or the pool keeps the process alive.
 */
export function openSession(config: VizConfig, opts: { sessionId?: string; needsModel?: boolean } = {}): SessionContext {
  const provider = opts.needsModel === false ? noModel : openProvider(config);
  const pool = openPool(config);
  const store = openStore(config);
  const schemaCache = new SchemaCache(() => fetchSchema(pool, { schemas: config.schemas }), {
    ttlMs: config.schemaTtlMs,
  });

  const session = new VizSession(
    { db: pool, provider, store, schemaCache },
    {
      sessionId: opts.sessionId,
      schemaTokenBudget: config.schemaTokenBudget,
      defaultLimit: config.defaultLimit,
      maxRows: config.maxRows,
      maxRetries: config.maxRetries,
      historyTurns: config.historyTurns,
      statementTimeoutMs: config.statementTimeoutMs,
    },
  );

  return {
    session,
    store,
    close: async () => {
      store.close();
      await pool.end();
    },
  };
}
