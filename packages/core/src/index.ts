/**
 * @vizbot/core: barrel export
 *
 * Question-to-chart pipeline shared by the CLI and any other front end.
 */

// Errors
export {
  VizError,
  isVizError,
  ConnectionError,
  EmptySchemaError,
  TranslationError,
  SqlParseError,
  UnsafeStatementError,
  SchemaMismatchError,
  InvalidStateError,
  QueryTimeoutError,
  QueryExecutionError,
  CancelledError,
  ConfigError,
} from './errors.js';
export type { VizErrorCode } from './errors.js';

// Configuration
export { loadConfig, defaultHome, DEFAULT_MODEL } from './config.js';
export type { VizConfig } from './config.js';
export { SAFE_DEFAULTS } from './db/defaults.js';

// Logging
export { logger, setLogLevel } from './util/logger.js';

// Database types
export type {
  SchemaSnapshot,
  TableInfo,
  ColumnInfo,
  ColumnKind,
  ColumnMeta,
  Row,
  ResultSet,
  RawField,
  RawQueryResult,
  DbSession,
  DbPool,
} from './db/types.js';

// Connection, introspection, execution
export { PgPool, acquireSession } from './db/pool.js';
export type { PgPoolOptions } from './db/pool.js';
export { fetchSchema } from './db/introspect.js';
export type { FetchSchemaOptions } from './db/introspect.js';
export { SchemaCache } from './db/schema-cache.js';
export type { SchemaFetcher, SchemaCacheOptions } from './db/schema-cache.js';
export { executeCandidate } from './db/execute.js';
export type { ExecuteOptions } from './db/execute.js';
export { shapeResult, kindForType } from './db/result.js';

// Policy
export type {
  PolicyConfig,
  CandidateSource,
  GenerationInfo,
  UnvalidatedCandidate,
  ValidatedCandidate,
  CandidateSQL,
} from './policy/types.js';
export { defaultPolicyConfig, createCandidate } from './policy/types.js';
export { SqlValidator, isValidated, validateCandidate } from './policy/engine.js';
export type { CandidateValidator } from './policy/engine.js';
export { parseSql, normalizeSql } from './policy/parse.js';
export type { ParseResult, ParseOutcome, SqlKind } from './policy/parse.js';
export { findForbiddenKeyword, checkSelectAst, FORBIDDEN_KEYWORDS } from './policy/rules.js';
export type { RuleViolation } from './policy/rules.js';
export { resolveIdentifiers } from './policy/identifiers.js';
export type { IdentifierReport } from './policy/identifiers.js';
export { ensureLimit } from './policy/rewrite.js';
export type { LimitRewrite } from './policy/rewrite.js';

// Completion and translation
export * from './llm/index.js';
export { Translator, translate } from './translate.js';
export type { TranslationRequest, TranslatorOptions } from './translate.js';

// Visualization
export type { ChartKind, ChartSpec, ChartEncoding, ChartOptions, EncodingChannel, EncodingType, Aggregate } from './viz/types.js';
export { CHART_KINDS } from './viz/types.js';
export { chooseChart, titleFor, DEFAULT_BAR_MAX_ROWS } from './viz/chart.js';
export type { ChooseChartOptions } from './viz/chart.js';
export { detectChartIntent } from './viz/intent.js';
export { profileColumns } from './viz/profile.js';
export type { ColumnProfile, ColumnRole } from './viz/profile.js';
export { toVegaLite, VEGA_LITE_SCHEMA } from './viz/vega.js';
export type { VegaLiteSpec } from './viz/vega.js';

// Insight
export { summarize, describeResult, NO_DATA_INSIGHT, NO_INSIGHT } from './insight/summarize.js';
export type { SummarizeOptions } from './insight/summarize.js';

// Session
export { VizSession } from './session.js';
export type {
  VizSessionOptions,
  VizSessionDeps,
  RequestOptions,
  RunOptions,
  RunOutput,
  AskOptions,
  AskResult,
} from './session.js';

// Local storage
export { LocalStore, defaultDbPath, IN_MEMORY } from './storage/sqlite.js';
export type { AuditEvent } from './storage/sqlite.js';
export {
  createQuery,
  storeGeneration,
  storeRun,
  listHistory,
  getHistoryItem,
  recentTurns,
} from './storage/repo.js';
export type {
  QuerySource,
  RunStatus,
  StoredGeneration,
  StoredRun,
  HistoryItem,
  HistoryListItem,
  HistoryDetail,
} from './storage/repo.js';
