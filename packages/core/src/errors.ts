/**
 * Error types raised by the VizBot pipeline.
 *
 * Every error carries a stable `code` and a short `userMessage` that a
 * presentation layer can show as-is. All of them are recoverable at the
 * UI boundary: the user may rephrase and retry.
 */

export type VizErrorCode =
  | 'CONNECTION_FAILED'
  | 'EMPTY_SCHEMA'
  | 'TRANSLATION_FAILED'
  | 'SQL_PARSE_FAILED'
  | 'UNSAFE_STATEMENT'
  | 'SCHEMA_MISMATCH'
  | 'INVALID_STATE'
  | 'QUERY_TIMEOUT'
  | 'QUERY_FAILED'
  | 'CANCELLED'
  | 'INVALID_CONFIG';

export class VizError extends Error {
  readonly code: VizErrorCode;
  readonly userMessage: string;

  constructor(code: VizErrorCode, message: string, userMessage?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.userMessage = userMessage ?? message;
  }
}

export function isVizError(err: unknown): err is VizError {
  return err instanceof VizError;
}

export class ConnectionError extends VizError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION_FAILED', message, 'The database could not be reached.', options);
  }
}

export class EmptySchemaError extends VizError {
  constructor(schemas: readonly string[]) {
    super(
      'EMPTY_SCHEMA',
      `No tables visible in schema(s): ${schemas.join(', ')}`,
      'The database has no tables to query.',
    );
  }
}

export class TranslationError extends VizError {
  readonly attempts: number;
  readonly lastReason: string;

  constructor(attempts: number, lastReason: string, options?: { cause?: unknown }) {
    super(
      'TRANSLATION_FAILED',
      `Could not translate the question after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastReason}`,
      'The question could not be turned into a query. Try rephrasing it.',
      options,
    );
    this.attempts = attempts;
    this.lastReason = lastReason;
  }
}

export class SqlParseError extends VizError {
  constructor(reason: string) {
    super('SQL_PARSE_FAILED', reason, 'The generated query is not valid SQL.');
  }
}

export class UnsafeStatementError extends VizError {
  readonly offending: string;

  constructor(offending: string, reason: string) {
    super('UNSAFE_STATEMENT', reason, 'Only read-only questions are supported.');
    this.offending = offending;
  }
}

export class SchemaMismatchError extends VizError {
  readonly identifiers: string[];

  constructor(identifiers: string[]) {
    super(
      'SCHEMA_MISMATCH',
      `Unknown identifier(s): ${identifiers.join(', ')}`,
      'The query refers to tables or columns that do not exist.',
    );
    this.identifiers = identifiers;
  }
}

export class InvalidStateError extends VizError {
  constructor(message = 'Only validated SQL can be executed.') {
    super('INVALID_STATE', message);
  }
}

export class QueryTimeoutError extends VizError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(
      'QUERY_TIMEOUT',
      `Statement exceeded the ${timeoutMs}ms timeout and was rolled back.`,
      'The query took too long. Try narrowing it down.',
    );
    this.timeoutMs = timeoutMs;
  }
}

export class QueryExecutionError extends VizError {
  readonly sqlState?: string;

  constructor(message: string, sqlState?: string, options?: { cause?: unknown }) {
    super('QUERY_FAILED', message, 'The database rejected the query.', options);
    this.sqlState = sqlState;
  }
}

export class CancelledError extends VizError {
  constructor() {
    super('CANCELLED', 'Request was cancelled.');
  }
}

export class ConfigError extends VizError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('INVALID_CONFIG', `Invalid configuration: ${problems.join('; ')}`);
    this.problems = problems;
  }
}
