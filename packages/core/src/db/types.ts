/**
 * Database-facing types for VizBot.
 *
 * The executor and introspector talk to PostgreSQL through the small
 * DbPool/DbSession seam below; `PgPool` implements it with `pg`, tests
 * implement it in-process.
 */

export interface SchemaSnapshot {
  tables: TableInfo[];
  capturedAt: Date;
}

export interface TableInfo {
  name: string;
  schema: string;
  columns: ColumnInfo[];
  rowCountEstimate?: number;
}

export interface ColumnInfo {
  name: string;
  dataType: string;
  nullable: boolean;
  isPrimaryKey: boolean;
}

export type ColumnKind = 'numeric' | 'temporal' | 'categorical' | 'boolean' | 'unknown';

export interface ColumnMeta {
  name: string;
  /** PostgreSQL type OID reported by the driver */
  pgType: number;
  kind: ColumnKind;
}

export type Row = Record<string, unknown>;

export interface ResultSet {
  columns: ColumnMeta[];
  rows: Row[];
  rowCount: number;
  truncated: boolean;
  execMs: number;
}

export interface RawField {
  name: string;
  dataTypeID: number;
}

export interface RawQueryResult {
  fields: RawField[];
  rows: Row[];
  rowCount: number | null;
}

/** A checked-out connection. Must be released exactly once. */
export interface DbSession {
  query(sql: string, params?: unknown[]): Promise<RawQueryResult>;
  /** Pass `destroy` to discard the connection instead of returning it to the pool */
  release(destroy?: boolean): void;
}

export interface DbPool {
  acquire(): Promise<DbSession>;
  end(): Promise<void>;
}
