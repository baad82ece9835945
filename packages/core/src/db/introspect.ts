/**
 * Schema introspection for PostgreSQL: tables, views, columns and
 * primary keys, read from information_schema.
 */

import type { DbPool, SchemaSnapshot, TableInfo } from './types.js';
import { ConnectionError, EmptySchemaError } from '../errors.js';
import { errorMessage, isConnectionFailure } from './pg-errors.js';
import { acquireSession } from './pool.js';
import { schemaLogger } from '../util/logger.js';

export interface FetchSchemaOptions {
  /** Schemas to read. Defaults to `['public']`. */
  schemas?: string[];
}

const TABLES_SQL = `
  SELECT t.table_schema, t.table_name,
         c.reltuples::bigint AS row_estimate
  FROM information_schema.tables t
  LEFT JOIN pg_namespace n ON n.nspname = t.table_schema
  LEFT JOIN pg_class c ON c.relname = t.table_name AND c.relnamespace = n.oid
  WHERE t.table_schema = ANY($1::text[])
    AND t.table_type IN ('BASE TABLE', 'VIEW')
  ORDER BY t.table_schema, t.table_name
`;

const COLUMNS_SQL = `
  SELECT c.table_schema, c.table_name, c.column_name, c.data_type,
         c.is_nullable,
         CASE WHEN pk.column_name IS NOT NULL THEN true ELSE false END AS is_pk
  FROM information_schema.columns c
  LEFT JOIN (
    SELECT ku.table_schema, ku.table_name, ku.column_name
    FROM information_schema.table_constraints tc
    JOIN information_schema.key_column_usage ku
      ON tc.constraint_name = ku.constraint_name
      AND tc.table_schema = ku.table_schema
    WHERE tc.constraint_type = 'PRIMARY KEY'
  ) pk ON pk.table_schema = c.table_schema
      AND pk.table_name = c.table_name
      AND pk.column_name = c.column_name
  WHERE c.table_schema = ANY($1::text[])
  ORDER BY c.table_schema, c.table_name, c.ordinal_position
`;

/**
 * Read a SchemaSnapshot.
 *
 * @throws ConnectionError when the database cannot be reached
 * @throws EmptySchemaError when no table is visible
 */
export async function fetchSchema(db: DbPool, opts: FetchSchemaOptions = {}): Promise<SchemaSnapshot> {
  const schemas = opts.schemas && opts.schemas.length > 0 ? opts.schemas : ['public'];

  const session = await acquireSession(db);
  const start = performance.now();
  try {
    const tablesRes = await session.query(TABLES_SQL, [schemas]);
    const colsRes = await session.query(COLUMNS_SQL, [schemas]);

    const tableMap = new Map<string, TableInfo>();
    for (const row of tablesRes.rows) {
      const schema = String(row.table_schema);
      const name = String(row.table_name);
      const estimate = Number(row.row_estimate);
      tableMap.set(`${schema}.${name}`, {
        name,
        schema,
        columns: [],
        // reltuples is -1 for tables that were never analyzed
        rowCountEstimate: Number.isFinite(estimate) && estimate >= 0 ? estimate : undefined,
      });
    }

    for (const row of colsRes.rows) {
      const table = tableMap.get(`${String(row.table_schema)}.${String(row.table_name)}`);
      if (!table) continue;
      table.columns.push({
        name: String(row.column_name),
        dataType: String(row.data_type),
        nullable: row.is_nullable === 'YES',
        isPrimaryKey: row.is_pk === true,
      });
    }

    const tables = Array.from(tableMap.values());
    if (tables.length === 0) {
      throw new EmptySchemaError(schemas);
    }

    schemaLogger.info('schema fetched', {
      tables: tables.length,
      columns: tables.reduce((n, t) => n + t.columns.length, 0),
      ms: Math.round(performance.now() - start),
    });
    return { tables, capturedAt: new Date() };
  } catch (err: unknown) {
    if (err instanceof EmptySchemaError) throw err;
    if (isConnectionFailure(err)) {
      throw new ConnectionError(`Connection lost during introspection: ${errorMessage(err)}`, { cause: err });
    }
    throw err;
  } finally {
    session.release();
  }
}
