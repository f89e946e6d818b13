/**
 * SQL/JSON statement builders.
 *
 * Documents live in a two-column table: a `VARCHAR2` primary key holding the
 * document `_id` and a native `JSON` column stored as OSON. Paths are written
 * as SQL/JSON path expressions with every field step quoted, and go into the
 * statement text as literals because Oracle does not bind path expressions.
 *
 * @module sql
 */

import { parsePath } from '@latency-lab/core';

/** Result column holding a serialized document */
export const DOCUMENT_COLUMN = 'DOC';

const IDENTIFIER = /^[A-Za-z][A-Za-z0-9_$#]{0,127}$/;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

function identifier(name: string): string {
  if (!isIdentifier(name)) throw new Error(`Invalid SQL identifier: ${name}`);
  return name;
}

/**
 * Quote text as a SQL string literal
 */
export function sqlLiteral(text: string): string {
  return `'${text.replaceAll("'", "''")}'`;
}

/**
 * SQL/JSON path for a dotted document path. A path that already starts
 * with `$` is taken as written.
 *
 * @example
 * ```typescript
 * toJsonPath('customer.tags[1]'); // $."customer"."tags"[1]
 * ```
 */
export function toJsonPath(path: string): string {
  if (path.startsWith('$')) return path;
  return parsePath(path).reduce<string>((jsonPath, segment) => {
    if (typeof segment === 'number') return `${jsonPath}[${segment}]`;
    return `${jsonPath}."${segment.replaceAll('\\', '\\\\').replaceAll('"', '\\"')}"`;
  }, '$');
}

/** Result column alias for the projected path at `index` */
export function fieldAlias(index: number): string {
  return `F${index}`;
}

function jsonValue(path: string): string {
  return `JSON_VALUE(doc, ${sqlLiteral(toJsonPath(path))})`;
}

export function createTableSql(table: string): string {
  return `CREATE TABLE ${identifier(table)} (id VARCHAR2(255) PRIMARY KEY, doc JSON)`;
}

export function dropTableSql(table: string): string {
  return `DROP TABLE ${identifier(table)} PURGE`;
}

/**
 * Default index name: the table and fields joined, cut to 128 characters
 */
export function indexName(table: string, fields: readonly string[]): string {
  return [table, ...fields, 'idx'].join('_').replace(/[^A-Za-z0-9_]/g, '_').slice(0, 128);
}

/** Function-based index over the scalar value at each path */
export function createIndexSql(table: string, name: string, fields: readonly string[]): string {
  return `CREATE INDEX ${identifier(name)} ON ${identifier(table)} (${fields.map(jsonValue).join(', ')})`;
}

/** Binds: `:1` id, `:2` document text */
export function insertSql(table: string): string {
  return `INSERT INTO ${identifier(table)} (id, doc) VALUES (:1, JSON(:2))`;
}

/** Binds: `:1` id */
export function selectDocumentSql(table: string): string {
  return `SELECT JSON_SERIALIZE(doc RETURNING CLOB) AS ${DOCUMENT_COLUMN} FROM ${identifier(table)} WHERE id = :1`;
}

/**
 * Select the id and the JSON text at each path, one column per path.
 * Binds: `:1` id.
 */
export function selectPathsSql(table: string, paths: readonly string[]): string {
  const columns = paths.map(
    (path, index) => `JSON_QUERY(doc, ${sqlLiteral(toJsonPath(path))} RETURNING CLOB) AS ${fieldAlias(index)}`
  );
  return `SELECT id, ${columns.join(', ')} FROM ${identifier(table)} WHERE id = :1`;
}

/** Binds: `:1` new value as JSON text, `:2` id */
export function updatePathSql(table: string, path: string): string {
  return (
    `UPDATE ${identifier(table)} SET doc = JSON_TRANSFORM(doc, SET ${sqlLiteral(toJsonPath(path))} = :1 FORMAT JSON) ` +
    'WHERE id = :2'
  );
}

/** Binds: `:1` id */
export function deleteSql(table: string): string {
  return `DELETE FROM ${identifier(table)} WHERE id = :1`;
}

/**
 * Filter, order and window for a document query
 */
export interface DocumentQuery {
  /** Equality on the scalar at a path; `null` matches a missing value too */
  where: readonly { path: string; value: string | number | boolean | null }[];
  orderBy: readonly { path: string; descending: boolean }[];
  offset?: number;
  limit?: number;
}

/**
 * Select matching documents as JSON text. Equality values, offset and limit
 * are bound in that order.
 */
export function selectDocumentsSql(
  table: string,
  query: DocumentQuery
): { sql: string; binds: (string | number)[] } {
  const binds: (string | number)[] = [];
  const bind = (value: string | number): string => {
    binds.push(value);
    return `:${binds.length}`;
  };

  let sql = `SELECT JSON_SERIALIZE(doc RETURNING CLOB) AS ${DOCUMENT_COLUMN} FROM ${identifier(table)}`;
  if (query.where.length > 0) {
    const conditions = query.where.map(({ path, value }) =>
      value === null ? `${jsonValue(path)} IS NULL` : `${jsonValue(path)} = ${bind(String(value))}`
    );
    sql += ` WHERE ${conditions.join(' AND ')}`;
  }
  if (query.orderBy.length > 0) {
    sql += ` ORDER BY ${query.orderBy.map(({ path, descending }) => `${jsonValue(path)} ${descending ? 'DESC' : 'ASC'}`).join(', ')}`;
  }
  if (query.offset !== undefined) {
    sql += ` OFFSET ${bind(query.offset)} ROWS`;
  }
  if (query.limit !== undefined) {
    sql += ` FETCH NEXT ${bind(query.limit)} ROWS ONLY`;
  }
  return { sql, binds };
}

export function explainPlanSql(statementId: string, sql: string): string {
  return `EXPLAIN PLAN SET STATEMENT_ID = ${sqlLiteral(statementId)} FOR ${sql}`;
}

/** Binds: `:1` statement id */
export const DISPLAY_PLAN_SQL = "SELECT PLAN_TABLE_OUTPUT FROM TABLE(DBMS_XPLAN.DISPLAY('PLAN_TABLE', :1, 'BASIC'))";
