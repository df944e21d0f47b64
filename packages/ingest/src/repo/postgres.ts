import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import pg from "pg";
import type { Pool as PgPool, PoolConfig, QueryResultRow } from "pg";
import { describeError, PersistenceError } from "../lib/errors";
import { TABLES, unknownColumns, type TableName } from "./schema";
import type { RelationalStore, ResultRow, ResultValue, Row, SqlValue } from "./types";

export const SCHEMA_PATH = fileURLToPath(new URL("../../sql/schema.sql", import.meta.url));

const CONNECTION_CODES = new Set([
  "57P01",
  "57P02",
  "57P03",
  "53300",
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
]);

const errorCode = (error: unknown) => {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
};

/**
 * SQLSTATE class 08 and the admin-shutdown family mean the connection is gone;
 * everything else (constraint, type, value errors) concerns one record.
 */
export const isConnectionError = (error: unknown) => {
  const code = errorCode(error);
  if (code && (code.startsWith("08") || CONNECTION_CODES.has(code))) {
    return true;
  }
  return error instanceof Error && /connection terminated|not queryable|pool (?:after calling end|is ended)/i.test(error.message);
};

export const toPersistenceError = (table: string, error: unknown) => {
  if (error instanceof PersistenceError) {
    return error;
  }
  const scope = isConnectionError(error) ? "connection" : "record";
  return new PersistenceError(scope, table, `${table}: ${describeError(error)}`, error);
};

const toSqlValue = (value: unknown): SqlValue => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean" || value instanceof Date) {
    return value;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  return JSON.stringify(value);
};

const toResultValue = (value: unknown): ResultValue =>
  Array.isArray(value) ? value.map(toSqlValue) : toSqlValue(value);

const toResultRow = (row: QueryResultRow): ResultRow => {
  const result: ResultRow = {};
  for (const [column, value] of Object.entries(row)) {
    result[column] = toResultValue(value);
  }
  return result;
};

export class PostgresStore implements RelationalStore {
  private readonly pool: PgPool;

  constructor(config: PoolConfig) {
    this.pool = new pg.Pool(config);
  }

  private async execute<T extends QueryResultRow>(table: string, text: string, params: SqlValue[] | SqlValue[][]) {
    try {
      return await this.pool.query<T>(text, params);
    } catch (error) {
      throw toPersistenceError(table, error);
    }
  }

  async applySchema(path = SCHEMA_PATH) {
    const sql = await readFile(path, "utf-8");
    await this.execute("schema", sql, []);
    console.log("[postgres] schema applied");
  }

  async insert(table: TableName, fields: Row): Promise<number | null> {
    const definition = TABLES[table];
    const unknown = unknownColumns(table, fields);
    if (unknown.length) {
      throw new PersistenceError("record", table, `${table}: unknown columns ${unknown.join(", ")}`);
    }

    const columns = Object.keys(fields);
    const placeholders = columns.map((_, index) => `$${index + 1}`);
    const returning = definition.primaryKey ?? definition.naturalKey[0];
    const text =
      `INSERT INTO ${table} (${columns.join(", ")}) VALUES (${placeholders.join(", ")}) ` +
      `ON CONFLICT (${definition.naturalKey.join(", ")}) DO NOTHING RETURNING ${returning} AS id`;

    const result = await this.execute<{ id: number }>(
      table,
      text,
      columns.map((column) => fields[column] ?? null),
    );
    const [row] = result.rows;
    return row ? Number(row.id) : null;
  }

  async findIds(table: TableName, keyColumn: string, keys: string[]): Promise<Map<string, number>> {
    const definition = TABLES[table];
    if (!definition.primaryKey || !definition.columns.includes(keyColumn)) {
      throw new PersistenceError("record", table, `${table}: cannot look up ids by ${keyColumn}`);
    }
    const ids = new Map<string, number>();
    if (!keys.length) {
      return ids;
    }

    const result = await this.execute<{ id: number; key: string }>(
      table,
      `SELECT ${definition.primaryKey} AS id, ${keyColumn} AS key FROM ${table} WHERE ${keyColumn} = ANY($1)`,
      [keys],
    );
    for (const row of result.rows) {
      ids.set(row.key, Number(row.id));
    }
    return ids;
  }

  async query(sql: string, params: SqlValue[] = []): Promise<ResultRow[]> {
    const result = await this.execute("query", sql, params);
    return result.rows.map(toResultRow);
  }

  async close() {
    await this.pool.end();
  }
}
