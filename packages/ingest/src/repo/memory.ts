import { PersistenceError, type PersistenceScope } from "../lib/errors";
import { TABLES, unknownColumns, type TableName } from "./schema";
import {
  objectUri,
  type ObjectBody,
  type ObjectStore,
  type RelationalStore,
  type ResultRow,
  type Row,
  type SqlValue,
} from "./types";

type InjectedFailure = {
  table: TableName;
  scope: PersistenceScope;
};

const keyOf = (row: Row, columns: string[]) =>
  columns.map((column) => String(row[column] ?? "")).join("\u0000");

/**
 * In-process stand-in for PostgreSQL with the same natural-key, NOT NULL and
 * foreign-key behaviour as sql/schema.sql.
 */
export class MemoryStore implements RelationalStore {
  readonly tables = new Map<TableName, Row[]>();
  closed = false;
  insertCalls = 0;
  private readonly sequences = new Map<TableName, number>();
  private readonly failures: InjectedFailure[] = [];
  private readonly queryResults = new Map<string, ResultRow[]>();
  readonly queries: Array<{ sql: string; params: SqlValue[] }> = [];

  rows(table: TableName): Row[] {
    return this.tables.get(table) ?? [];
  }

  /** Makes the next insert into `table` throw with the given scope. */
  failNextInsert(table: TableName, scope: PersistenceScope = "record") {
    this.failures.push({ table, scope });
  }

  /** There is no SQL engine here: `query` answers with the rows registered for the statement. */
  setQueryResult(sql: string, rows: ResultRow[]) {
    this.queryResults.set(sql.trim(), rows);
  }

  private ensureOpen(table: string) {
    if (this.closed) {
      throw new PersistenceError("connection", table, `${table}: store is closed`);
    }
  }

  async insert(table: TableName, fields: Row): Promise<number | null> {
    this.ensureOpen(table);
    this.insertCalls += 1;

    const failureIndex = this.failures.findIndex((failure) => failure.table === table);
    if (failureIndex >= 0) {
      const [failure] = this.failures.splice(failureIndex, 1);
      throw new PersistenceError(failure.scope, table, `${table}: injected ${failure.scope} failure`);
    }

    const definition = TABLES[table];
    const unknown = unknownColumns(table, fields);
    if (unknown.length) {
      throw new PersistenceError("record", table, `${table}: unknown columns ${unknown.join(", ")}`);
    }
    for (const column of definition.required) {
      if (fields[column] === null || fields[column] === undefined) {
        throw new PersistenceError("record", table, `${table}: null value in column "${column}"`);
      }
    }
    for (const [column, parent] of Object.entries(definition.foreignKeys)) {
      const value = fields[column];
      if (value === null || value === undefined) {
        continue;
      }
      const parentKey = TABLES[parent].primaryKey;
      if (!parentKey || !this.rows(parent).some((row) => row[parentKey] === value)) {
        throw new PersistenceError("record", table, `${table}: foreign key violation on "${column}"`);
      }
    }

    const rows = this.rows(table);
    const key = keyOf(fields, definition.naturalKey);
    if (rows.some((row) => keyOf(row, definition.naturalKey) === key)) {
      return null;
    }

    const row: Row = { ...fields };
    if (definition.primaryKey) {
      const id = (this.sequences.get(table) ?? 0) + 1;
      this.sequences.set(table, id);
      row[definition.primaryKey] = id;
    }
    this.tables.set(table, [...rows, row]);

    const returned = row[definition.primaryKey ?? definition.naturalKey[0]];
    return typeof returned === "number" ? returned : null;
  }

  async findIds(table: TableName, keyColumn: string, keys: string[]): Promise<Map<string, number>> {
    this.ensureOpen(table);
    const primaryKey = TABLES[table].primaryKey;
    const wanted = new Set(keys);
    const ids = new Map<string, number>();
    if (!primaryKey) {
      return ids;
    }
    for (const row of this.rows(table)) {
      const key = row[keyColumn];
      const id = row[primaryKey];
      if (typeof key === "string" && wanted.has(key) && typeof id === "number") {
        ids.set(key, id);
      }
    }
    return ids;
  }

  async query(sql: string, params: SqlValue[] = []): Promise<ResultRow[]> {
    this.ensureOpen("query");
    this.queries.push({ sql, params });
    const rows = this.queryResults.get(sql.trim());
    if (!rows) {
      throw new PersistenceError("record", "query", `query: no result registered for ${sql.trim().split("\n")[0]}`);
    }
    return rows.map((row) => ({ ...row }));
  }

  async close() {
    this.closed = true;
  }
}

export type StoredObject = {
  body: Buffer;
  contentType: string;
};

export class MemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, StoredObject>();
  closed = false;

  async upload(bucket: string, name: string, body: ObjectBody, contentType: string) {
    this.ensureOpen(bucket);
    const uri = objectUri(bucket, name);
    this.objects.set(uri, {
      body: typeof body === "string" ? Buffer.from(body, "utf-8") : body,
      contentType,
    });
    return uri;
  }

  private ensureOpen(bucket: string) {
    if (this.closed) {
      throw new PersistenceError("connection", bucket, `${bucket}: object store is closed`);
    }
  }

  async list(bucket: string, prefix: string) {
    this.ensureOpen(bucket);
    const root = objectUri(bucket, "");
    return [...this.objects.keys()]
      .filter((uri) => uri.startsWith(root + prefix))
      .map((uri) => uri.slice(root.length))
      .sort();
  }

  async download(bucket: string, name: string) {
    this.ensureOpen(bucket);
    const stored = this.objects.get(objectUri(bucket, name));
    if (!stored) {
      throw new PersistenceError("record", bucket, `download ${bucket}/${name}: no such object`);
    }
    return stored.body;
  }

  text(uri: string) {
    return this.objects.get(uri)?.body.toString("utf-8") ?? null;
  }

  async close() {
    this.closed = true;
  }
}
