import type { TableName } from "./schema";

export type SqlValue = string | number | boolean | Date | null;

export type Row = Record<string, SqlValue>;

/** Read results may also carry SQL arrays (ARRAY_AGG). */
export type ResultValue = SqlValue | SqlValue[];

export type ResultRow = Record<string, ResultValue>;

/**
 * Write side of the gold layer. `insert` is insert-or-ignore on the table's
 * natural key: it resolves to the new id, or null when the key already exists.
 * Association tables resolve to their first key column instead.
 */
export interface RelationalStore {
  insert(table: TableName, fields: Row): Promise<number | null>;
  findIds(table: TableName, keyColumn: string, keys: string[]): Promise<Map<string, number>>;
  /** Read-only SQL, used for the analytics views. */
  query(sql: string, params?: SqlValue[]): Promise<ResultRow[]>;
  close(): Promise<void>;
}

export type ObjectBody = Buffer | string;

export interface ObjectStore {
  /** Resolves to a `minio://bucket/name` URI. */
  upload(bucket: string, name: string, body: ObjectBody, contentType: string): Promise<string>;
  /** Object names under `prefix`, sorted. A missing bucket lists as empty. */
  list(bucket: string, prefix: string): Promise<string[]>;
  download(bucket: string, name: string): Promise<Buffer>;
  close(): Promise<void>;
}

export const objectUri = (bucket: string, name: string) => `minio://${bucket}/${name}`;
