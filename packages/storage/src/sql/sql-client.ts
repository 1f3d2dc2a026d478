/**
 * The narrow slice of a SQL driver the relational backends use. Each driver
 * (better-sqlite3, pg, mysql2) is adapted to it in its own module; tests
 * substitute an in-process implementation.
 */

export type SqlParam = string | number | null;

export interface SqlResult {
  readonly rows: readonly Readonly<Record<string, unknown>>[];
  readonly affectedRows: number;
}

export interface SqlClient {
  run(sql: string, params: readonly SqlParam[]): Promise<SqlResult>;
  close(): Promise<void>;
}

/** Statements one backend needs, written in its dialect. */
export interface SqlDialect {
  readonly createTable: string;
  /** params: bucket, key. Returns column `value`. */
  readonly selectOne: string;
  /** params: bucket. Returns columns `key`, `value`. */
  readonly selectBucket: string;
  /** params: bucket, key, value. Inserts or replaces. */
  readonly upsert: string;
  /** params: bucket, key, value. Inserts only when the key is free; affects 0 rows otherwise. */
  readonly insertIfAbsent: string;
  /** params: bucket, key */
  readonly deleteOne: string;
  readonly ping: string;
}
