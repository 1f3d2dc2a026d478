import type { SqlClient, SqlDialect, SqlParam, SqlResult } from "@meridian/storage";

export interface FakeSqlClientOptions {
  /**
   * JSON/JSONB columns come back parsed from pg and mysql2; TEXT columns
   * (SQLite) come back as strings.
   */
  readonly parsedJsonColumn?: boolean;
}

/**
 * In-process stand-in for a relational driver. Understands exactly the
 * statements of the dialect it is built with and applies each one atomically,
 * after yielding once to the event loop like a network round trip would.
 */
export class FakeSqlClient implements SqlClient {
  readonly statements: string[] = [];
  private readonly tables = new Map<string, Map<string, string>>();
  private tableCreated = false;
  private pendingFailures: Error[] = [];
  private closed = false;

  constructor(
    private readonly dialect: SqlDialect,
    private readonly options: FakeSqlClientOptions = {},
  ) {}

  /** The next `count` statements reject with `error`. */
  failNext(count: number, error: Error = new Error("connection refused")): void {
    for (let i = 0; i < count; i++) {
      this.pendingFailures.push(error);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async run(sql: string, params: readonly SqlParam[]): Promise<SqlResult> {
    await Promise.resolve();
    this.statements.push(sql);
    const failure = this.pendingFailures.shift();
    if (failure) {
      throw failure;
    }
    if (this.closed) {
      throw new Error("pool is closed");
    }
    return this.apply(sql, params);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private apply(sql: string, params: readonly SqlParam[]): SqlResult {
    const d = this.dialect;
    if (sql === d.createTable) {
      this.tableCreated = true;
      return { rows: [], affectedRows: 0 };
    }
    if (sql === d.ping) {
      return { rows: [{ ok: 1 }], affectedRows: 0 };
    }
    if (!this.tableCreated) {
      throw new Error("relation meridian_kv does not exist");
    }

    const [bucket, key, value] = params;
    if (typeof bucket !== "string") {
      throw new Error(`Unexpected bucket parameter for: ${sql}`);
    }
    const table = this.bucket(bucket);

    if (sql === d.selectOne) {
      const stored = table.get(String(key));
      return { rows: stored === undefined ? [] : [{ value: this.column(stored) }], affectedRows: 0 };
    }
    if (sql === d.selectBucket) {
      return {
        rows: [...table.entries()].map(([k, v]) => ({ key: k, value: this.column(v) })),
        affectedRows: 0,
      };
    }
    if (sql === d.upsert) {
      table.set(String(key), String(value));
      return { rows: [], affectedRows: 1 };
    }
    if (sql === d.insertIfAbsent) {
      if (table.has(String(key))) {
        return { rows: [], affectedRows: 0 };
      }
      table.set(String(key), String(value));
      return { rows: [], affectedRows: 1 };
    }
    if (sql === d.deleteOne) {
      return { rows: [], affectedRows: table.delete(String(key)) ? 1 : 0 };
    }
    throw new Error(`Unsupported statement: ${sql}`);
  }

  private bucket(name: string): Map<string, string> {
    let table = this.tables.get(name);
    if (!table) {
      table = new Map();
      this.tables.set(name, table);
    }
    return table;
  }

  private column(stored: string): unknown {
    return this.options.parsedJsonColumn ? JSON.parse(stored) : stored;
  }
}
