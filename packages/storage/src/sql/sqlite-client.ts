import Database from "better-sqlite3";
import { isRow } from "./row.js";
import type { SqlClient, SqlParam, SqlResult } from "./sql-client.js";

/**
 * Adapts a better-sqlite3 database file (or `:memory:`) to SqlClient.
 * The driver is synchronous, so each statement completes before the
 * returned promise is created.
 */
export function createSqliteClient(path: string): SqlClient {
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  const statements = new Map<string, Database.Statement>();

  const prepare = (sql: string): Database.Statement => {
    let statement = statements.get(sql);
    if (!statement) {
      statement = db.prepare(sql);
      statements.set(sql, statement);
    }
    return statement;
  };

  return {
    async run(sql: string, params: readonly SqlParam[]): Promise<SqlResult> {
      const statement = prepare(sql);
      if (statement.reader) {
        const rows: unknown[] = statement.all(...params);
        return { rows: rows.filter(isRow), affectedRows: 0 };
      }
      const info = statement.run(...params);
      return { rows: [], affectedRows: info.changes };
    },
    async close(): Promise<void> {
      statements.clear();
      db.close();
    },
  };
}
