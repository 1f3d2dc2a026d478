import mysql from "mysql2/promise";
import { isRow } from "./row.js";
import type { SqlClient, SqlParam, SqlResult } from "./sql-client.js";

export interface MysqlConnectionOptions {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly database: string;
  readonly poolSize: number;
}

export function createMysqlClient(options: MysqlConnectionOptions): SqlClient {
  const pool = mysql.createPool({
    host: options.host,
    port: options.port,
    user: options.user,
    password: options.password,
    database: options.database,
    connectionLimit: options.poolSize,
    charset: "utf8mb4",
  });

  return {
    async run(sql: string, params: readonly SqlParam[]): Promise<SqlResult> {
      const [result] = await pool.query(sql, [...params]);
      if (Array.isArray(result)) {
        const rows: unknown[] = result;
        return { rows: rows.filter(isRow), affectedRows: 0 };
      }
      return { rows: [], affectedRows: result.affectedRows };
    },
    close: () => pool.end(),
  };
}
