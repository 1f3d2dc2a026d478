import pg from "pg";
import type { SqlClient, SqlParam, SqlResult } from "./sql-client.js";

export function createPostgresClient(url: string, poolSize: number): SqlClient {
  const pool = new pg.Pool({ connectionString: url, max: poolSize });
  pool.on("error", (error) => {
    console.error(`[Storage] postgres idle client error: ${error.message}`);
  });

  return {
    async run(sql: string, params: readonly SqlParam[]): Promise<SqlResult> {
      const result = await pool.query<Record<string, unknown>>(sql, [...params]);
      return { rows: result.rows, affectedRows: result.rowCount ?? 0 };
    },
    close: () => pool.end(),
  };
}
