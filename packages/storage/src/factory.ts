import type { RetryPolicy, Sleep } from "@meridian/core";
import { MemoryBackend } from "./memory-backend.js";
import { MYSQL_DIALECT, POSTGRES_DIALECT, SQLITE_DIALECT } from "./sql/dialects.js";
import { createMysqlClient } from "./sql/mysql-client.js";
import { createPostgresClient } from "./sql/postgres-client.js";
import { SqlBackend } from "./sql/sql-backend.js";
import { createSqliteClient } from "./sql/sqlite-client.js";
import type { PersistenceBackend, StorageConfig } from "./types.js";

export interface BackendOptions {
  readonly retry?: RetryPolicy;
  readonly sleep?: Sleep;
}

/**
 * Build the configured backend. Selection happens once, here; nothing
 * downstream branches on the backend kind.
 */
export function createBackend(
  config: StorageConfig,
  options: BackendOptions = {},
): PersistenceBackend {
  switch (config.kind) {
    case "memory":
      return new MemoryBackend();
    case "sqlite":
      return new SqlBackend({
        ...options,
        kind: "sqlite",
        client: createSqliteClient(config.path),
        dialect: SQLITE_DIALECT,
      });
    case "postgres":
      return new SqlBackend({
        ...options,
        kind: "postgres",
        client: createPostgresClient(config.url, config.poolSize),
        dialect: POSTGRES_DIALECT,
      });
    case "mysql":
      return new SqlBackend({
        ...options,
        kind: "mysql",
        client: createMysqlClient(config),
        dialect: MYSQL_DIALECT,
      });
  }
}
