export { Collection } from "./collection.js";
export { decodeRecord, encodeRecord } from "./codec.js";
export { type BackendOptions, createBackend } from "./factory.js";
export { MemoryBackend } from "./memory-backend.js";
export { MYSQL_DIALECT, POSTGRES_DIALECT, SQLITE_DIALECT } from "./sql/dialects.js";
export { createSqliteClient } from "./sql/sqlite-client.js";
export { SqlBackend, type SqlBackendOptions } from "./sql/sql-backend.js";
export type { SqlClient, SqlDialect, SqlParam, SqlResult } from "./sql/sql-client.js";
export type {
  BackendKind,
  PersistenceBackend,
  PutIfAbsentResult,
  RecordPredicate,
  StorageConfig,
} from "./types.js";
