import type { SqlDialect } from "./sql-client.js";

const TABLE = "meridian_kv";

export const SQLITE_DIALECT: SqlDialect = {
  createTable: `CREATE TABLE IF NOT EXISTS ${TABLE} (bucket TEXT NOT NULL, key TEXT NOT NULL, value TEXT NOT NULL, PRIMARY KEY (bucket, key))`,
  selectOne: `SELECT value FROM ${TABLE} WHERE bucket = ? AND key = ?`,
  selectBucket: `SELECT key, value FROM ${TABLE} WHERE bucket = ?`,
  upsert: `INSERT INTO ${TABLE} (bucket, key, value) VALUES (?, ?, ?) ON CONFLICT (bucket, key) DO UPDATE SET value = excluded.value`,
  insertIfAbsent: `INSERT OR IGNORE INTO ${TABLE} (bucket, key, value) VALUES (?, ?, ?)`,
  deleteOne: `DELETE FROM ${TABLE} WHERE bucket = ? AND key = ?`,
  ping: "SELECT 1 AS ok",
};

export const POSTGRES_DIALECT: SqlDialect = {
  createTable: `CREATE TABLE IF NOT EXISTS ${TABLE} (bucket TEXT NOT NULL, key TEXT NOT NULL, value JSONB NOT NULL, PRIMARY KEY (bucket, key))`,
  selectOne: `SELECT value FROM ${TABLE} WHERE bucket = $1 AND key = $2`,
  selectBucket: `SELECT key, value FROM ${TABLE} WHERE bucket = $1`,
  upsert: `INSERT INTO ${TABLE} (bucket, key, value) VALUES ($1, $2, $3::jsonb) ON CONFLICT (bucket, key) DO UPDATE SET value = EXCLUDED.value`,
  insertIfAbsent: `INSERT INTO ${TABLE} (bucket, key, value) VALUES ($1, $2, $3::jsonb) ON CONFLICT (bucket, key) DO NOTHING`,
  deleteOne: `DELETE FROM ${TABLE} WHERE bucket = $1 AND key = $2`,
  ping: "SELECT 1 AS ok",
};

/** Keys compare byte for byte with no pad, so "a" and "a " stay distinct. Needs MySQL 8. */
export const MYSQL_DIALECT: SqlDialect = {
  createTable: `CREATE TABLE IF NOT EXISTS ${TABLE} (bucket VARCHAR(64) NOT NULL, \`key\` VARCHAR(255) NOT NULL, value JSON NOT NULL, PRIMARY KEY (bucket, \`key\`)) CHARACTER SET utf8mb4 COLLATE utf8mb4_0900_bin`,
  selectOne: `SELECT value FROM ${TABLE} WHERE bucket = ? AND \`key\` = ?`,
  selectBucket: `SELECT \`key\`, value FROM ${TABLE} WHERE bucket = ?`,
  upsert: `INSERT INTO ${TABLE} (bucket, \`key\`, value) VALUES (?, ?, ?) ON DUPLICATE KEY UPDATE value = VALUES(value)`,
  insertIfAbsent: `INSERT IGNORE INTO ${TABLE} (bucket, \`key\`, value) VALUES (?, ?, ?)`,
  deleteOne: `DELETE FROM ${TABLE} WHERE bucket = ? AND \`key\` = ?`,
  ping: "SELECT 1 AS ok",
};
