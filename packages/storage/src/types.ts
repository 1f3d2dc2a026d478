import type { JsonObject } from "@meridian/core";

// ---------------------------------------------------------------------------
// Backend contract
// ---------------------------------------------------------------------------

export type BackendKind = "memory" | "sqlite" | "postgres" | "mysql";

export interface PutIfAbsentResult {
  /** The record now stored under the key: ours if created, the incumbent otherwise. */
  readonly record: JsonObject;
  readonly created: boolean;
}

export type RecordPredicate = (record: JsonObject) => boolean;

/**
 * Generic keyed record store. Owns no domain semantics.
 *
 * Every implementation must behave identically: records go in and come out
 * as independent JSON copies, `query` returns records ordered by key
 * (code-point order), and `putIfAbsent` is atomic for concurrent callers
 * using the same key.
 */
export interface PersistenceBackend {
  readonly kind: BackendKind;
  put(collection: string, key: string, record: JsonObject): Promise<void>;
  /** Returns null when no record is stored under the key. */
  get(collection: string, key: string): Promise<JsonObject | null>;
  putIfAbsent(collection: string, key: string, record: JsonObject): Promise<PutIfAbsentResult>;
  query(collection: string, predicate?: RecordPredicate): Promise<JsonObject[]>;
  /** Returns whether a record was removed. */
  delete(collection: string, key: string): Promise<boolean>;
  /** Resolves when the backend can serve requests. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

export type StorageConfig =
  | { readonly kind: "memory" }
  | { readonly kind: "sqlite"; readonly path: string }
  | { readonly kind: "postgres"; readonly url: string; readonly poolSize: number }
  | {
      readonly kind: "mysql";
      readonly host: string;
      readonly port: number;
      readonly user: string;
      readonly password: string;
      readonly database: string;
      readonly poolSize: number;
    };
