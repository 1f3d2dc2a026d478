/**
 * Hub configuration, read once from the environment at startup.
 */

import type { RetryPolicy, RoomPolicy } from "@meridian/core";
import { ConfigurationInvalidError, type ValidationIssue } from "@meridian/errors";
import type { StorageConfig } from "@meridian/storage";
import { z } from "zod";

export const HUB_VERSION = "0.1.0";

export type DeliveryOrdering = "unordered" | "per-room";

export interface HubConfig {
  readonly storage: StorageConfig;
  readonly roomPolicy: RoomPolicy;
  readonly deliveryOrdering: DeliveryOrdering;
  readonly retry: RetryPolicy;
  readonly collaboratorTimeoutMs: number;
  /** Age after which an unfinished room claim may be taken over. */
  readonly roomClaimTtlMs: number;
  readonly pairingTtlMs: number;
  /** Silence after which an agent counts as offline. */
  readonly presenceOfflineMs: number;
  /** How long a reply to an approval card can decide the request. */
  readonly approvalReplyWindowMs: number;
  readonly matrix: { readonly homeserver: string; readonly accessToken: string };
  readonly apiBase: string | null;
  readonly chain: { readonly url: string; readonly didNamespace: string };
  readonly audit: {
    readonly messageUrl?: string;
    readonly approvalUrl?: string;
    readonly permissionInitUrl?: string;
    readonly subAgentUrl?: string;
  };
  /** Bearer token for admin routes. Null disables them. */
  readonly adminToken: string | null;
  readonly http: { readonly host: string; readonly port: number };
}

const port = z.coerce.number().int().min(0).max(65535);
const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z
  .object({
    MERIDIAN_STORAGE: z.enum(["memory", "sqlite", "postgres", "mysql"]).default("memory"),
    MERIDIAN_SQLITE_PATH: z.string().optional(),
    MERIDIAN_PG_URL: z.string().url().optional(),
    MERIDIAN_PG_POOL_SIZE: positiveInt.default(10),
    MERIDIAN_MYSQL_HOST: z.string().optional(),
    MERIDIAN_MYSQL_PORT: port.default(3306),
    MERIDIAN_MYSQL_USER: z.string().optional(),
    MERIDIAN_MYSQL_PASSWORD: z.string().default(""),
    MERIDIAN_MYSQL_DATABASE: z.string().optional(),
    MERIDIAN_MYSQL_POOL_SIZE: positiveInt.default(10),

    MERIDIAN_ROOM_POLICY: z.enum(["dedicated", "shared"]).default("dedicated"),
    MERIDIAN_DELIVERY_ORDERING: z.enum(["unordered", "per-room"]).default("per-room"),
    MERIDIAN_RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    MERIDIAN_RETRY_BASE_DELAY_MS: positiveInt.default(200),
    MERIDIAN_RETRY_MAX_DELAY_MS: positiveInt.default(5_000),
    MERIDIAN_COLLABORATOR_TIMEOUT_MS: positiveInt.default(10_000),
    MERIDIAN_ROOM_CLAIM_TTL_MS: positiveInt.default(60_000),
    MERIDIAN_PAIRING_TTL_MS: positiveInt.default(600_000),
    MERIDIAN_PRESENCE_OFFLINE_MS: positiveInt.default(120_000),
    MERIDIAN_APPROVAL_REPLY_WINDOW_MS: positiveInt.default(3_600_000),

    MATRIX_HOMESERVER: z.string().url().default("http://localhost:8008"),
    MATRIX_ACCESS_TOKEN: z.string().default(""),
    MERIDIAN_API_BASE: z.string().url().optional(),
    MERIDIAN_CHAIN_URL: z.string().url().default("http://localhost:8090"),
    MERIDIAN_DID_NAMESPACE: z
      .string()
      .regex(/^[a-z0-9]+$/, "must be lowercase alphanumeric")
      .default("meridian"),
    MERIDIAN_AUDIT_URL: z.string().url().optional(),
    MERIDIAN_APPROVAL_AUDIT_URL: z.string().url().optional(),
    MERIDIAN_PERMISSION_INIT_URL: z.string().url().optional(),
    MERIDIAN_SUB_AGENT_NOTIFY_URL: z.string().url().optional(),
    MERIDIAN_ADMIN_TOKEN: z.string().min(16, "must be at least 16 characters").optional(),
    MERIDIAN_HTTP_PORT: port.default(8080),
    MERIDIAN_HTTP_HOST: z.string().default("0.0.0.0"),
  })
  .superRefine((env, ctx) => {
    const requireField = (field: keyof typeof env, kind: string): void => {
      if (env[field] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `required when MERIDIAN_STORAGE=${kind}`,
        });
      }
    };
    switch (env.MERIDIAN_STORAGE) {
      case "sqlite":
        requireField("MERIDIAN_SQLITE_PATH", "sqlite");
        break;
      case "postgres":
        requireField("MERIDIAN_PG_URL", "postgres");
        break;
      case "mysql":
        requireField("MERIDIAN_MYSQL_HOST", "mysql");
        requireField("MERIDIAN_MYSQL_USER", "mysql");
        requireField("MERIDIAN_MYSQL_DATABASE", "mysql");
        break;
      case "memory":
        break;
    }
    if (env.MERIDIAN_RETRY_MAX_DELAY_MS < env.MERIDIAN_RETRY_BASE_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MERIDIAN_RETRY_MAX_DELAY_MS"],
        message: "must be >= MERIDIAN_RETRY_BASE_DELAY_MS",
      });
    }
  });

type Env = z.infer<typeof EnvSchema>;

/**
 * Parse hub configuration from environment variables. Empty values count as
 * unset.
 * @throws ConfigurationInvalidError listing every invalid variable
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>>): HubConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues: ValidationIssue[] = parsed.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));
    throw new ConfigurationInvalidError(issues);
  }
  return deepFreeze(toHubConfig(parsed.data));
}

function storageConfig(env: Env): StorageConfig {
  switch (env.MERIDIAN_STORAGE) {
    case "memory":
      return { kind: "memory" };
    case "sqlite":
      return { kind: "sqlite", path: env.MERIDIAN_SQLITE_PATH ?? "" };
    case "postgres":
      return {
        kind: "postgres",
        url: env.MERIDIAN_PG_URL ?? "",
        poolSize: env.MERIDIAN_PG_POOL_SIZE,
      };
    case "mysql":
      return {
        kind: "mysql",
        host: env.MERIDIAN_MYSQL_HOST ?? "",
        port: env.MERIDIAN_MYSQL_PORT,
        user: env.MERIDIAN_MYSQL_USER ?? "",
        password: env.MERIDIAN_MYSQL_PASSWORD,
        database: env.MERIDIAN_MYSQL_DATABASE ?? "",
        poolSize: env.MERIDIAN_MYSQL_POOL_SIZE,
      };
  }
}

function toHubConfig(env: Env): HubConfig {
  return {
    storage: storageConfig(env),
    roomPolicy: env.MERIDIAN_ROOM_POLICY,
    deliveryOrdering: env.MERIDIAN_DELIVERY_ORDERING,
    retry: {
      maxAttempts: env.MERIDIAN_RETRY_MAX_ATTEMPTS,
      baseDelayMs: env.MERIDIAN_RETRY_BASE_DELAY_MS,
      maxDelayMs: env.MERIDIAN_RETRY_MAX_DELAY_MS,
      multiplier: 2,
    },
    collaboratorTimeoutMs: env.MERIDIAN_COLLABORATOR_TIMEOUT_MS,
    roomClaimTtlMs: env.MERIDIAN_ROOM_CLAIM_TTL_MS,
    pairingTtlMs: env.MERIDIAN_PAIRING_TTL_MS,
    presenceOfflineMs: env.MERIDIAN_PRESENCE_OFFLINE_MS,
    approvalReplyWindowMs: env.MERIDIAN_APPROVAL_REPLY_WINDOW_MS,
    matrix: { homeserver: env.MATRIX_HOMESERVER, accessToken: env.MATRIX_ACCESS_TOKEN },
    apiBase: env.MERIDIAN_API_BASE ?? null,
    chain: { url: env.MERIDIAN_CHAIN_URL, didNamespace: env.MERIDIAN_DID_NAMESPACE },
    audit: {
      ...(env.MERIDIAN_AUDIT_URL ? { messageUrl: env.MERIDIAN_AUDIT_URL } : {}),
      ...(env.MERIDIAN_APPROVAL_AUDIT_URL ? { approvalUrl: env.MERIDIAN_APPROVAL_AUDIT_URL } : {}),
      ...(env.MERIDIAN_PERMISSION_INIT_URL
        ? { permissionInitUrl: env.MERIDIAN_PERMISSION_INIT_URL }
        : {}),
      ...(env.MERIDIAN_SUB_AGENT_NOTIFY_URL
        ? { subAgentUrl: env.MERIDIAN_SUB_AGENT_NOTIFY_URL }
        : {}),
    },
    adminToken: env.MERIDIAN_ADMIN_TOKEN ?? null,
    http: { host: env.MERIDIAN_HTTP_HOST, port: env.MERIDIAN_HTTP_PORT },
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
