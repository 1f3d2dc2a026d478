import { ValidationError } from "@meridian/errors";
import type { z } from "zod";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type HttpMethod = "GET" | "POST";

export interface RouteContext {
  readonly params: ReadonlyMap<string, string>;
  readonly query: URLSearchParams;
  /** Parsed JSON body; undefined for GET. */
  readonly body: unknown;
}

export interface RouteResponse {
  readonly status: number;
  readonly body: unknown;
}

export type RouteHandler = (ctx: RouteContext) => Promise<RouteResponse>;

export interface Route {
  readonly method: HttpMethod;
  /** Literal segments and `:name` placeholders, e.g. `/api/v1/agents/:id`. */
  readonly path: string;
  /** Requires the admin bearer token. */
  readonly admin?: boolean;
  readonly handler: RouteHandler;
}

export type RouteMatch =
  | { readonly kind: "found"; readonly route: Route; readonly params: ReadonlyMap<string, string> }
  | { readonly kind: "method-not-allowed"; readonly allow: readonly HttpMethod[] }
  | { readonly kind: "not-found" };

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

interface CompiledRoute {
  readonly route: Route;
  readonly segments: readonly string[];
}

export class Router {
  private readonly routes: CompiledRoute[];

  constructor(routes: readonly Route[]) {
    this.routes = routes.map((route) => ({ route, segments: splitPath(route.path) }));
  }

  match(method: string, pathname: string): RouteMatch {
    const segments = splitPath(pathname);
    const allow: HttpMethod[] = [];
    for (const compiled of this.routes) {
      const params = matchSegments(compiled.segments, segments);
      if (params === null) {
        continue;
      }
      if (compiled.route.method === method) {
        return { kind: "found", route: compiled.route, params };
      }
      allow.push(compiled.route.method);
    }
    return allow.length > 0 ? { kind: "method-not-allowed", allow } : { kind: "not-found" };
  }
}

function splitPath(path: string): string[] {
  return path.split("/").filter((segment) => segment.length > 0);
}

function matchSegments(
  pattern: readonly string[],
  actual: readonly string[],
): Map<string, string> | null {
  if (pattern.length !== actual.length) {
    return null;
  }
  const params = new Map<string, string>();
  for (const [index, expected] of pattern.entries()) {
    const segment = actual[index];
    if (segment === undefined) {
      return null;
    }
    if (expected.startsWith(":")) {
      const decoded = safeDecode(segment);
      if (decoded === null) {
        return null;
      }
      params.set(expected.slice(1), decoded);
    } else if (expected !== segment) {
      return null;
    }
  }
  return params;
}

function safeDecode(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Helpers for handlers
// ---------------------------------------------------------------------------

export function param(ctx: RouteContext, name: string): string {
  const value = ctx.params.get(name);
  if (value === undefined) {
    throw new ValidationError({
      code: "VALIDATION_FAILED",
      message: `Missing path parameter "${name}"`,
      issues: [{ field: name, message: "required", code: "missing" }],
    });
  }
  return value;
}

/**
 * Validate a request body or query against `schema`.
 * @throws ValidationError listing every issue
 */
export function parseInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  what = "Request body",
): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError({
      code: "VALIDATION_FAILED",
      message: `${what} is invalid`,
      issues: parsed.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
        code: issue.code,
      })),
    });
  }
  return parsed.data;
}
