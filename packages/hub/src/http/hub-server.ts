/**
 * Hub HTTP API server.
 *
 * Plain node:http with a small route table. Request bodies are JSON and
 * validated with zod; every failure is answered with RFC 9457 problem details
 * carrying the error catalog's HTTP status.
 */

import { timingSafeEqual } from "node:crypto";
import * as http from "node:http";
import {
  getErrorMessage,
  isMeridianError,
  NotFoundError,
  PermissionError,
  toProblemDetails,
  ValidationError,
} from "@meridian/errors";
import { HUB_VERSION } from "../config.js";
import type { Hub } from "../hub.js";
import { type Route, Router } from "./router.js";
import { createRoutes } from "./routes.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HubServerOptions {
  readonly port: number;
  readonly hostname: string;
  /** Bearer token for admin routes; null rejects them outright. */
  readonly adminToken: string | null;
  readonly matrixHomeserver: string;
  readonly apiBase: string | null;
  readonly maxBodyBytes?: number;
}

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

const JSON_CONTENT_TYPE = "application/json";
const PROBLEM_CONTENT_TYPE = "application/problem+json";

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

export class HubServer {
  private readonly _server: http.Server;
  private readonly _router: Router;
  private readonly _options: HubServerOptions;
  private readonly _maxBodyBytes: number;

  constructor(hub: Hub, options: HubServerOptions) {
    this._options = options;
    this._maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this._router = new Router(
      createRoutes(hub, {
        matrixHomeserver: options.matrixHomeserver,
        apiBase: options.apiBase,
        version: HUB_VERSION,
      }),
    );
    this._server = http.createServer((req: http.IncomingMessage, res: http.ServerResponse) => {
      this._handleRequest(req, res).catch((error: unknown) => {
        console.error(`[HTTP] Unhandled failure: ${getErrorMessage(error)}`);
        if (!res.writableEnded) {
          res.statusCode = 500;
          res.end();
        }
      });
    });
  }

  async start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this._server.once("error", reject);
      this._server.listen(this._options.port, this._options.hostname, () => {
        this._server.off("error", reject);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this._server.listening) {
      return;
    }
    return new Promise<void>((resolve, reject) => {
      this._server.close((err: Error | undefined) => {
        if (err) reject(err);
        else resolve();
      });
      this._server.closeIdleConnections();
    });
  }

  /** Bound port; differs from the configured one when that was 0. */
  get port(): number {
    const address = this._server.address();
    return typeof address === "object" && address !== null ? address.port : this._options.port;
  }

  // -------------------------------------------------------------------------
  // Request handling
  // -------------------------------------------------------------------------

  private async _handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");

    try {
      const match = this._router.match(method, url.pathname);
      if (match.kind === "method-not-allowed") {
        res.statusCode = 405;
        res.setHeader("Allow", match.allow.join(", "));
        res.end();
        return;
      }
      if (match.kind === "not-found") {
        throw new NotFoundError({
          code: "RESOURCE_NOT_FOUND",
          message: `No route for ${method} ${url.pathname}`,
        });
      }

      if (match.route.admin === true) {
        this._authorizeAdmin(req, match.route);
      }
      const body = method === "POST" ? await this._readBody(req) : undefined;
      const response = await match.route.handler({
        params: match.params,
        query: url.searchParams,
        body,
      });
      this._send(res, response.status, JSON_CONTENT_TYPE, response.body);
    } catch (error) {
      const problem = toProblemDetails(error, url.pathname);
      if (!isMeridianError(error) || !error.isExpected) {
        console.error(`[HTTP] ${method} ${url.pathname} failed: ${getErrorMessage(error)}`);
      }
      this._send(res, problem.status, PROBLEM_CONTENT_TYPE, problem);
    }
  }

  private _authorizeAdmin(req: http.IncomingMessage, route: Route): void {
    const expected = this._options.adminToken;
    if (expected === null) {
      throw new PermissionError({
        code: "AUTH_TOKEN_INVALID",
        message: `${route.path} is disabled: no admin token is configured`,
      });
    }
    const header = req.headers.authorization;
    if (header === undefined || !header.startsWith("Bearer ")) {
      throw new PermissionError({
        code: "AUTH_TOKEN_MISSING",
        message: `${route.path} requires a bearer token`,
      });
    }
    const given = Buffer.from(header.slice("Bearer ".length));
    const wanted = Buffer.from(expected);
    if (given.length !== wanted.length || !timingSafeEqual(given, wanted)) {
      throw new PermissionError({
        code: "AUTH_TOKEN_INVALID",
        message: "Bearer token was not accepted",
      });
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _send(
    res: http.ServerResponse,
    status: number,
    contentType: string,
    body: unknown,
  ): void {
    res.statusCode = status;
    res.setHeader("Content-Type", contentType);
    res.end(JSON.stringify(body));
  }

  /**
   * Reads and parses the request body as JSON. An empty body reads as `{}`.
   * @throws ValidationError for oversized or malformed bodies
   */
  private async _readBody(req: http.IncomingMessage): Promise<unknown> {
    const chunks: Buffer[] = [];
    let size = 0;
    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buffer.length;
      if (size > this._maxBodyBytes) {
        throw invalidBody(`Request body exceeds ${this._maxBodyBytes} bytes`, "too_big");
      }
      chunks.push(buffer);
    }
    const text = Buffer.concat(chunks).toString("utf8");
    if (text.trim() === "") {
      return {};
    }
    try {
      return JSON.parse(text);
    } catch {
      throw invalidBody("Request body is not valid JSON", "invalid_json");
    }
  }
}

function invalidBody(message: string, code: string): ValidationError {
  return new ValidationError({
    code: "VALIDATION_FAILED",
    message,
    issues: [{ field: "body", message, code }],
  });
}
