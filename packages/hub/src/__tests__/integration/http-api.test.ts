import http from "node:http";
import {
  createFakeClock,
  createMockCollaborators,
  createRecordingSleep,
  type MockCollaborators,
} from "@meridian/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HUB_VERSION, loadConfig } from "../../config.js";
import { HubServer } from "../../http/hub-server.js";
import { createHub, type Hub } from "../../hub.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ADMIN_TOKEN = "test-secret-token-0001";
const T0 = "2026-01-01T00:00:00.000Z";

interface Reply {
  readonly status: number;
  readonly headers: http.IncomingHttpHeaders;
  readonly body: unknown;
}

interface CallOptions {
  readonly body?: unknown;
  /** Raw request body, sent as is. */
  readonly raw?: string;
  readonly token?: string;
}

function call(port: number, method: string, path: string, options: CallOptions = {}): Promise<Reply> {
  const payload =
    options.raw ?? (options.body === undefined ? undefined : JSON.stringify(options.body));
  const headers: http.OutgoingHttpHeaders = {};
  if (payload !== undefined) {
    headers["Content-Type"] = "application/json";
    headers["Content-Length"] = Buffer.byteLength(payload);
  }
  if (options.token !== undefined) {
    headers.Authorization = `Bearer ${options.token}`;
  }

  return new Promise((resolve, reject) => {
    const req = http.request({ hostname: "127.0.0.1", port, path, method, headers }, (res) => {
      let text = "";
      res.setEncoding("utf8");
      res.on("data", (chunk: string) => {
        text += chunk;
      });
      res.on("end", () => {
        const body: unknown = text === "" ? null : JSON.parse(text);
        resolve({ status: res.statusCode ?? 0, headers: res.headers, body });
      });
      res.on("error", reject);
    });
    req.on("error", reject);
    if (payload !== undefined) {
      req.write(payload);
    }
    req.end();
  });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("HubServer", () => {
  let collaborators: MockCollaborators;
  let hub: Hub;
  let server: HubServer;
  let port: number;

  const admin = (path: string, body: unknown): Promise<Reply> =>
    call(port, "POST", path, { body, token: ADMIN_TOKEN });

  beforeEach(async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const clock = createFakeClock();
    const config = loadConfig({ MERIDIAN_ADMIN_TOKEN: ADMIN_TOKEN });
    collaborators = createMockCollaborators();
    hub = await createHub(config, collaborators, { clock, sleep: createRecordingSleep(clock) });
    server = new HubServer(hub, {
      port: 0,
      hostname: "127.0.0.1",
      adminToken: ADMIN_TOKEN,
      matrixHomeserver: "https://matrix.hub.test",
      apiBase: null,
    });
    await server.start();
    port = server.port;
  });

  afterEach(async () => {
    await server.stop();
    await hub.close();
    vi.restoreAllMocks();
  });

  describe("discovery and health", () => {
    it("should publish the homeserver in the well-known document", async () => {
      const reply = await call(port, "GET", "/.well-known/meridian-matrix");

      expect(reply.status).toBe(200);
      expect(reply.headers["content-type"]).toBe("application/json");
      expect(reply.body).toEqual({ matrix_homeserver: "https://matrix.hub.test", version: HUB_VERSION });
    });

    it("should answer health and readiness", async () => {
      expect((await call(port, "GET", "/health")).body).toEqual({ status: "ok" });
      expect((await call(port, "GET", "/ready")).body).toEqual({ status: "ready" });
    });

    it("should report unavailable when the backend is down", async () => {
      vi.spyOn(hub.backend, "ping").mockRejectedValueOnce(new Error("connection refused"));

      const reply = await call(port, "GET", "/ready");

      expect(reply.status).toBe(503);
      expect(reply.body).toEqual({ status: "unavailable" });
    });
  });

  describe("routing", () => {
    it("should answer unknown paths with problem details", async () => {
      const reply = await call(port, "GET", "/nope");

      expect(reply.status).toBe(404);
      expect(reply.headers["content-type"]).toBe("application/problem+json");
      expect(reply.body).toMatchObject({
        type: "/errors/RESOURCE_NOT_FOUND",
        status: 404,
        code: "RESOURCE_NOT_FOUND",
        detail: "No route for GET /nope",
        instance: "/nope",
      });
    });

    it("should answer a wrong method with 405 and Allow", async () => {
      const reply = await call(port, "GET", "/api/v1/agent/send");

      expect(reply.status).toBe(405);
      expect(reply.headers.allow).toBe("POST");
    });
  });

  describe("admin routes", () => {
    it("should require a bearer token", async () => {
      const reply = await call(port, "POST", "/api/v1/owners/register", { body: { owner_id: "O1" } });

      expect(reply.status).toBe(401);
      expect(reply.body).toMatchObject({
        code: "AUTH_TOKEN_MISSING",
        detail: "/api/v1/owners/register requires a bearer token",
      });
    });

    it("should refuse a wrong token", async () => {
      const reply = await call(port, "POST", "/api/v1/owners/register", {
        body: { owner_id: "O1" },
        token: "not-the-token",
      });

      expect(reply.status).toBe(403);
      expect(reply.body).toMatchObject({
        code: "AUTH_TOKEN_INVALID",
        detail: "Bearer token was not accepted",
      });
    });

    it("should register an owner with the right token", async () => {
      const reply = await admin("/api/v1/owners/register", { owner_id: "O1", metadata: { team: "ops" } });

      expect(reply.status).toBe(201);
      expect(reply.body).toEqual({ owner_id: "O1", metadata: { team: "ops" }, created_at: T0 });
    });

    it("should register and bind an agent", async () => {
      const reply = await admin("/api/v1/agents/register", { owner_id: "O1", agent_id: "A1" });

      expect(reply.status).toBe(201);
      expect(reply.body).toMatchObject({
        owner: { owner_id: "O1" },
        agent: { agent_id: "A1", owner_id: "O1", status: "active", initiator: "human" },
        binding: { agent_id: "A1", owner_id: "O1", bound_at: T0 },
      });
      const listed = await call(port, "GET", "/api/v1/owners/O1/agents");
      expect(listed.body).toMatchObject({ owner_id: "O1", agents: [{ agent_id: "A1" }] });
    });
  });

  describe("messaging", () => {
    beforeEach(async () => {
      await admin("/api/v1/agents/register", { owner_id: "O1", agent_id: "A1" });
      await admin("/api/v1/agents/register", { owner_id: "O1", agent_id: "A2" });
    });

    it("should deliver and expose the delivery record", async () => {
      const reply = await call(port, "POST", "/api/v1/agent/send", {
        body: {
          delivery_id: "d-1",
          sender_agent_id: "A1",
          receiver_agent_id: "A2",
          content: { kind: "text", text: "hello" },
        },
      });

      const delivery = {
        delivery_id: "d-1",
        sender: "A1",
        receiver: "A2",
        room_id: "!room-1:test",
        status: "completed",
        attempts: 1,
        event_id: "$event-1",
        error: null,
        created_at: T0,
        updated_at: T0,
      };
      expect(reply.status).toBe(200);
      expect(reply.body).toEqual({ ...delivery, duplicate: false, warnings: [] });
      expect((await call(port, "GET", "/api/v1/deliveries/d-1")).body).toEqual(delivery);
      expect((await call(port, "GET", "/api/v1/deliveries?receiver=A2")).body).toEqual({
        deliveries: [delivery],
      });
    });

    it("should report a repeated delivery id as a duplicate", async () => {
      const body = { delivery_id: "d-1", receiver_agent_id: "A2", content: { body: "x" } };
      await call(port, "POST", "/api/v1/agent/send", { body });

      const again = await call(port, "POST", "/api/v1/agent/send", { body });

      expect(again.body).toMatchObject({ delivery_id: "d-1", sender: "system", duplicate: true });
      expect(collaborators.channel.sendMessage).toHaveBeenCalledTimes(1);
    });

    it("should map an unknown receiver to 404", async () => {
      const reply = await call(port, "POST", "/api/v1/agent/send", {
        body: { delivery_id: "d-1", sender_agent_id: "A1", receiver_agent_id: "ghost", content: { body: "x" } },
      });

      expect(reply.status).toBe(404);
      expect(reply.body).toMatchObject({
        code: "IDENTITY_UNKNOWN_AGENT",
        detail: 'Agent "ghost" is not registered',
      });
      expect((await call(port, "GET", "/api/v1/deliveries/d-1")).status).toBe(404);
    });

    it("should reject malformed JSON", async () => {
      const reply = await call(port, "POST", "/api/v1/agent/send", { raw: "{not json" });

      expect(reply.status).toBe(400);
      expect(reply.body).toMatchObject({
        code: "VALIDATION_FAILED",
        detail: "Request body is not valid JSON",
      });
    });

    it("should reject a body missing the receiver", async () => {
      const reply = await call(port, "POST", "/api/v1/agent/send", { body: { content: { body: "x" } } });

      expect(reply.status).toBe(400);
      expect(reply.body).toMatchObject({ code: "VALIDATION_FAILED", detail: "Request body is invalid" });
    });

    it("should reject a bad delivery query", async () => {
      const reply = await call(port, "GET", "/api/v1/deliveries?limit=0");

      expect(reply.status).toBe(400);
      expect(reply.body).toMatchObject({ detail: "Query string is invalid" });
    });
  });

  describe("sub-agents and pairing", () => {
    beforeEach(async () => {
      await admin("/api/v1/agents/register", { owner_id: "O1", agent_id: "A1" });
    });

    it("should create a sub-agent once", async () => {
      const first = await call(port, "POST", "/api/v1/agents/A1/sub-agents", {
        body: { child_agent_id: "C1" },
      });
      const second = await call(port, "POST", "/api/v1/agents/A1/sub-agents", {
        body: { child_agent_id: "C1" },
      });

      expect(first.status).toBe(201);
      expect(second.status).toBe(200);
      expect(first.body).toMatchObject({
        agent: { agent_id: "C1", owner_id: "O1", initiator: "agent" },
        edge: { parent_agent_id: "A1", child_agent_id: "C1", created_at: T0 },
      });
      const relationships = await call(port, "GET", "/api/v1/agents/A1/relationships");
      expect(relationships.body).toMatchObject({ agent_id: "A1", children: ["C1"] });
    });

    it("should pair an agent with an issued code", async () => {
      const issued = await admin("/api/v1/pairing/codes", { owner_id: "O1" });
      expect(issued.status).toBe(201);
      const code = issued.body !== null && typeof issued.body === "object" && "code" in issued.body
        ? String(issued.body.code)
        : "";

      const reply = await call(port, "POST", "/api/v1/pairing/submit", {
        body: { code, agent_id: "A9" },
      });

      expect(reply.status).toBe(201);
      expect(reply.body).toMatchObject({
        owner_id: "O1",
        agent: { agent_id: "A9", owner_id: "O1", initiator: "pairing" },
      });
    });
  });

  describe("approvals", () => {
    it("should keep the first callback's decision", async () => {
      const createdReply = await call(port, "POST", "/api/v1/approvals", {
        body: { request_id: "r-1", payload: { tool: "deploy" } },
      });
      expect(createdReply.status).toBe(201);
      expect(createdReply.body).toEqual({
        request_id: "r-1",
        payload: { tool: "deploy" },
        receiver_agent_id: null,
        created_at: T0,
        status: "pending",
      });

      const first = await call(port, "POST", "/api/v1/approvals/r-1/callback", {
        body: { decision: "approved", approver_id: "O1" },
      });
      const second = await call(port, "POST", "/api/v1/approvals/r-1/callback", {
        body: { decision: "rejected" },
      });

      const resolved = {
        request_id: "r-1",
        status: "resolved",
        decision: "approved",
        approver_id: "O1",
        comment: null,
        resolved_at: T0,
      };
      expect(first.body).toEqual(resolved);
      expect(second.body).toEqual(resolved);
      expect((await call(port, "GET", "/api/v1/approvals/r-1")).body).toEqual({
        ...resolved,
        payload: { tool: "deploy" },
        receiver_agent_id: null,
        created_at: T0,
      });
    });

    it("should answer an unknown request with 404", async () => {
      const reply = await call(port, "POST", "/api/v1/approvals/missing/callback", {
        body: { decision: "approved" },
      });

      expect(reply.status).toBe(404);
      expect(reply.body).toMatchObject({ code: "APPROVAL_UNKNOWN_REQUEST" });
    });

    it("should resolve a request through a reply to its card", async () => {
      await admin("/api/v1/agents/register", { owner_id: "O1", agent_id: "A1" });
      const submitted = await call(port, "POST", "/api/v1/approvals", {
        body: { request_id: "r-1", payload: { tool: "deploy" }, receiver_agent_id: "A1" },
      });
      expect(submitted.body).toMatchObject({
        card: { room_id: "!room-1:test", event_id: "$event-1" },
      });

      const reply = await call(port, "POST", "/api/v1/approvals/replies", {
        body: {
          room_id: "!room-1:test",
          in_reply_to: "$event-1",
          body: "> Approval requested: r-1\n\napprove",
          approver_id: "O1",
        },
      });

      expect(reply.status).toBe(200);
      expect(reply.body).toMatchObject({ request_id: "r-1", decision: "approved", approver_id: "O1" });
    });

    it("should answer a reply to an unknown card with 404", async () => {
      const reply = await call(port, "POST", "/api/v1/approvals/replies", {
        body: { room_id: "!room-1:test", in_reply_to: "$event-9", decision: "rejected" },
      });

      expect(reply.status).toBe(404);
      expect(reply.body).toMatchObject({ detail: 'Approval card "$event-9" does not exist' });
    });

    it("should reject a reply that names no decision", async () => {
      const reply = await call(port, "POST", "/api/v1/approvals/replies", {
        body: { room_id: "!room-1:test", in_reply_to: "$event-1", body: "hmm" },
      });

      expect(reply.status).toBe(400);
      expect(reply.body).toMatchObject({ detail: "Reply names no decision" });
    });
  });

  describe("presence", () => {
    beforeEach(async () => {
      await admin("/api/v1/agents/register", { owner_id: "O1", agent_id: "A1" });
    });

    it("should report an agent online after it checks in", async () => {
      const before = await call(port, "GET", "/api/v1/agents/A1/presence");
      const online = await call(port, "POST", "/api/v1/agents/A1/online", { body: {} });
      const beat = await call(port, "POST", "/api/v1/agents/A1/heartbeat", {
        body: { status: "busy" },
      });

      expect(before.body).toEqual({ agent_id: "A1", online: false, status: null, last_seen_at: null });
      expect(online.body).toEqual({ agent_id: "A1", online: true, status: "online", last_seen_at: T0 });
      expect(beat.body).toMatchObject({ status: "busy" });
      expect((await call(port, "GET", "/api/v1/presence")).body).toEqual({ online: ["A1"] });
    });

    it("should answer an unknown agent with 404", async () => {
      const reply = await call(port, "POST", "/api/v1/agents/ghost/heartbeat", { body: {} });

      expect(reply.status).toBe(404);
    });
  });
});
