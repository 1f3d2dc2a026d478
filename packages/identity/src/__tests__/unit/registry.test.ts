import {
  AgentRevokedError,
  CycleDetectedError,
  DuplicateAgentError,
  IdentityConflictError,
  UnknownAgentError,
  UnknownOwnerError,
  ValidationError,
} from "@meridian/errors";
import { MAX_ID_LENGTH } from "@meridian/core";
import { MemoryBackend } from "@meridian/storage";
import {
  createFakeClock,
  type FakeClock,
  MockAuditCollaborator,
} from "@meridian/test-utils";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { IdentityRegistry } from "../../registry.js";

describe("IdentityRegistry", () => {
  let clock: FakeClock;
  let audit: MockAuditCollaborator;
  let registry: IdentityRegistry;

  beforeEach(() => {
    clock = createFakeClock();
    audit = new MockAuditCollaborator();
    registry = new IdentityRegistry({ backend: new MemoryBackend(), clock, audit });
  });

  describe("registerOwner", () => {
    it("should create an owner", async () => {
      const owner = await registry.registerOwner("o1", { name: "Ada" });

      expect(owner).toEqual({
        ownerId: "o1",
        metadata: { name: "Ada" },
        createdAt: "2026-01-01T00:00:00.000Z",
      });
    });

    it("should be idempotent for identical metadata", async () => {
      const first = await registry.registerOwner("o1", { name: "Ada" });
      clock.advance(1000);

      const second = await registry.registerOwner("o1", { name: "Ada" });

      expect(second).toEqual(first);
    });

    it("should reject conflicting metadata", async () => {
      await registry.registerOwner("o1", { name: "Ada" });

      await expect(registry.registerOwner("o1", { name: "Grace" })).rejects.toBeInstanceOf(
        IdentityConflictError,
      );
    });

    it("should reject an empty id", async () => {
      await expect(registry.registerOwner("  ")).rejects.toBeInstanceOf(ValidationError);
    });

    it("should reject an id longer than the id limit", async () => {
      await expect(registry.registerOwner("o".repeat(MAX_ID_LENGTH + 1))).rejects.toBeInstanceOf(
        ValidationError,
      );
      await expect(registry.registerOwner("o".repeat(MAX_ID_LENGTH))).resolves.toMatchObject({
        metadata: {},
      });
    });
  });

  describe("registerAgent", () => {
    it("should create a pending, unbound agent", async () => {
      const agent = await registry.registerAgent({ agentId: "a1" });

      expect(agent).toMatchObject({
        agentId: "a1",
        ownerId: null,
        did: null,
        status: "pending",
        initiator: "human",
        metadata: {},
      });
    });

    it("should reject a duplicate agent id", async () => {
      await registry.registerAgent({ agentId: "a1" });

      await expect(registry.registerAgent({ agentId: "a1" })).rejects.toBeInstanceOf(
        DuplicateAgentError,
      );
    });
  });

  describe("bind", () => {
    beforeEach(async () => {
      await registry.registerOwner("o1");
      await registry.registerOwner("o2");
      await registry.registerAgent({ agentId: "a1" });
    });

    it("should bind and activate the agent", async () => {
      await registry.bind("o1", "a1");

      expect(await registry.getAgent("a1")).toMatchObject({ ownerId: "o1", status: "active" });
      expect((await registry.agentsByOwner("o1")).map((a) => a.agentId)).toEqual(["a1"]);
    });

    it("should replace the previous binding", async () => {
      await registry.bind("o1", "a1");
      clock.advance(1000);
      await registry.bind("o2", "a1");

      expect(await registry.agentsByOwner("o1")).toEqual([]);
      expect((await registry.agentsByOwner("o2")).map((a) => a.agentId)).toEqual(["a1"]);
    });

    it("should reject unknown owners and agents", async () => {
      await expect(registry.bind("nobody", "a1")).rejects.toBeInstanceOf(UnknownOwnerError);
      await expect(registry.bind("o1", "ghost")).rejects.toBeInstanceOf(UnknownAgentError);
    });

    it("should reject a revoked agent", async () => {
      await registry.revokeAgent("a1");

      await expect(registry.bind("o1", "a1")).rejects.toBeInstanceOf(AgentRevokedError);
    });

    it("should record owner changes newest first", async () => {
      await registry.bind("o1", "a1");
      clock.advance(1000);
      await registry.bind("o2", "a1");
      clock.advance(1000);
      await registry.unbind("a1");

      const history = await registry.ownerChangeHistory("a1");

      expect(history).toEqual([
        { agentId: "a1", fromOwner: "o2", toOwner: null, at: "2026-01-01T00:00:02.000Z" },
        { agentId: "a1", fromOwner: "o1", toOwner: "o2", at: "2026-01-01T00:00:01.000Z" },
        { agentId: "a1", fromOwner: null, toOwner: "o1", at: "2026-01-01T00:00:00.000Z" },
      ]);
      expect(await registry.ownerChangeHistory("a1", 1)).toHaveLength(1);
    });

    it("should not record a rebind to the same owner", async () => {
      await registry.bind("o1", "a1");
      await registry.bind("o1", "a1");

      expect(await registry.ownerChangeHistory("a1")).toHaveLength(1);
    });

    it("should report false when unbinding an unbound agent", async () => {
      expect(await registry.unbind("a1")).toBe(false);
    });

    it("should keep a DID recorded while a rebind is in flight", async () => {
      await registry.bind("o1", "a1");

      await Promise.all([registry.bind("o2", "a1"), registry.recordDid("a1", "did:test:a1")]);

      expect(await registry.getAgent("a1")).toMatchObject({
        ownerId: "o2",
        did: "did:test:a1",
        status: "active",
      });
    });
  });

  describe("agentsByOwner", () => {
    it("should reject an unknown owner", async () => {
      await expect(registry.agentsByOwner("nobody")).rejects.toBeInstanceOf(UnknownOwnerError);
    });
  });

  describe("revokeAgent", () => {
    it("should be terminal and idempotent", async () => {
      await registry.registerAgent({ agentId: "a1" });

      const first = await registry.revokeAgent("a1");
      clock.advance(1000);
      const second = await registry.revokeAgent("a1");

      expect(first.status).toBe("revoked");
      expect(second).toEqual(first);
    });

    it("should stay revoked when a DID lands during revocation", async () => {
      await registry.registerAgent({ agentId: "a1" });

      await Promise.all([registry.revokeAgent("a1"), registry.recordDid("a1", "did:test:a1")]);

      expect(await registry.getAgent("a1")).toMatchObject({
        status: "revoked",
        did: "did:test:a1",
      });
    });
  });

  describe("registerSubAgent", () => {
    beforeEach(async () => {
      for (const agentId of ["a1", "a2", "a3"]) {
        await registry.registerAgent({ agentId });
      }
    });

    it("should add an edge and notify the audit service", async () => {
      const edge = await registry.registerSubAgent("a1", "a2");
      await registry.drain();

      expect(edge).toEqual({
        parentAgentId: "a1",
        childAgentId: "a2",
        createdAt: "2026-01-01T00:00:00.000Z",
      });
      expect(audit.subAgents).toEqual([{ parentAgentId: "a1", childAgentId: "a2" }]);
    });

    it("should be idempotent for an existing edge", async () => {
      const first = await registry.registerSubAgent("a1", "a2");
      clock.advance(1000);
      const second = await registry.registerSubAgent("a1", "a2");
      await registry.drain();

      expect(second).toEqual(first);
      expect(audit.subAgents).toHaveLength(1);
    });

    it("should reject an edge that closes a cycle", async () => {
      await registry.registerSubAgent("a1", "a2");
      await registry.registerSubAgent("a2", "a3");

      await expect(registry.registerSubAgent("a3", "a1")).rejects.toBeInstanceOf(
        CycleDetectedError,
      );
      await expect(registry.registerSubAgent("a2", "a2")).rejects.toBeInstanceOf(
        CycleDetectedError,
      );
    });

    it("should keep the graph acyclic under concurrent registrations", async () => {
      const results = await Promise.allSettled([
        registry.registerSubAgent("a1", "a2"),
        registry.registerSubAgent("a2", "a1"),
      ]);

      expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected"]);
      expect(await registry.children("a1")).toEqual(["a2"]);
      expect(await registry.children("a2")).toEqual([]);
    });

    it("should reject unknown and revoked agents", async () => {
      await registry.revokeAgent("a3");

      await expect(registry.registerSubAgent("a1", "ghost")).rejects.toBeInstanceOf(
        UnknownAgentError,
      );
      await expect(registry.registerSubAgent("a1", "a3")).rejects.toBeInstanceOf(
        AgentRevokedError,
      );
    });

    it("should log a failed audit notice without failing the registration", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      audit.notifySubAgent.mockRejectedValueOnce(new Error("audit down"));

      await expect(registry.registerSubAgent("a1", "a2")).resolves.toMatchObject({
        childAgentId: "a2",
      });
      await registry.drain();

      expect(warn).toHaveBeenCalledWith(
        "[Identity] Sub-agent notice a1 -> a2 failed: audit down",
      );
      warn.mockRestore();
    });
  });

  describe("relationships", () => {
    beforeEach(async () => {
      await registry.registerOwner("o1");
      for (const agentId of ["a1", "a2", "a3", "a4"]) {
        await registry.registerAgent({ agentId });
      }
      await registry.bind("o1", "a1");
      await registry.registerSubAgent("a1", "a2");
      await registry.registerSubAgent("a1", "a3");
      await registry.registerSubAgent("a2", "a4");
    });

    it("should summarize the chain under an agent", async () => {
      const summary = await registry.chainSummary("a1");

      expect(summary.agentIds).toEqual(["a2", "a3", "a4"]);
      expect(summary.depth).toBe(2);
    });

    it("should describe an agent's relationships", async () => {
      const relationships = await registry.agentRelationships("a2");

      expect(relationships).toMatchObject({
        agentId: "a2",
        ownerId: null,
        parents: ["a1"],
        children: ["a4"],
      });
      expect(relationships.chain.agentIds).toEqual(["a4"]);
    });

    it("should list every agent with its sub-agents", async () => {
      const entries = await registry.listRelationships();

      expect(entries).toEqual([
        { agentId: "a1", ownerId: "o1", status: "active", did: null, subAgents: ["a2", "a3"] },
        { agentId: "a2", ownerId: null, status: "pending", did: null, subAgents: ["a4"] },
        { agentId: "a3", ownerId: null, status: "pending", did: null, subAgents: [] },
        { agentId: "a4", ownerId: null, status: "pending", did: null, subAgents: [] },
      ]);
    });
  });

  describe("edge keys", () => {
    it("should keep edges apart when ids contain the separator", async () => {
      await registry.registerOwner("o1");
      for (const agentId of ["x", "y->z", "x->y", "z"]) {
        await registry.registerAgent({ agentId });
        await registry.bind("o1", agentId);
      }

      await registry.registerSubAgent("x", "y->z");
      await registry.registerSubAgent("x->y", "z");

      expect((await registry.agentRelationships("x->y")).children).toEqual(["z"]);
      expect((await registry.agentRelationships("x")).children).toEqual(["y->z"]);
    });
  });

  describe("identity links", () => {
    it("should resolve identifiers across namespaces", async () => {
      await registry.linkIdentity("p1", { imUserId: "ou_123" });
      await registry.linkIdentity("p1", { channelUserId: "@p1:hs.test" });

      expect(await registry.resolveCounterpart("im", "ou_123")).toBe("@p1:hs.test");
      expect(await registry.resolveCounterpart("channel", "@p1:hs.test")).toBe("ou_123");
      expect(await registry.resolveCounterpart("im", "ou_unknown")).toBeNull();
    });

    it("should return null when the counterpart is not linked yet", async () => {
      await registry.linkIdentity("p2", { imUserId: "ou_456" });

      expect(await registry.resolveCounterpart("im", "ou_456")).toBeNull();
    });
  });

  describe("refreshDid", () => {
    it("should warn and skip without a chain service", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      await registry.registerAgent({ agentId: "a1" });

      await registry.refreshDid("a1");

      expect(warn).toHaveBeenCalledWith(
        '[Identity] No chain service configured; DID for agent "a1" not requested',
      );
      expect(registry.dids).toBeUndefined();
      warn.mockRestore();
    });

    it("should reject an unknown agent", async () => {
      await expect(registry.refreshDid("ghost")).rejects.toBeInstanceOf(UnknownAgentError);
    });
  });
});
