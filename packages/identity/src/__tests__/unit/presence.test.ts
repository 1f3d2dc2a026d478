import { AgentRevokedError, UnknownAgentError } from "@meridian/errors";
import { MemoryBackend } from "@meridian/storage";
import { createFakeClock, type FakeClock } from "@meridian/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PresenceTracker } from "../../presence.js";
import { IdentityRegistry } from "../../registry.js";

describe("PresenceTracker", () => {
  let clock: FakeClock;
  let registry: IdentityRegistry;
  let presence: PresenceTracker;

  beforeEach(async () => {
    const backend = new MemoryBackend();
    clock = createFakeClock();
    registry = new IdentityRegistry({ backend, clock });
    presence = new PresenceTracker({ backend, registry, clock, offlineAfterMs: 60_000 });
    for (const agentId of ["a1", "a2"]) {
      await registry.registerAgent({ agentId });
    }
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should report an agent that never checked in as offline", async () => {
    expect(await presence.getStatus("a1")).toEqual({
      agentId: "a1",
      online: false,
      status: null,
      lastSeenAt: null,
    });
  });

  it("should mark an agent online", async () => {
    const status = await presence.markOnline("a1");

    expect(status).toEqual({
      agentId: "a1",
      online: true,
      status: "online",
      lastSeenAt: "2026-01-01T00:00:00.000Z",
    });
    expect(console.info).toHaveBeenCalledWith('[Presence] Agent "a1" is online');
  });

  it("should go offline once the threshold passes without a heartbeat", async () => {
    await presence.markOnline("a1");

    clock.advance(60_000);
    expect((await presence.getStatus("a1")).online).toBe(true);

    clock.advance(1);
    expect((await presence.getStatus("a1")).online).toBe(false);
  });

  it("should keep the status across heartbeats unless one is given", async () => {
    await presence.markOnline("a1", "busy");
    clock.advance(30_000);

    const kept = await presence.heartbeat("a1");
    const changed = await presence.heartbeat("a1", "idle");

    expect(kept).toMatchObject({ status: "busy", lastSeenAt: "2026-01-01T00:00:30.000Z" });
    expect(changed.status).toBe("idle");
  });

  it("should treat a first heartbeat as coming online", async () => {
    expect(await presence.heartbeat("a2")).toMatchObject({ online: true, status: "online" });
  });

  it("should list agents heard from within the threshold", async () => {
    await presence.markOnline("a2");
    clock.advance(45_000);
    await presence.markOnline("a1");
    clock.advance(20_000);

    expect(await presence.listOnline()).toEqual(["a1"]);
  });

  it("should reject unknown and revoked agents", async () => {
    await registry.revokeAgent("a2");

    await expect(presence.markOnline("ghost")).rejects.toBeInstanceOf(UnknownAgentError);
    await expect(presence.heartbeat("a2")).rejects.toBeInstanceOf(AgentRevokedError);
    await expect(presence.getStatus("ghost")).rejects.toBeInstanceOf(UnknownAgentError);
  });
});
