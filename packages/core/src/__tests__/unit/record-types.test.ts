import { describe, expect, it } from "vitest";
import { NativeMessageSchema } from "../../message-types.js";
import { AgentSchema, RoomRecordSchema } from "../../record-types.js";

describe("RoomRecordSchema", () => {
  it("should parse a provisioning placeholder", () => {
    const parsed = RoomRecordSchema.parse({
      status: "provisioning",
      scopeKey: "A1",
      policy: "dedicated",
      claimToken: "t-1",
      claimedAt: "2026-01-01T00:00:00.000Z",
    });

    expect(parsed.status).toBe("provisioning");
  });

  it("should reject a ready record without a room id", () => {
    const result = RoomRecordSchema.safeParse({
      status: "ready",
      scopeKey: "A1",
      policy: "dedicated",
      createdAt: "2026-01-01T00:00:00.000Z",
    });

    expect(result.success).toBe(false);
  });
});

describe("AgentSchema", () => {
  it("should require explicit nulls for unset fields", () => {
    const result = AgentSchema.safeParse({
      agentId: "A1",
      status: "pending",
      initiator: "human",
      metadata: {},
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:00.000Z",
    });

    expect(result.success).toBe(false);
  });
});

describe("NativeMessageSchema", () => {
  it("should default extensions and post title", () => {
    const parsed = NativeMessageSchema.parse({
      kind: "post",
      paragraphs: [[{ tag: "text", text: "hello" }]],
    });

    expect(parsed).toEqual({
      kind: "post",
      title: null,
      paragraphs: [[{ tag: "text", text: "hello" }]],
      extensions: {},
    });
  });

  it("should reject unknown kinds", () => {
    expect(NativeMessageSchema.safeParse({ kind: "sticker" }).success).toBe(false);
  });
});
