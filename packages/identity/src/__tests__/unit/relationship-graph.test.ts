import type { RelationshipEdge } from "@meridian/core";
import { describe, expect, it } from "vitest";
import { edgeKey, summarizeChain, wouldCreateCycle } from "../../relationship-graph.js";

const AT = "2026-01-01T00:00:00.000Z";

function edge(parentAgentId: string, childAgentId: string): RelationshipEdge {
  return { parentAgentId, childAgentId, createdAt: AT };
}

describe("relationship graph", () => {
  it("should key edges by parent and child", () => {
    expect(edgeKey("a1", "a2")).toBe("2:a1/a2");
  });

  it("should give distinct keys to pairs whose ids join to the same text", () => {
    expect(edgeKey("x", "y/z")).toBe("1:x/y/z");
    expect(edgeKey("x/y", "z")).toBe("3:x/y/z");
  });

  describe("summarizeChain", () => {
    it("should walk descendants breadth first", () => {
      const edges = [edge("root", "b"), edge("b", "d"), edge("root", "c"), edge("c", "e")];

      const summary = summarizeChain("root", edges);

      expect(summary.agentIds).toEqual(["b", "c", "d", "e"]);
      expect(summary.depth).toBe(2);
      expect(summary.edges).toHaveLength(4);
    });

    it("should return an empty chain for a leaf", () => {
      expect(summarizeChain("leaf", [edge("root", "leaf")])).toEqual({
        rootAgentId: "leaf",
        agentIds: [],
        edges: [],
        depth: 0,
      });
    });

    it("should visit a shared descendant once", () => {
      const edges = [edge("r", "x"), edge("r", "y"), edge("x", "z"), edge("y", "z")];

      const summary = summarizeChain("r", edges);

      expect(summary.agentIds).toEqual(["x", "y", "z"]);
      expect(summary.edges).toHaveLength(4);
    });

    it("should terminate on a cyclic edge set", () => {
      const summary = summarizeChain("a", [edge("a", "b"), edge("b", "a")]);

      expect(summary.agentIds).toEqual(["b"]);
      expect(summary.depth).toBe(1);
    });
  });

  describe("wouldCreateCycle", () => {
    it("should reject a self edge", () => {
      expect(wouldCreateCycle("a", "a", [])).toBe(true);
    });

    it.each([2, 3, 5, 8])("should reject closing a chain of length %i", (length) => {
      const ids = Array.from({ length }, (_, i) => `agent-${i}`);
      const edges = ids.slice(1).map((id, i) => edge(ids[i] ?? "", id));
      const last = ids[ids.length - 1] ?? "";

      expect(wouldCreateCycle(last, "agent-0", edges)).toBe(true);
    });

    it("should allow a diamond", () => {
      const edges = [edge("r", "x"), edge("r", "y"), edge("x", "z")];

      expect(wouldCreateCycle("y", "z", edges)).toBe(false);
    });
  });
});
