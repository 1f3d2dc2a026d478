import { z } from "zod";
import { describe, expect, it } from "vitest";
import { Collection } from "../../collection.js";
import { MemoryBackend } from "../../memory-backend.js";

const CounterSchema = z.object({ name: z.string(), count: z.number().int() });

describe("Collection", () => {
  it("should round-trip typed records", async () => {
    const counters = new Collection(new MemoryBackend(), "counters", CounterSchema);

    await counters.put("a", { name: "a", count: 1 });

    expect(await counters.get("a")).toEqual({ name: "a", count: 1 });
    expect(await counters.get("missing")).toBeNull();
  });

  it("should filter typed query results", async () => {
    const counters = new Collection(new MemoryBackend(), "counters", CounterSchema);
    await counters.put("a", { name: "a", count: 1 });
    await counters.put("b", { name: "b", count: 5 });

    expect(await counters.query((c) => c.count > 2)).toEqual([{ name: "b", count: 5 }]);
  });

  it("should fail with an internal error on malformed stored records", async () => {
    const backend = new MemoryBackend();
    await backend.put("counters", "bad", { name: 7 });
    const counters = new Collection(backend, "counters", CounterSchema);

    await expect(counters.get("bad")).rejects.toMatchObject({
      code: "INTERNAL_ERROR",
      message: 'Malformed record in collection "counters"',
      metadata: { collection: "counters", key: "bad" },
    });
  });
});
