import type { JsonObject } from "@meridian/core";
import { InternalError } from "@meridian/errors";
import type { z } from "zod";
import type { PersistenceBackend } from "./types.js";

/**
 * A named collection bound to the zod schema of its records. Values read back
 * are validated, so a corrupt or foreign record surfaces as an InternalError
 * instead of flowing on with the wrong shape.
 */
export class Collection<T extends JsonObject> {
  constructor(
    private readonly backend: PersistenceBackend,
    readonly name: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) {}

  async get(key: string): Promise<T | null> {
    const record = await this.backend.get(this.name, key);
    return record === null ? null : this.decode(record, key);
  }

  async put(key: string, value: T): Promise<void> {
    await this.backend.put(this.name, key, value);
  }

  async putIfAbsent(key: string, value: T): Promise<{ record: T; created: boolean }> {
    const result = await this.backend.putIfAbsent(this.name, key, value);
    return { record: this.decode(result.record, key), created: result.created };
  }

  async query(predicate?: (value: T) => boolean): Promise<T[]> {
    const records = await this.backend.query(this.name);
    const decoded = records.map((record) => this.decode(record));
    return predicate ? decoded.filter(predicate) : decoded;
  }

  async delete(key: string): Promise<boolean> {
    return this.backend.delete(this.name, key);
  }

  private decode(record: JsonObject, key?: string): T {
    const parsed = this.schema.safeParse(record);
    if (!parsed.success) {
      throw new InternalError({
        code: "INTERNAL_ERROR",
        message: `Malformed record in collection "${this.name}"`,
        metadata: { collection: this.name, ...(key === undefined ? {} : { key }) },
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
