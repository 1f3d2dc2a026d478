import { describe, expect, it } from "vitest";
import { MYSQL_DIALECT } from "../../sql/dialects.js";

describe("MYSQL_DIALECT", () => {
  it("should use a binary no-pad collation for keys", () => {
    expect(MYSQL_DIALECT.createTable).toMatch(/ COLLATE utf8mb4_0900_bin$/);
  });
});
