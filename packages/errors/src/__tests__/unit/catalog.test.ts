import { describe, expect, it } from "vitest";
import {
  ERROR_CATALOG,
  getAllErrorCodes,
  isValidErrorCode,
  validateCatalog,
} from "../../index.js";

describe("ERROR_CATALOG", () => {
  it("should cover every hub domain", () => {
    const domains = new Set(Object.values(ERROR_CATALOG).map((e) => e.domain));

    for (const domain of [
      "internal",
      "auth",
      "identity",
      "room",
      "delivery",
      "storage",
      "approval",
      "pairing",
      "collaborator",
    ]) {
      expect(domains).toContain(domain);
    }
  });

  it("should have valid gRPC codes for all entries", () => {
    const validGrpcCodes = [
      "INVALID_ARGUMENT",
      "DEADLINE_EXCEEDED",
      "NOT_FOUND",
      "ALREADY_EXISTS",
      "PERMISSION_DENIED",
      "RESOURCE_EXHAUSTED",
      "FAILED_PRECONDITION",
      "INTERNAL",
      "UNAVAILABLE",
      "UNAUTHENTICATED",
    ];

    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(validGrpcCodes).toContain(entry.grpcCode);
    }
  });

  it("should pass the consistency check", () => {
    expect(validateCatalog()).toEqual({ valid: true, errors: [] });
  });

  it("should mark identity failures as expected and infrastructure failures as unexpected", () => {
    expect(ERROR_CATALOG.IDENTITY_UNKNOWN_AGENT.isExpected).toBe(true);
    expect(ERROR_CATALOG.STORAGE_UNAVAILABLE.isExpected).toBe(false);
    expect(ERROR_CATALOG.DELIVERY_FAILED.isExpected).toBe(false);
  });
});

describe("catalog helpers", () => {
  it("should recognize valid codes only", () => {
    expect(isValidErrorCode("DELIVERY_FAILED")).toBe(true);
    expect(isValidErrorCode("NOT_A_CODE")).toBe(false);
    expect(isValidErrorCode("toString")).toBe(false);
  });

  it("should list every code", () => {
    expect(getAllErrorCodes()).toHaveLength(Object.keys(ERROR_CATALOG).length);
    expect(getAllErrorCodes()).toContain("PAIRING_CODE_EXPIRED");
  });
});
