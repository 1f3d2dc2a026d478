import { describe, expect, it } from "vitest";
import {
  AgentRevokedError,
  CollaboratorRateLimitedError,
  CollaboratorRequestError,
  CollaboratorTimeoutError,
  ConfigurationInvalidError,
  CycleDetectedError,
  DeliveryFailedError,
  DuplicateAgentError,
  DuplicateRequestError,
  ExternalError,
  IdentityError,
  InternalError,
  isErrorOfType,
  isExpectedError,
  isMeridianError,
  isTransientError,
  MeridianError,
  NotFoundError,
  PairingCodeExpiredError,
  PairingCodeInvalidError,
  RoomProvisioningFailedError,
  StorageUnavailableError,
  UnknownAgentError,
  UnknownRequestError,
  ValidationError,
  wrapError,
} from "../../index.js";

describe("MeridianError base class", () => {
  it("should create error with catalog properties", () => {
    const error = new InternalError("Test error");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(MeridianError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("InternalError");
    expect(error._tag).toBe("InternalError");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.httpStatus).toBe(500);
    expect(error.grpcCode).toBe("INTERNAL");
    expect(error.domain).toBe("internal");
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("should carry metadata, trace ID and cause from options", () => {
    const cause = new Error("socket closed");
    const error = new ExternalError({
      code: "STORAGE_UNAVAILABLE",
      message: "db down",
      metadata: { backend: "postgres" },
      traceId: "trace-1",
      cause,
    });

    expect(error.code).toBe("STORAGE_UNAVAILABLE");
    expect(error.httpStatus).toBe(503);
    expect(error.metadata).toEqual({ backend: "postgres" });
    expect(error.traceId).toBe("trace-1");
    expect(error.cause).toBe(cause);
  });

  it("should serialize to JSON", () => {
    const error = new NotFoundError("missing", { key: "value" }, "trace-123");

    expect(error.toJSON()).toMatchObject({
      _tag: "NotFoundError",
      name: "NotFoundError",
      code: "RESOURCE_NOT_FOUND",
      message: "missing",
      httpStatus: 404,
      domain: "resource",
      metadata: { key: "value" },
      traceId: "trace-123",
    });
  });

  it("should keep validation issues", () => {
    const error = new ValidationError("bad body", [
      { field: "receiver_agent_id", message: "Required", code: "invalid_type" },
    ]);

    expect(error.code).toBe("VALIDATION_FAILED");
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]?.field).toBe("receiver_agent_id");
  });
});

describe("domain errors", () => {
  it("should expose identity context", () => {
    const error = new UnknownAgentError("A1");

    expect(error).toBeInstanceOf(IdentityError);
    expect(error.agentId).toBe("A1");
    expect(error.code).toBe("IDENTITY_UNKNOWN_AGENT");
    expect(error.httpStatus).toBe(404);
    expect(error.metadata).toEqual({ agentId: "A1" });
    expect(error.message).toBe('Agent "A1" is not registered');
  });

  it("should describe cycle edges", () => {
    const error = new CycleDetectedError("A2", "A1");

    expect(error.message).toBe(
      "Edge A2 -> A1 would create a cycle in the collaboration chain",
    );
    expect(isErrorOfType(error, "ValidationError")).toBe(true);
  });

  it("should record delivery attempts", () => {
    const cause = new Error("502");
    const error = new DeliveryFailedError("d-1", 3, "channel unavailable", cause);

    expect(error.message).toBe('Delivery "d-1" failed after 3 attempt(s): channel unavailable');
    expect(error.metadata).toEqual({ deliveryId: "d-1", attempts: "3" });
    expect(error.cause).toBe(cause);
  });

  it("should format collaborator failures with and without status", () => {
    expect(new CollaboratorRequestError("audit", 503, "busy").message).toBe(
      "audit request failed (503): busy",
    );
    expect(new CollaboratorRequestError("audit", undefined, "ECONNREFUSED").message).toBe(
      "audit request failed: ECONNREFUSED",
    );
  });

  it("should name the pairing code and why it was refused", () => {
    expect(new PairingCodeInvalidError("ABCD-EFGH", "unissued").message).toBe(
      'Pairing code "ABCD-EFGH" was not issued',
    );
    expect(new PairingCodeInvalidError("ABCD-EFGH", "consumed")).toMatchObject({
      message: 'Pairing code "ABCD-EFGH" has already been used',
      metadata: { refusal: "consumed" },
    });
    expect(new PairingCodeExpiredError("ABCD-EFGH", "2026-01-01T00:10:00.000Z").message).toBe(
      'Pairing code "ABCD-EFGH" expired at 2026-01-01T00:10:00.000Z',
    );
  });

  it("should list every configuration issue", () => {
    const error = new ConfigurationInvalidError([
      { field: "MERIDIAN_PG_URL", message: "Required for postgres", code: "custom" },
      { field: "MERIDIAN_HTTP_PORT", message: "Expected number", code: "invalid_type" },
    ]);

    expect(error.message).toBe(
      "Invalid configuration: MERIDIAN_PG_URL: Required for postgres; MERIDIAN_HTTP_PORT: Expected number",
    );
  });
});

describe("guards", () => {
  it("should classify by behavioral tag", () => {
    expect(isErrorOfType(new UnknownRequestError("req-1"), "NotFoundError")).toBe(true);
    expect(isErrorOfType(new DuplicateRequestError("req-1"), "ConflictError")).toBe(true);
    expect(isErrorOfType(new StorageUnavailableError("sqlite", "get"), "ExternalError")).toBe(true);
    expect(isErrorOfType(new DuplicateAgentError("A1"), "ExternalError")).toBe(false);
    expect(isMeridianError(new Error("plain"))).toBe(false);
  });

  it("should report expected errors", () => {
    expect(isExpectedError(new AgentRevokedError("A1"))).toBe(true);
    expect(isExpectedError(new RoomProvisioningFailedError("A1", "down"))).toBe(false);
    expect(isExpectedError("nope")).toBe(false);
  });

  it("should treat infrastructure failures as transient", () => {
    expect(isTransientError(new StorageUnavailableError("pg", "put"))).toBe(true);
    expect(isTransientError(new CollaboratorTimeoutError("chain", 5000))).toBe(true);
    expect(isTransientError(new CollaboratorRateLimitedError("channel"))).toBe(true);
    expect(isTransientError(new TypeError("fetch failed"))).toBe(true);
  });

  it("should treat validation and identity failures as permanent", () => {
    expect(isTransientError(new UnknownAgentError("A1"))).toBe(false);
    expect(isTransientError(new CycleDetectedError("A1", "A2"))).toBe(false);
    expect(isTransientError(new InternalError("bug"))).toBe(false);
  });
});

describe("wrapError", () => {
  it("should return MeridianErrors unchanged", () => {
    const error = new UnknownAgentError("A1");
    expect(wrapError(error)).toBe(error);
  });

  it("should wrap plain errors as internal", () => {
    const wrapped = wrapError(new RangeError("oops"), "trace-9");

    expect(wrapped.code).toBe("INTERNAL_ERROR");
    expect(wrapped.message).toBe("oops");
    expect(wrapped.metadata).toEqual({ originalName: "RangeError" });
    expect(wrapped.traceId).toBe("trace-9");
  });

  it("should wrap non-error values", () => {
    expect(wrapError(42).message).toBe("An unknown error occurred");
    expect(wrapError("text").message).toBe("text");
  });
});
