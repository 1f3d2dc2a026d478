import { describe, expect, it } from "vitest";
import {
  ConfigurationInvalidError,
  ProblemDetailsSchema,
  readProblemDetail,
  serializeToRFC9457,
  toProblemDetails,
  UnknownAgentError,
  ValidationError,
} from "../../index.js";

describe("serializeToRFC9457", () => {
  it("should map a domain error to problem details", () => {
    const details = serializeToRFC9457(new UnknownAgentError("A1"), "/api/v1/agent/send");

    expect(details).toMatchObject({
      type: "/errors/IDENTITY_UNKNOWN_AGENT",
      title: "Unknown agent",
      status: 404,
      detail: 'Agent "A1" is not registered',
      instance: "/api/v1/agent/send",
      code: "IDENTITY_UNKNOWN_AGENT",
      domain: "identity",
      metadata: { agentId: "A1" },
    });
    expect(ProblemDetailsSchema.safeParse(details).success).toBe(true);
  });

  it("should include validation issues", () => {
    const details = serializeToRFC9457(
      new ValidationError("bad", [{ field: "content", message: "Required", code: "invalid_type" }]),
    );

    expect(details.errors).toEqual([
      { field: "content", message: "Required", code: "invalid_type" },
    ]);
  });

  it("should include configuration issues", () => {
    const details = serializeToRFC9457(
      new ConfigurationInvalidError([
        { field: "MERIDIAN_STORAGE", message: "Invalid enum value", code: "invalid_enum_value" },
      ]),
    );

    expect(details.status).toBe(500);
    expect(details.errors).toHaveLength(1);
  });
});

describe("toProblemDetails", () => {
  it("should hide messages of unclassified errors", () => {
    const details = toProblemDetails(new Error("password=test-secret"));

    expect(details.code).toBe("INTERNAL_ERROR");
    expect(details.status).toBe(500);
    expect(details.detail).toBe("An unexpected error occurred");
    expect(details.metadata).toBeUndefined();
  });
});

describe("readProblemDetail", () => {
  it("should read the detail of a problem body", () => {
    expect(readProblemDetail({ type: "/x", title: "Bad", status: 400, detail: "nope" })).toBe(
      "nope",
    );
    expect(readProblemDetail({ type: "/x", title: "Bad", status: 400 })).toBe("Bad");
  });

  it("should return undefined for other bodies", () => {
    expect(readProblemDetail({ errcode: "M_FORBIDDEN" })).toBeUndefined();
    expect(readProblemDetail("text")).toBeUndefined();
  });
});
