/**
 * Error codes of the hub. An entry fixes the HTTP status, the gRPC canonical
 * code, the behavioral base type and the problem-details title of its code.
 * Codes start with their domain in upper case.
 */

/** Behavioral types; retry and HTTP handling switch on these. */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "PermissionError"
  | "ConflictError"
  | "RateLimitError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL",
    baseType: "InternalError",
    isExpected: false,
    title: "Internal server error",
    description: "An unexpected error occurred",
  },
  INTERNAL_UNAVAILABLE: {
    domain: "internal",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Service unavailable",
    description: "The service is temporarily unavailable",
  },

  // ============================================================================
  // AUTH ERRORS - Admin token checks on the HTTP API
  // ============================================================================
  AUTH_TOKEN_MISSING: {
    domain: "auth",
    httpStatus: 401,
    grpcCode: "UNAUTHENTICATED",
    baseType: "PermissionError",
    isExpected: true,
    title: "Missing authentication token",
    description: "Authentication token is required but not provided",
  },
  AUTH_TOKEN_INVALID: {
    domain: "auth",
    httpStatus: 403,
    grpcCode: "PERMISSION_DENIED",
    baseType: "PermissionError",
    isExpected: true,
    title: "Invalid authentication token",
    description: "The authentication token is invalid",
  },

  // ============================================================================
  // RESOURCE / VALIDATION ERRORS - Generic request handling
  // ============================================================================
  RESOURCE_NOT_FOUND: {
    domain: "resource",
    httpStatus: 404,
    grpcCode: "NOT_FOUND",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Resource not found",
    description: "The requested resource does not exist",
  },
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT",
    baseType: "ValidationError",
    isExpected: true,
    title: "Validation failed",
    description: "The input failed validation",
  },
  CONFIGURATION_INVALID: {
    domain: "config",
    httpStatus: 500,
    grpcCode: "FAILED_PRECONDITION",
    baseType: "ValidationError",
    isExpected: false,
    title: "Invalid configuration",
    description: "The hub configuration is missing or malformed",
  },

  // ============================================================================
  // IDENTITY ERRORS - Owners, agents, bindings, relationship edges
  // ============================================================================
  IDENTITY_CONFLICT: {
    domain: "identity",
    httpStatus: 409,
    grpcCode: "ALREADY_EXISTS",
    baseType: "ConflictError",
    isExpected: true,
    title: "Identity conflict",
    description: "An owner with this id exists with different metadata",
  },
  IDENTITY_DUPLICATE_AGENT: {
    domain: "identity",
    httpStatus: 409,
    grpcCode: "ALREADY_EXISTS",
    baseType: "ConflictError",
    isExpected: true,
    title: "Duplicate agent",
    description: "An agent with this id is already registered",
  },
  IDENTITY_UNKNOWN_OWNER: {
    domain: "identity",
    httpStatus: 404,
    grpcCode: "NOT_FOUND",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Unknown owner",
    description: "No owner is registered under this id",
  },
  IDENTITY_UNKNOWN_AGENT: {
    domain: "identity",
    httpStatus: 404,
    grpcCode: "NOT_FOUND",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Unknown agent",
    description: "No agent is registered under this id",
  },
  IDENTITY_AGENT_REVOKED: {
    domain: "identity",
    httpStatus: 409,
    grpcCode: "FAILED_PRECONDITION",
    baseType: "ConflictError",
    isExpected: true,
    title: "Agent revoked",
    description: "The agent has been revoked and can no longer be used",
  },
  IDENTITY_CYCLE_DETECTED: {
    domain: "identity",
    httpStatus: 422,
    grpcCode: "INVALID_ARGUMENT",
    baseType: "ValidationError",
    isExpected: true,
    title: "Relationship cycle detected",
    description: "The sub-agent edge would close a cycle in the collaboration chain",
  },

  // ============================================================================
  // ROOM / DELIVERY / STORAGE ERRORS - Transient infrastructure failures
  // ============================================================================
  ROOM_PROVISIONING_FAILED: {
    domain: "room",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Room provisioning failed",
    description: "The channel collaborator could not create a room",
  },
  DELIVERY_FAILED: {
    domain: "delivery",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Delivery failed",
    description: "The message could not be delivered after all retries",
  },
  STORAGE_UNAVAILABLE: {
    domain: "storage",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Storage unavailable",
    description: "The persistence backend could not be reached",
  },

  // ============================================================================
  // APPROVAL ERRORS - Idempotence boundary of approval requests
  // ============================================================================
  APPROVAL_DUPLICATE_REQUEST: {
    domain: "approval",
    httpStatus: 409,
    grpcCode: "ALREADY_EXISTS",
    baseType: "ConflictError",
    isExpected: true,
    title: "Duplicate approval request",
    description: "An approval request with this id exists with a different payload",
  },
  APPROVAL_UNKNOWN_REQUEST: {
    domain: "approval",
    httpStatus: 404,
    grpcCode: "NOT_FOUND",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Unknown approval request",
    description: "No approval request exists with this id",
  },

  // ============================================================================
  // PAIRING ERRORS - Pairing-code registration
  // ============================================================================
  PAIRING_CODE_INVALID: {
    domain: "pairing",
    httpStatus: 403,
    grpcCode: "PERMISSION_DENIED",
    baseType: "PermissionError",
    isExpected: true,
    title: "Invalid pairing code",
    description: "The provided pairing code is invalid or already used",
  },
  PAIRING_CODE_EXPIRED: {
    domain: "pairing",
    httpStatus: 410,
    grpcCode: "FAILED_PRECONDITION",
    baseType: "ValidationError",
    isExpected: true,
    title: "Pairing code expired",
    description: "The pairing code has expired",
  },

  // ============================================================================
  // COLLABORATOR ERRORS - Outbound HTTP calls to chain/audit/channel services
  // ============================================================================
  COLLABORATOR_TIMEOUT: {
    domain: "collaborator",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED",
    baseType: "TimeoutError",
    isExpected: false,
    title: "Collaborator timeout",
    description: "An external collaborator did not answer in time",
  },
  COLLABORATOR_REQUEST_FAILED: {
    domain: "collaborator",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Collaborator request failed",
    description: "An external collaborator answered with an error",
  },
  COLLABORATOR_RATE_LIMITED: {
    domain: "collaborator",
    httpStatus: 429,
    grpcCode: "RESOURCE_EXHAUSTED",
    baseType: "RateLimitError",
    isExpected: false,
    title: "Collaborator rate limited",
    description: "An external collaborator is throttling requests",
  },
  COLLABORATOR_REQUEST_REJECTED: {
    domain: "collaborator",
    httpStatus: 502,
    grpcCode: "FAILED_PRECONDITION",
    baseType: "ValidationError",
    isExpected: false,
    title: "Collaborator rejected request",
    description: "An external collaborator rejected the request as invalid",
  },
} as const;

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
