/**
 * Identity errors: owners, agents, bindings and sub-agent edges
 *
 * Abstract base: IdentityError
 * Concrete:
 *   - IdentityConflictError   (IDENTITY_CONFLICT)
 *   - DuplicateAgentError     (IDENTITY_DUPLICATE_AGENT)
 *   - UnknownOwnerError       (IDENTITY_UNKNOWN_OWNER)
 *   - UnknownAgentError       (IDENTITY_UNKNOWN_AGENT)
 *   - AgentRevokedError       (IDENTITY_AGENT_REVOKED)
 *   - CycleDetectedError      (IDENTITY_CYCLE_DETECTED)
 */

import { MeridianError } from "./base.js";
import {
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class IdentityError extends MeridianError {}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

export class IdentityConflictError extends IdentityError {
  readonly _tag = "ConflictError" as const;
  readonly code = "IDENTITY_CONFLICT" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.IDENTITY_CONFLICT.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.IDENTITY_CONFLICT.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.IDENTITY_CONFLICT.domain;
  readonly isExpected: boolean = ERROR_CATALOG.IDENTITY_CONFLICT.isExpected;

  constructor(readonly ownerId: string) {
    super(`Owner "${ownerId}" already exists with different metadata`, { ownerId });
  }
}

export class DuplicateAgentError extends IdentityError {
  readonly _tag = "ConflictError" as const;
  readonly code = "IDENTITY_DUPLICATE_AGENT" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.IDENTITY_DUPLICATE_AGENT.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.IDENTITY_DUPLICATE_AGENT.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.IDENTITY_DUPLICATE_AGENT.domain;
  readonly isExpected: boolean = ERROR_CATALOG.IDENTITY_DUPLICATE_AGENT.isExpected;

  constructor(readonly agentId: string) {
    super(`Agent "${agentId}" is already registered`, { agentId });
  }
}

export class UnknownOwnerError extends IdentityError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "IDENTITY_UNKNOWN_OWNER" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.IDENTITY_UNKNOWN_OWNER.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.IDENTITY_UNKNOWN_OWNER.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.IDENTITY_UNKNOWN_OWNER.domain;
  readonly isExpected: boolean = ERROR_CATALOG.IDENTITY_UNKNOWN_OWNER.isExpected;

  constructor(readonly ownerId: string) {
    super(`Owner "${ownerId}" is not registered`, { ownerId });
  }
}

export class UnknownAgentError extends IdentityError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "IDENTITY_UNKNOWN_AGENT" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.IDENTITY_UNKNOWN_AGENT.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.IDENTITY_UNKNOWN_AGENT.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.IDENTITY_UNKNOWN_AGENT.domain;
  readonly isExpected: boolean = ERROR_CATALOG.IDENTITY_UNKNOWN_AGENT.isExpected;

  constructor(readonly agentId: string) {
    super(`Agent "${agentId}" is not registered`, { agentId });
  }
}

export class AgentRevokedError extends IdentityError {
  readonly _tag = "ConflictError" as const;
  readonly code = "IDENTITY_AGENT_REVOKED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.IDENTITY_AGENT_REVOKED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.IDENTITY_AGENT_REVOKED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.IDENTITY_AGENT_REVOKED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.IDENTITY_AGENT_REVOKED.isExpected;

  constructor(readonly agentId: string) {
    super(`Agent "${agentId}" has been revoked`, { agentId });
  }
}

export class CycleDetectedError extends IdentityError {
  readonly _tag = "ValidationError" as const;
  readonly code = "IDENTITY_CYCLE_DETECTED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.IDENTITY_CYCLE_DETECTED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.IDENTITY_CYCLE_DETECTED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.IDENTITY_CYCLE_DETECTED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.IDENTITY_CYCLE_DETECTED.isExpected;

  constructor(
    readonly parentAgentId: string,
    readonly childAgentId: string,
  ) {
    super(
      `Edge ${parentAgentId} -> ${childAgentId} would create a cycle in the collaboration chain`,
      { parentAgentId, childAgentId },
    );
  }
}
