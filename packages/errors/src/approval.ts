/**
 * Approval errors: idempotence boundary of approval requests
 *
 * Abstract base: ApprovalError
 * Concrete:
 *   - DuplicateRequestError  (APPROVAL_DUPLICATE_REQUEST)
 *   - UnknownRequestError    (APPROVAL_UNKNOWN_REQUEST)
 */

import { MeridianError } from "./base.js";
import {
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export abstract class ApprovalError extends MeridianError {}

export class DuplicateRequestError extends ApprovalError {
  readonly _tag = "ConflictError" as const;
  readonly code = "APPROVAL_DUPLICATE_REQUEST" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.APPROVAL_DUPLICATE_REQUEST.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.APPROVAL_DUPLICATE_REQUEST.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.APPROVAL_DUPLICATE_REQUEST.domain;
  readonly isExpected: boolean = ERROR_CATALOG.APPROVAL_DUPLICATE_REQUEST.isExpected;

  constructor(readonly requestId: string) {
    super(`Approval request "${requestId}" already exists with a different payload`, {
      requestId,
    });
  }
}

export class UnknownRequestError extends ApprovalError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "APPROVAL_UNKNOWN_REQUEST" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.APPROVAL_UNKNOWN_REQUEST.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.APPROVAL_UNKNOWN_REQUEST.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.APPROVAL_UNKNOWN_REQUEST.domain;
  readonly isExpected: boolean = ERROR_CATALOG.APPROVAL_UNKNOWN_REQUEST.isExpected;

  constructor(readonly requestId: string) {
    super(`Approval request "${requestId}" does not exist`, { requestId });
  }
}
