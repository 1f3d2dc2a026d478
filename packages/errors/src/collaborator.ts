/**
 * Collaborator errors: outbound HTTP calls to the channel, chain and audit
 * services.
 *
 * Abstract base: CollaboratorError
 * Concrete:
 *   - CollaboratorTimeoutError   (COLLABORATOR_TIMEOUT)
 *   - CollaboratorRateLimitedError (COLLABORATOR_RATE_LIMITED)
 *   - CollaboratorRequestError   (COLLABORATOR_REQUEST_FAILED, 5xx and network)
 *   - CollaboratorRejectedError  (COLLABORATOR_REQUEST_REJECTED, other 4xx)
 */

import { MeridianError } from "./base.js";
import {
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export abstract class CollaboratorError extends MeridianError {
  abstract readonly service: string;
}

export class CollaboratorTimeoutError extends CollaboratorError {
  readonly _tag = "TimeoutError" as const;
  readonly code = "COLLABORATOR_TIMEOUT" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.COLLABORATOR_TIMEOUT.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.COLLABORATOR_TIMEOUT.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.COLLABORATOR_TIMEOUT.domain;
  readonly isExpected: boolean = ERROR_CATALOG.COLLABORATOR_TIMEOUT.isExpected;

  constructor(
    readonly service: string,
    readonly timeoutMs: number,
  ) {
    super(`${service} did not respond within ${timeoutMs}ms`, {
      service,
      timeoutMs: String(timeoutMs),
    });
  }
}

export class CollaboratorRateLimitedError extends CollaboratorError {
  readonly _tag = "RateLimitError" as const;
  readonly code = "COLLABORATOR_RATE_LIMITED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.COLLABORATOR_RATE_LIMITED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.COLLABORATOR_RATE_LIMITED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.COLLABORATOR_RATE_LIMITED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.COLLABORATOR_RATE_LIMITED.isExpected;

  constructor(
    readonly service: string,
    readonly retryAfterMs?: number,
  ) {
    super(`${service} is rate limiting requests`, { service });
  }
}

export class CollaboratorRequestError extends CollaboratorError {
  readonly _tag = "ExternalError" as const;
  readonly code = "COLLABORATOR_REQUEST_FAILED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.COLLABORATOR_REQUEST_FAILED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.COLLABORATOR_REQUEST_FAILED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.COLLABORATOR_REQUEST_FAILED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.COLLABORATOR_REQUEST_FAILED.isExpected;

  /**
   * @param statusCode - upstream HTTP status, or undefined for network failures
   */
  constructor(
    readonly service: string,
    readonly statusCode: number | undefined,
    detail: string,
    cause?: unknown,
  ) {
    super(
      `${service} request failed${statusCode === undefined ? "" : ` (${statusCode})`}: ${detail}`,
      { service, ...(statusCode === undefined ? {} : { statusCode: String(statusCode) }) },
      undefined,
      cause === undefined ? undefined : { cause },
    );
  }
}

export class CollaboratorRejectedError extends CollaboratorError {
  readonly _tag = "ValidationError" as const;
  readonly code = "COLLABORATOR_REQUEST_REJECTED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.COLLABORATOR_REQUEST_REJECTED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.COLLABORATOR_REQUEST_REJECTED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.COLLABORATOR_REQUEST_REJECTED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.COLLABORATOR_REQUEST_REJECTED.isExpected;

  constructor(
    readonly service: string,
    readonly statusCode: number,
    detail: string,
  ) {
    super(`${service} rejected the request (${statusCode}): ${detail}`, {
      service,
      statusCode: String(statusCode),
    });
  }
}
