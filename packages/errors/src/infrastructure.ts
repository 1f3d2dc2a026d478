/**
 * Infrastructure errors: transient failures of rooms, deliveries and storage.
 * The hub retries these internally and surfaces them only after the retry
 * budget is exhausted.
 *
 * Abstract base: InfrastructureError
 * Concrete:
 *   - RoomProvisioningFailedError (ROOM_PROVISIONING_FAILED)
 *   - DeliveryFailedError         (DELIVERY_FAILED)
 *   - StorageUnavailableError     (STORAGE_UNAVAILABLE)
 */

import { MeridianError } from "./base.js";
import {
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export abstract class InfrastructureError extends MeridianError {}

export class RoomProvisioningFailedError extends InfrastructureError {
  readonly _tag = "ExternalError" as const;
  readonly code = "ROOM_PROVISIONING_FAILED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.ROOM_PROVISIONING_FAILED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.ROOM_PROVISIONING_FAILED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.ROOM_PROVISIONING_FAILED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.ROOM_PROVISIONING_FAILED.isExpected;

  constructor(
    readonly scopeKey: string,
    reason: string,
    cause?: unknown,
  ) {
    super(
      `Room provisioning for scope "${scopeKey}" failed: ${reason}`,
      { scopeKey },
      undefined,
      cause === undefined ? undefined : { cause },
    );
  }
}

export class DeliveryFailedError extends InfrastructureError {
  readonly _tag = "ExternalError" as const;
  readonly code = "DELIVERY_FAILED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.DELIVERY_FAILED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.DELIVERY_FAILED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.DELIVERY_FAILED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.DELIVERY_FAILED.isExpected;

  constructor(
    readonly deliveryId: string,
    readonly attempts: number,
    reason: string,
    cause?: unknown,
  ) {
    super(
      `Delivery "${deliveryId}" failed after ${attempts} attempt(s): ${reason}`,
      { deliveryId, attempts: String(attempts) },
      undefined,
      cause === undefined ? undefined : { cause },
    );
  }
}

export class StorageUnavailableError extends InfrastructureError {
  readonly _tag = "ExternalError" as const;
  readonly code = "STORAGE_UNAVAILABLE" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.STORAGE_UNAVAILABLE.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.STORAGE_UNAVAILABLE.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.STORAGE_UNAVAILABLE.domain;
  readonly isExpected: boolean = ERROR_CATALOG.STORAGE_UNAVAILABLE.isExpected;

  constructor(
    readonly backend: string,
    operation: string,
    cause?: unknown,
  ) {
    super(
      `Storage backend "${backend}" unavailable during ${operation}`,
      { backend, operation },
      undefined,
      cause === undefined ? undefined : { cause },
    );
  }
}
