/**
 * Pairing-code registration errors. Both carry the code as the caller typed
 * it, formatted, so it can be echoed back.
 */

import { MeridianError } from "./base.js";
import {
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export abstract class PairingError extends MeridianError {}

/** Why a code was refused outright. */
export type PairingRefusal = "unissued" | "consumed";

export class PairingCodeInvalidError extends PairingError {
  readonly _tag = "PermissionError" as const;
  readonly code = "PAIRING_CODE_INVALID" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.PAIRING_CODE_INVALID.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.PAIRING_CODE_INVALID.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.PAIRING_CODE_INVALID.domain;
  readonly isExpected: boolean = ERROR_CATALOG.PAIRING_CODE_INVALID.isExpected;

  constructor(
    readonly pairingCode: string,
    readonly refusal: PairingRefusal,
  ) {
    super(
      refusal === "unissued"
        ? `Pairing code "${pairingCode}" was not issued`
        : `Pairing code "${pairingCode}" has already been used`,
      { refusal },
    );
  }
}

export class PairingCodeExpiredError extends PairingError {
  readonly _tag = "ValidationError" as const;
  readonly code = "PAIRING_CODE_EXPIRED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.PAIRING_CODE_EXPIRED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.PAIRING_CODE_EXPIRED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.PAIRING_CODE_EXPIRED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.PAIRING_CODE_EXPIRED.isExpected;

  constructor(
    readonly pairingCode: string,
    readonly expiresAt: string,
  ) {
    super(`Pairing code "${pairingCode}" expired at ${expiresAt}`, { expiresAt });
  }
}
