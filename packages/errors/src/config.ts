import { MeridianError } from "./base.js";
import {
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";
import type { ValidationIssue } from "./bases.js";

/**
 * Raised once at startup when the environment does not describe a usable hub.
 * Carries every issue found, not only the first.
 */
export class ConfigurationInvalidError extends MeridianError {
  readonly _tag = "ValidationError" as const;
  readonly code = "CONFIGURATION_INVALID" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.CONFIGURATION_INVALID.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.CONFIGURATION_INVALID.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.CONFIGURATION_INVALID.domain;
  readonly isExpected: boolean = ERROR_CATALOG.CONFIGURATION_INVALID.isExpected;

  constructor(readonly issues: readonly ValidationIssue[]) {
    super(
      `Invalid configuration: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
    );
  }
}
