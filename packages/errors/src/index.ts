/**
 * @meridian/errors
 *
 * Every error the hub throws on purpose. Each carries a catalog `code`; the
 * `_tag` names one of eight behavioral types used for retry decisions and
 * HTTP mapping.
 */

export { type ErrorJSON, isMeridianError, MeridianError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

// Generic types

export {
  CatalogError,
  ConflictError,
  ExternalError,
  InternalError,
  NotFoundError,
  PermissionError,
  RateLimitError,
  TimeoutError,
  ValidationError,
} from "./bases.js";

export type {
  ConflictCodes,
  ExternalCodes,
  InternalCodes,
  MeridianErrorOptions,
  NotFoundCodes,
  PermissionCodes,
  RateLimitCodes,
  TimeoutCodes,
  ValidationCodes,
  ValidationIssue,
} from "./bases.js";


export { isErrorOfType, isExpectedError, isTransientError } from "./guards.js";

// Domain errors

export {
  AgentRevokedError,
  CycleDetectedError,
  DuplicateAgentError,
  IdentityConflictError,
  IdentityError,
  UnknownAgentError,
  UnknownOwnerError,
} from "./identity.js";

export {
  DeliveryFailedError,
  InfrastructureError,
  RoomProvisioningFailedError,
  StorageUnavailableError,
} from "./infrastructure.js";

export { ApprovalError, DuplicateRequestError, UnknownRequestError } from "./approval.js";

export {
  PairingCodeExpiredError,
  PairingCodeInvalidError,
  PairingError,
  type PairingRefusal,
} from "./pairing.js";

export { ConfigurationInvalidError } from "./config.js";

export {
  CollaboratorError,
  CollaboratorRateLimitedError,
  CollaboratorRejectedError,
  CollaboratorRequestError,
  CollaboratorTimeoutError,
} from "./collaborator.js";

// Wire format

export { readProblemDetail, serializeToRFC9457, toProblemDetails } from "./serialization.js";

export {
  type ProblemDetails,
  ProblemDetailsPartialSchema,
  ProblemDetailsSchema,
} from "./wire/rfc9457.js";
