import { MeridianError } from "./base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

/** One rejected field of a request body, query or configuration. */
export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
  value?: unknown;
}

/** Constructor options for the generic error types; `code` picks the catalog entry. */
export interface MeridianErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  cause?: unknown;
}

export type ValidationCodes = CodesForBase<"ValidationError">;
export type NotFoundCodes = CodesForBase<"NotFoundError">;
export type PermissionCodes = CodesForBase<"PermissionError">;
export type ConflictCodes = CodesForBase<"ConflictError">;
export type RateLimitCodes = CodesForBase<"RateLimitError">;
export type TimeoutCodes = CodesForBase<"TimeoutError">;
export type ExternalCodes = CodesForBase<"ExternalError">;
export type InternalCodes = CodesForBase<"InternalError">;

type Metadata = Record<string, string>;

type ValidationOptions = MeridianErrorOptions<ValidationCodes> & {
  issues?: readonly ValidationIssue[];
};

function toOptions<C extends ErrorCode>(
  input: string | MeridianErrorOptions<C>,
  fallbackCode: C,
  metadata: Metadata | undefined,
  traceId: string | undefined,
): MeridianErrorOptions<C> {
  return typeof input === "string"
    ? { code: fallbackCode, message: input, metadata, traceId }
    : input;
}

/**
 * Shared body of the generic error types: the wire fields come from the
 * catalog entry of whatever code the caller chose.
 */
export abstract class CatalogError<C extends ErrorCode> extends MeridianError {
  readonly code: C;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  protected constructor(options: MeridianErrorOptions<C>) {
    super(
      options.message,
      options.metadata,
      options.traceId,
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    const entry: ErrorCatalogEntry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

/** Malformed input or configuration. */
export class ValidationError extends CatalogError<ValidationCodes> {
  readonly _tag = "ValidationError" as const;
  readonly issues: readonly ValidationIssue[];

  constructor(options: ValidationOptions);
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Metadata,
    traceId?: string,
  );
  constructor(
    input: string | ValidationOptions,
    issues?: readonly ValidationIssue[],
    metadata?: Metadata,
    traceId?: string,
  ) {
    super(toOptions(input, "VALIDATION_FAILED", metadata, traceId));
    this.issues = (typeof input === "string" ? issues : input.issues) ?? [];
  }
}

export class NotFoundError extends CatalogError<NotFoundCodes> {
  readonly _tag = "NotFoundError" as const;

  constructor(options: MeridianErrorOptions<NotFoundCodes>);
  constructor(message: string, metadata?: Metadata, traceId?: string);
  constructor(
    input: string | MeridianErrorOptions<NotFoundCodes>,
    metadata?: Metadata,
    traceId?: string,
  ) {
    super(toOptions(input, "RESOURCE_NOT_FOUND", metadata, traceId));
  }
}

/** Missing or rejected credentials. */
export class PermissionError extends CatalogError<PermissionCodes> {
  readonly _tag = "PermissionError" as const;

  constructor(options: MeridianErrorOptions<PermissionCodes>);
  constructor(message: string, metadata?: Metadata, traceId?: string);
  constructor(
    input: string | MeridianErrorOptions<PermissionCodes>,
    metadata?: Metadata,
    traceId?: string,
  ) {
    super(toOptions(input, "AUTH_TOKEN_INVALID", metadata, traceId));
  }
}

export class ConflictError extends CatalogError<ConflictCodes> {
  readonly _tag = "ConflictError" as const;

  constructor(options: MeridianErrorOptions<ConflictCodes>);
  constructor(message: string, metadata?: Metadata, traceId?: string);
  constructor(
    input: string | MeridianErrorOptions<ConflictCodes>,
    metadata?: Metadata,
    traceId?: string,
  ) {
    super(toOptions(input, "IDENTITY_CONFLICT", metadata, traceId));
  }
}

export class RateLimitError extends CatalogError<RateLimitCodes> {
  readonly _tag = "RateLimitError" as const;

  constructor(options: MeridianErrorOptions<RateLimitCodes>);
  constructor(message: string, metadata?: Metadata, traceId?: string);
  constructor(
    input: string | MeridianErrorOptions<RateLimitCodes>,
    metadata?: Metadata,
    traceId?: string,
  ) {
    super(toOptions(input, "COLLABORATOR_RATE_LIMITED", metadata, traceId));
  }
}

export class TimeoutError extends CatalogError<TimeoutCodes> {
  readonly _tag = "TimeoutError" as const;

  constructor(options: MeridianErrorOptions<TimeoutCodes>);
  constructor(message: string, metadata?: Metadata, traceId?: string);
  constructor(
    input: string | MeridianErrorOptions<TimeoutCodes>,
    metadata?: Metadata,
    traceId?: string,
  ) {
    super(toOptions(input, "COLLABORATOR_TIMEOUT", metadata, traceId));
  }
}

/** A dependency outside the process failed. */
export class ExternalError extends CatalogError<ExternalCodes> {
  readonly _tag = "ExternalError" as const;

  constructor(options: MeridianErrorOptions<ExternalCodes>);
  constructor(message: string, metadata?: Metadata, traceId?: string);
  constructor(
    input: string | MeridianErrorOptions<ExternalCodes>,
    metadata?: Metadata,
    traceId?: string,
  ) {
    super(toOptions(input, "INTERNAL_UNAVAILABLE", metadata, traceId));
  }
}

export class InternalError extends CatalogError<InternalCodes> {
  readonly _tag = "InternalError" as const;

  constructor(options: MeridianErrorOptions<InternalCodes>);
  constructor(message: string, metadata?: Metadata, traceId?: string);
  constructor(
    input: string | MeridianErrorOptions<InternalCodes>,
    metadata?: Metadata,
    traceId?: string,
  ) {
    super(toOptions(input, "INTERNAL_ERROR", metadata, traceId));
  }
}
