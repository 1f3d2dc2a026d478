import type {
  BaseErrorType,
  ErrorCode,
  ErrorDomain,
  GrpcStatusCode,
  HttpStatusCode,
} from "./catalog.js";

/**
 * JSON shape produced by {@link MeridianError.toJSON}.
 */
export interface ErrorJSON {
  _tag: BaseErrorType;
  name: string;
  code: ErrorCode;
  message: string;
  httpStatus: HttpStatusCode;
  grpcCode: GrpcStatusCode;
  domain: ErrorDomain;
  isExpected: boolean;
  metadata?: Record<string, string>;
  traceId?: string;
  timestamp: string;
}

/**
 * Root of every error the hub throws on purpose.
 *
 * Subclasses fix `_tag` (one of the 8 behavioral base types) and `code`
 * (a catalog key); the remaining wire fields are looked up in the catalog.
 */
export abstract class MeridianError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly grpcCode: GrpcStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      domain: this.domain,
      isExpected: this.isExpected,
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.traceId ? { traceId: this.traceId } : {}),
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/** Check if a value is a MeridianError */
export function isMeridianError(value: unknown): value is MeridianError {
  return value instanceof MeridianError;
}
