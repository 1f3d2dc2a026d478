/**
 * Error serialization
 *
 * Converts domain errors (MeridianError) to the RFC 9457 ProblemDetails
 * wire format used by the HTTP API, and parses problem details returned by
 * collaborators.
 */

import { MeridianError } from "./base.js";
import { ValidationError } from "./bases.js";
import { ConfigurationInvalidError } from "./config.js";
import { ERROR_CATALOG } from "./catalog.js";
import { wrapError } from "./utils.js";
import { type ProblemDetails, ProblemDetailsPartialSchema } from "./wire/rfc9457.js";

/**
 * Serialize a MeridianError to RFC 9457 ProblemDetails format.
 * Uses `.code` as the RFC 9457 `type` discriminator.
 */
export function serializeToRFC9457(error: MeridianError, instance?: string): ProblemDetails {
  const problemDetails: ProblemDetails = {
    type: `/errors/${error.code}`,
    title: ERROR_CATALOG[error.code].title,
    status: error.httpStatus,
    detail: error.message,
    code: error.code,
    domain: error.domain,
    timestamp: error.timestamp.toISOString(),
    ...(instance ? { instance } : {}),
    ...(error.traceId ? { traceId: error.traceId } : {}),
    ...(error.metadata ? { metadata: error.metadata } : {}),
  };

  const issues =
    error instanceof ValidationError || error instanceof ConfigurationInvalidError
      ? error.issues
      : [];
  if (issues.length > 0) {
    problemDetails.errors = issues.map((issue) => ({
      field: issue.field,
      message: issue.message,
      code: issue.code,
      ...(issue.value === undefined ? {} : { value: issue.value }),
    }));
  }

  return problemDetails;
}

/**
 * Serialize any thrown value. Non-MeridianError values become INTERNAL_ERROR
 * and their message is not exposed.
 */
export function toProblemDetails(error: unknown, instance?: string): ProblemDetails {
  if (error instanceof MeridianError) {
    return serializeToRFC9457(error, instance);
  }
  const details = serializeToRFC9457(wrapError(error), instance);
  details.detail = ERROR_CATALOG.INTERNAL_ERROR.description;
  delete details.metadata;
  return details;
}

/**
 * Best-effort extraction of a problem detail string from a collaborator's
 * response body. Returns undefined when the body is not problem+json.
 */
export function readProblemDetail(body: unknown): string | undefined {
  const parsed = ProblemDetailsPartialSchema.safeParse(body);
  if (!parsed.success) {
    return undefined;
  }
  return parsed.data.detail ?? parsed.data.title;
}
