/**
 * Problem details (RFC 9457) as answered by the hub's HTTP API.
 *
 * Besides the standard members every body carries the catalog `code`, the
 * error `domain` and a `timestamp`; validation failures list their `errors`.
 */

import { z } from "zod";

const IssueWireSchema = z.object({
  field: z.string(),
  message: z.string(),
  code: z.string(),
  value: z.unknown().optional(),
});

export const ProblemDetailsSchema = z.object({
  /** `/errors/<CODE>` */
  type: z.string(),
  title: z.string(),
  status: z.number().int().min(100).max(599),
  detail: z.string().optional(),
  /** Request path the problem occurred on. */
  instance: z.string().optional(),
  code: z.string().optional(),
  traceId: z.string().optional(),
  timestamp: z.string().datetime().optional(),
  domain: z.string().optional(),
  metadata: z.record(z.string()).optional(),
  errors: z.array(IssueWireSchema).optional(),
});

export type ProblemDetails = z.infer<typeof ProblemDetailsSchema>;

/** Tolerates members this hub does not define, for bodies from collaborators. */
export const ProblemDetailsPartialSchema = ProblemDetailsSchema.partial({
  type: true,
  title: true,
  status: true,
}).passthrough();
