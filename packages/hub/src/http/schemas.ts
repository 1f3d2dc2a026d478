/**
 * Request bodies of the HTTP API. Wire names are snake_case.
 */

import {
  ApprovalDecisionSchema,
  DeliveryStatusSchema,
  JsonObjectSchema,
  MAX_ID_LENGTH,
} from "@meridian/core";
import { z } from "zod";

const Id = z.string().trim().min(1).max(MAX_ID_LENGTH);
const Metadata = z.record(z.string());

export const SendBodySchema = z.object({
  delivery_id: Id.optional(),
  sender_agent_id: Id.nullable().default(null),
  receiver_agent_id: Id,
  content: JsonObjectSchema,
});

export const RegisterOwnerBodySchema = z.object({
  owner_id: Id,
  metadata: Metadata.optional(),
});

export const RegisterAgentBodySchema = z.object({
  owner_id: Id,
  agent_id: Id,
  owner_metadata: Metadata.optional(),
  metadata: Metadata.optional(),
});

export const RegisterSubAgentBodySchema = z.object({
  child_agent_id: Id,
  metadata: Metadata.optional(),
});

export const IssuePairingCodeBodySchema = z.object({
  owner_id: Id,
});

export const SubmitPairingCodeBodySchema = z.object({
  code: Id,
  agent_id: Id,
  metadata: Metadata.optional(),
});

export const CreateApprovalBodySchema = z.object({
  request_id: Id,
  payload: JsonObjectSchema,
  receiver_agent_id: Id.optional(),
});

export const ApprovalCallbackBodySchema = z.object({
  decision: ApprovalDecisionSchema,
  approver_id: Id.optional(),
  comment: z.string().optional(),
});

export const ApprovalReplyBodySchema = z
  .object({
    room_id: Id,
    in_reply_to: Id,
    /** Reply text; its first word is read as the decision when `decision` is absent. */
    body: z.string().optional(),
    decision: ApprovalDecisionSchema.optional(),
    approver_id: Id.optional(),
  })
  .refine((reply) => reply.decision !== undefined || reply.body !== undefined, {
    message: "either decision or body is required",
    path: ["decision"],
  });

export const PresenceBodySchema = z.object({
  status: z.string().trim().min(1).max(32).optional(),
});

export const DeliveryQuerySchema = z.object({
  receiver: Id.optional(),
  status: DeliveryStatusSchema.optional(),
  since: z.string().datetime().optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});
