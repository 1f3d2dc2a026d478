import { z } from "zod";
import { JsonObjectSchema } from "./json.js";

/**
 * Persisted record shapes.
 *
 * Each record is declared as a zod schema and its type inferred from it, so a
 * value read back from any backend is validated on the way out. Absent values
 * are `null` rather than optional: records must survive a JSON round trip
 * through every backend unchanged.
 */

const Timestamp = z.string().datetime();
const StringMap = z.record(z.string());

/** Sender recorded for deliveries that no agent originated. */
export const SYSTEM_SENDER = "system" as const;

/**
 * Longest owner, agent or principal id. Keys derived from ids (edges, rooms,
 * history) must stay within the storage key limit of 255.
 */
export const MAX_ID_LENGTH = 120;

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

export const OwnerSchema = z.object({
  ownerId: z.string().min(1),
  metadata: StringMap,
  createdAt: Timestamp,
});
export type Owner = z.infer<typeof OwnerSchema>;

export const AgentStatusSchema = z.enum(["pending", "active", "revoked"]);
export type AgentStatus = z.infer<typeof AgentStatusSchema>;

export const RegistrationInitiatorSchema = z.enum(["human", "agent", "pairing"]);
export type RegistrationInitiator = z.infer<typeof RegistrationInitiatorSchema>;

export const AgentSchema = z.object({
  agentId: z.string().min(1),
  ownerId: z.string().nullable(),
  did: z.string().nullable(),
  status: AgentStatusSchema,
  initiator: RegistrationInitiatorSchema,
  metadata: StringMap,
  createdAt: Timestamp,
  updatedAt: Timestamp,
});
export type Agent = z.infer<typeof AgentSchema>;

/** Active owner of an agent. Keyed by agent id: at most one per agent. */
export const BindingSchema = z.object({
  agentId: z.string(),
  ownerId: z.string(),
  boundAt: Timestamp,
});
export type Binding = z.infer<typeof BindingSchema>;

export const OwnerChangeSchema = z.object({
  agentId: z.string(),
  fromOwner: z.string().nullable(),
  toOwner: z.string().nullable(),
  at: Timestamp,
});
export type OwnerChange = z.infer<typeof OwnerChangeSchema>;

export const RelationshipEdgeSchema = z.object({
  parentAgentId: z.string(),
  childAgentId: z.string(),
  createdAt: Timestamp,
});
export type RelationshipEdge = z.infer<typeof RelationshipEdgeSchema>;

/** Identifiers a principal holds in the IM namespace and the channel namespace. */
export const IdentityLinkSchema = z.object({
  principalId: z.string(),
  imUserId: z.string().nullable(),
  channelUserId: z.string().nullable(),
  updatedAt: Timestamp,
});
export type IdentityLink = z.infer<typeof IdentityLinkSchema>;

export type IdentityNamespace = "im" | "channel";

export const DidRegistrationSchema = z.object({
  agentId: z.string(),
  status: z.enum(["pending", "registered", "failed"]),
  attempts: z.number().int().nonnegative(),
  did: z.string().nullable(),
  lastError: z.string().nullable(),
  updatedAt: Timestamp,
});
export type DidRegistration = z.infer<typeof DidRegistrationSchema>;

/** Last heartbeat of an agent. Whether it counts as online depends on its age. */
export const PresenceRecordSchema = z.object({
  agentId: z.string(),
  status: z.string(),
  lastSeenAt: Timestamp,
});
export type PresenceRecord = z.infer<typeof PresenceRecordSchema>;

// ---------------------------------------------------------------------------
// Rooms
// ---------------------------------------------------------------------------

export const RoomPolicySchema = z.enum(["dedicated", "shared"]);
export type RoomPolicy = z.infer<typeof RoomPolicySchema>;

/**
 * A room slot is first claimed with a provisioning placeholder, then
 * replaced by the ready record once the channel collaborator answers.
 */
export const RoomRecordSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("provisioning"),
    scopeKey: z.string(),
    policy: RoomPolicySchema,
    claimToken: z.string(),
    claimedAt: Timestamp,
  }),
  z.object({
    status: z.literal("ready"),
    scopeKey: z.string(),
    policy: RoomPolicySchema,
    roomId: z.string(),
    createdAt: Timestamp,
  }),
]);
export type RoomRecord = z.infer<typeof RoomRecordSchema>;
export type Room = Extract<RoomRecord, { status: "ready" }>;

// ---------------------------------------------------------------------------
// Deliveries
// ---------------------------------------------------------------------------

export const DeliveryStatusSchema = z.enum(["started", "completed", "failed"]);
export type DeliveryStatus = z.infer<typeof DeliveryStatusSchema>;

export const DeliveryRecordSchema = z.object({
  deliveryId: z.string(),
  sender: z.string(),
  receiver: z.string(),
  roomId: z.string(),
  status: DeliveryStatusSchema,
  attempts: z.number().int().nonnegative(),
  eventId: z.string().nullable(),
  error: z.string().nullable(),
  createdAt: Timestamp,
  updatedAt: Timestamp,
});
export type DeliveryRecord = z.infer<typeof DeliveryRecordSchema>;

// ---------------------------------------------------------------------------
// Approvals
// ---------------------------------------------------------------------------

export const ApprovalRequestSchema = z.object({
  requestId: z.string(),
  payload: JsonObjectSchema,
  receiver: z.string().nullable(),
  createdAt: Timestamp,
});
export type ApprovalRequest = z.infer<typeof ApprovalRequestSchema>;

export const ApprovalDecisionSchema = z.enum(["approved", "rejected"]);
export type ApprovalDecision = z.infer<typeof ApprovalDecisionSchema>;

export const ApprovalResultSchema = z.object({
  requestId: z.string(),
  decision: ApprovalDecisionSchema,
  approverId: z.string().nullable(),
  comment: z.string().nullable(),
  resolvedAt: Timestamp,
});
export type ApprovalResult = z.infer<typeof ApprovalResultSchema>;

/** Channel event that carried a request's approval card, keyed by event id. */
export const ApprovalCardSchema = z.object({
  requestId: z.string(),
  roomId: z.string(),
  eventId: z.string(),
  postedAt: Timestamp,
});
export type ApprovalCard = z.infer<typeof ApprovalCardSchema>;

// ---------------------------------------------------------------------------
// Pairing
// ---------------------------------------------------------------------------

export const PairingCodeRecordSchema = z.object({
  code: z.string(),
  ownerId: z.string(),
  createdAt: Timestamp,
  expiresAt: Timestamp,
});
export type PairingCodeRecord = z.infer<typeof PairingCodeRecordSchema>;

export const PairingConsumptionSchema = z.object({
  code: z.string(),
  agentId: z.string(),
  consumedAt: Timestamp,
});
export type PairingConsumption = z.infer<typeof PairingConsumptionSchema>;
