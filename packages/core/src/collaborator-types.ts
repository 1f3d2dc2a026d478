import type { ApprovalDecision } from "./record-types.js";
import type { AuditFields, ChannelPayload } from "./message-types.js";

// ---------------------------------------------------------------------------
// Channel (room provisioning + message transport)
// ---------------------------------------------------------------------------

export interface CreateRoomRequest {
  /** Agent id (dedicated policy) or owner id (shared policy). */
  readonly scopeKey: string;
  readonly name: string;
  readonly inviteUserIds: readonly string[];
}

export interface SendMessageRequest {
  readonly roomId: string;
  /** Transaction id; the channel deduplicates retried sends on it. */
  readonly txnId: string;
  readonly payload: ChannelPayload;
  readonly audit: AuditFields;
}

export interface ChannelCollaborator {
  createRoom(request: CreateRoomRequest): Promise<{ readonly roomId: string }>;
  sendMessage(request: SendMessageRequest): Promise<{ readonly eventId: string }>;
}

// ---------------------------------------------------------------------------
// Chain (DID issuance)
// ---------------------------------------------------------------------------

export interface ChainCollaborator {
  /** Registers the agent and returns its decentralized identifier. */
  registerDid(agentId: string): Promise<string>;
  /** Returns the DID document, or null when the chain does not know it. */
  lookupDid(did: string): Promise<Readonly<Record<string, unknown>> | null>;
}

// ---------------------------------------------------------------------------
// Audit / policy service
// ---------------------------------------------------------------------------

export interface MessageAuditEvent extends AuditFields {
  readonly deliveryId: string;
  readonly roomId: string;
  readonly status: "completed" | "failed";
  readonly body: string;
}

export interface ApprovalAuditEvent {
  readonly requestId: string;
  readonly decision: ApprovalDecision;
  readonly approverId: string | null;
  readonly comment: string | null;
  readonly timestamp: string;
}

export interface PermissionInitNotice {
  readonly agentId: string;
  readonly ownerId: string;
  readonly did: string | null;
}

export interface SubAgentNotice {
  readonly parentAgentId: string;
  readonly childAgentId: string;
}

export interface AuditCollaborator {
  reportMessage(event: MessageAuditEvent): Promise<void>;
  reportApproval(event: ApprovalAuditEvent): Promise<void>;
  initializePermissions(notice: PermissionInitNotice): Promise<void>;
  notifySubAgent(notice: SubAgentNotice): Promise<void>;
}

export interface Collaborators {
  readonly channel: ChannelCollaborator;
  readonly chain: ChainCollaborator;
  readonly audit: AuditCollaborator;
}
