import type {
  Agent,
  ApprovalCard,
  ApprovalRequest,
  ApprovalResult,
  Binding,
  DeliveryRecord,
  JsonObject,
  Owner,
  RelationshipEdge,
  TranslationWarning,
} from "@meridian/core";
import type { AgentRelationships, PresenceStatus, RelationshipEntry } from "@meridian/identity";
import type { ApprovalState } from "../approval-coordinator.js";
import type { SendResult } from "../delivery-pipeline.js";

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

export function ownerDto(owner: Owner): JsonObject {
  return { owner_id: owner.ownerId, metadata: owner.metadata, created_at: owner.createdAt };
}

export function agentDto(agent: Agent): JsonObject {
  return {
    agent_id: agent.agentId,
    owner_id: agent.ownerId,
    did: agent.did,
    status: agent.status,
    initiator: agent.initiator,
    metadata: agent.metadata,
    created_at: agent.createdAt,
    updated_at: agent.updatedAt,
  };
}

export function bindingDto(binding: Binding): JsonObject {
  return { agent_id: binding.agentId, owner_id: binding.ownerId, bound_at: binding.boundAt };
}

export function edgeDto(edge: RelationshipEdge): JsonObject {
  return {
    parent_agent_id: edge.parentAgentId,
    child_agent_id: edge.childAgentId,
    created_at: edge.createdAt,
  };
}

export function relationshipsDto(relationships: AgentRelationships): JsonObject {
  const { chain } = relationships;
  return {
    agent_id: relationships.agentId,
    owner_id: relationships.ownerId,
    parents: [...relationships.parents],
    children: [...relationships.children],
    chain: {
      root_agent_id: chain.rootAgentId,
      agent_ids: [...chain.agentIds],
      depth: chain.depth,
      edges: chain.edges.map(edgeDto),
    },
  };
}

export function relationshipEntryDto(entry: RelationshipEntry): JsonObject {
  return {
    agent_id: entry.agentId,
    owner_id: entry.ownerId,
    status: entry.status,
    did: entry.did,
    sub_agents: [...entry.subAgents],
  };
}

export function presenceDto(presence: PresenceStatus): JsonObject {
  return {
    agent_id: presence.agentId,
    online: presence.online,
    status: presence.status,
    last_seen_at: presence.lastSeenAt,
  };
}

// ---------------------------------------------------------------------------
// Deliveries
// ---------------------------------------------------------------------------

export function deliveryDto(delivery: DeliveryRecord): JsonObject {
  return {
    delivery_id: delivery.deliveryId,
    sender: delivery.sender,
    receiver: delivery.receiver,
    room_id: delivery.roomId,
    status: delivery.status,
    attempts: delivery.attempts,
    event_id: delivery.eventId,
    error: delivery.error,
    created_at: delivery.createdAt,
    updated_at: delivery.updatedAt,
  };
}

function warningDto(warning: TranslationWarning): JsonObject {
  return { field: warning.field, reason: warning.reason };
}

export function sendResultDto(result: SendResult): JsonObject {
  return {
    ...deliveryDto(result.delivery),
    duplicate: result.duplicate,
    warnings: result.warnings.map(warningDto),
  };
}

// ---------------------------------------------------------------------------
// Approvals
// ---------------------------------------------------------------------------

export function approvalRequestDto(request: ApprovalRequest): JsonObject {
  return {
    request_id: request.requestId,
    payload: request.payload,
    receiver_agent_id: request.receiver,
    created_at: request.createdAt,
  };
}

export function approvalResultDto(result: ApprovalResult): JsonObject {
  return {
    request_id: result.requestId,
    status: "resolved",
    decision: result.decision,
    approver_id: result.approverId,
    comment: result.comment,
    resolved_at: result.resolvedAt,
  };
}

export function approvalCardDto(card: ApprovalCard | null): JsonObject | null {
  return card === null ? null : { room_id: card.roomId, event_id: card.eventId };
}

export function approvalStateDto(state: ApprovalState): JsonObject {
  if (state.status === "pending") {
    return { ...approvalRequestDto(state.request), status: "pending", decision: null };
  }
  return { ...approvalRequestDto(state.request), ...approvalResultDto(state.result) };
}
