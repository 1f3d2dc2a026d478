import { randomUUID } from "node:crypto";
import { getErrorMessage, NotFoundError, ValidationError } from "@meridian/errors";
import { replyDecision } from "../approval-coordinator.js";
import type { Hub } from "../hub.js";
import {
  agentDto,
  approvalCardDto,
  approvalRequestDto,
  approvalResultDto,
  approvalStateDto,
  bindingDto,
  deliveryDto,
  edgeDto,
  ownerDto,
  presenceDto,
  relationshipEntryDto,
  relationshipsDto,
  sendResultDto,
} from "./dto.js";
import { param, parseInput, type Route, type RouteResponse } from "./router.js";
import {
  ApprovalCallbackBodySchema,
  ApprovalReplyBodySchema,
  CreateApprovalBodySchema,
  DeliveryQuerySchema,
  IssuePairingCodeBodySchema,
  PresenceBodySchema,
  RegisterAgentBodySchema,
  RegisterOwnerBodySchema,
  RegisterSubAgentBodySchema,
  SendBodySchema,
  SubmitPairingCodeBodySchema,
} from "./schemas.js";

export interface DiscoveryDocument {
  readonly matrixHomeserver: string;
  readonly apiBase: string | null;
  readonly version: string;
}

function ok(body: unknown): RouteResponse {
  return { status: 200, body };
}

function created(body: unknown): RouteResponse {
  return { status: 201, body };
}

function notFound(kind: string, id: string): NotFoundError {
  return new NotFoundError({
    code: "RESOURCE_NOT_FOUND",
    message: `${kind} "${id}" does not exist`,
    metadata: { id },
  });
}

/**
 * The HTTP API surface. Handlers validate input, call one hub operation and
 * shape the result; domain errors propagate to the server's error mapping.
 */
export function createRoutes(hub: Hub, discovery: DiscoveryDocument): Route[] {
  const discoveryBody = {
    matrix_homeserver: discovery.matrixHomeserver,
    ...(discovery.apiBase === null ? {} : { api_base: discovery.apiBase }),
    version: discovery.version,
  };

  return [
    // Discovery and health
    {
      method: "GET",
      path: "/.well-known/meridian-matrix",
      handler: async () => ok(discoveryBody),
    },
    { method: "GET", path: "/api/v1/discovery", handler: async () => ok(discoveryBody) },
    { method: "GET", path: "/health", handler: async () => ok({ status: "ok" }) },
    {
      method: "GET",
      path: "/ready",
      handler: async () => {
        try {
          await hub.backend.ping();
          return ok({ status: "ready" });
        } catch (error) {
          console.warn(`[HTTP] Readiness check failed: ${getErrorMessage(error)}`);
          return { status: 503, body: { status: "unavailable" } };
        }
      },
    },

    // Messaging
    {
      method: "POST",
      path: "/api/v1/agent/send",
      handler: async (ctx) => {
        const body = parseInput(SendBodySchema, ctx.body);
        const result = await hub.pipeline.send({
          deliveryId: body.delivery_id ?? randomUUID(),
          sender: body.sender_agent_id,
          receiver: body.receiver_agent_id,
          content: body.content,
        });
        return ok(sendResultDto(result));
      },
    },
    {
      method: "GET",
      path: "/api/v1/deliveries",
      handler: async (ctx) => {
        const query = parseInput(
          DeliveryQuerySchema,
          Object.fromEntries(ctx.query),
          "Query string",
        );
        const deliveries = await hub.pipeline.queryDeliveries({
          ...(query.receiver === undefined ? {} : { receiver: query.receiver }),
          ...(query.status === undefined ? {} : { status: query.status }),
          ...(query.since === undefined ? {} : { since: query.since }),
          ...(query.limit === undefined ? {} : { limit: query.limit }),
        });
        return ok({ deliveries: deliveries.map(deliveryDto) });
      },
    },
    {
      method: "GET",
      path: "/api/v1/deliveries/:id",
      handler: async (ctx) => {
        const id = param(ctx, "id");
        const delivery = await hub.pipeline.getDelivery(id);
        if (!delivery) {
          throw notFound("Delivery", id);
        }
        return ok(deliveryDto(delivery));
      },
    },

    // Identity
    {
      method: "POST",
      path: "/api/v1/owners/register",
      admin: true,
      handler: async (ctx) => {
        const body = parseInput(RegisterOwnerBodySchema, ctx.body);
        const owner = await hub.registry.registerOwner(body.owner_id, body.metadata);
        return created(ownerDto(owner));
      },
    },
    {
      method: "GET",
      path: "/api/v1/owners/:id/agents",
      handler: async (ctx) => {
        const ownerId = param(ctx, "id");
        const agents = await hub.registry.agentsByOwner(ownerId);
        return ok({ owner_id: ownerId, agents: agents.map(agentDto) });
      },
    },
    {
      method: "POST",
      path: "/api/v1/agents/register",
      admin: true,
      handler: async (ctx) => {
        const body = parseInput(RegisterAgentBodySchema, ctx.body);
        const result = await hub.registration.registerHuman({
          ownerId: body.owner_id,
          agentId: body.agent_id,
          ...(body.owner_metadata ? { ownerMetadata: body.owner_metadata } : {}),
          ...(body.metadata ? { agentMetadata: body.metadata } : {}),
        });
        return created({
          owner: ownerDto(result.owner),
          agent: agentDto(result.agent),
          binding: bindingDto(result.binding),
        });
      },
    },
    {
      method: "GET",
      path: "/api/v1/agents/:id",
      handler: async (ctx) => ok(agentDto(await hub.registry.requireAgent(param(ctx, "id")))),
    },
    {
      method: "POST",
      path: "/api/v1/agents/:id/sub-agents",
      handler: async (ctx) => {
        const body = parseInput(RegisterSubAgentBodySchema, ctx.body);
        const result = await hub.registration.registerSubAgent({
          parentAgentId: param(ctx, "id"),
          childAgentId: body.child_agent_id,
          ...(body.metadata ? { metadata: body.metadata } : {}),
        });
        const dto = { agent: agentDto(result.child), edge: edgeDto(result.edge) };
        return result.created ? created(dto) : ok(dto);
      },
    },
    {
      method: "GET",
      path: "/api/v1/agents/:id/relationships",
      handler: async (ctx) =>
        ok(relationshipsDto(await hub.registry.agentRelationships(param(ctx, "id")))),
    },

    // Presence
    {
      method: "POST",
      path: "/api/v1/agents/:id/online",
      handler: async (ctx) => {
        const body = parseInput(PresenceBodySchema, ctx.body);
        return ok(presenceDto(await hub.presence.markOnline(param(ctx, "id"), body.status)));
      },
    },
    {
      method: "POST",
      path: "/api/v1/agents/:id/heartbeat",
      handler: async (ctx) => {
        const body = parseInput(PresenceBodySchema, ctx.body);
        return ok(presenceDto(await hub.presence.heartbeat(param(ctx, "id"), body.status)));
      },
    },
    {
      method: "GET",
      path: "/api/v1/agents/:id/presence",
      handler: async (ctx) => ok(presenceDto(await hub.presence.getStatus(param(ctx, "id")))),
    },
    {
      method: "GET",
      path: "/api/v1/presence",
      handler: async () => ok({ online: await hub.presence.listOnline() }),
    },
    {
      method: "GET",
      path: "/api/v1/relationships",
      handler: async () => {
        const entries = await hub.registry.listRelationships();
        return ok({ relationships: entries.map(relationshipEntryDto) });
      },
    },

    // Pairing
    {
      method: "POST",
      path: "/api/v1/pairing/codes",
      admin: true,
      handler: async (ctx) => {
        const body = parseInput(IssuePairingCodeBodySchema, ctx.body);
        const issued = await hub.pairing.issueCode(body.owner_id);
        return created({
          code: issued.formatted,
          owner_id: issued.ownerId,
          expires_at: issued.expiresAt,
        });
      },
    },
    {
      method: "POST",
      path: "/api/v1/pairing/submit",
      handler: async (ctx) => {
        const body = parseInput(SubmitPairingCodeBodySchema, ctx.body);
        const result = await hub.registration.registerWithPairingCode(
          body.code,
          body.agent_id,
          body.metadata,
        );
        const dto = { owner_id: result.ownerId, agent: agentDto(result.agent) };
        return result.created ? created(dto) : ok(dto);
      },
    },

    // Approvals
    {
      method: "POST",
      path: "/api/v1/approvals",
      handler: async (ctx) => {
        const body = parseInput(CreateApprovalBodySchema, ctx.body);
        if (body.receiver_agent_id === undefined) {
          const request = await hub.approvals.createRequest(body.request_id, body.payload);
          return created({ ...approvalRequestDto(request), status: "pending" });
        }
        const result = await hub.approvals.submit(
          body.request_id,
          body.payload,
          body.receiver_agent_id,
        );
        return created({
          ...approvalRequestDto(result.request),
          status: "pending",
          delivery: sendResultDto(result.delivery),
          card: approvalCardDto(result.card),
        });
      },
    },
    {
      method: "POST",
      path: "/api/v1/approvals/replies",
      handler: async (ctx) => {
        const body = parseInput(ApprovalReplyBodySchema, ctx.body);
        const decision = body.decision ?? replyDecision(body.body ?? "");
        if (decision === null) {
          throw new ValidationError({
            code: "VALIDATION_FAILED",
            message: "Reply names no decision",
            issues: [{ field: "body", message: "must start with approve or reject", code: "custom" }],
          });
        }
        const result = await hub.approvals.resolveReply({
          roomId: body.room_id,
          inReplyTo: body.in_reply_to,
          decision,
          approverId: body.approver_id ?? null,
        });
        if (!result) {
          throw notFound("Approval card", body.in_reply_to);
        }
        return ok(approvalResultDto(result));
      },
    },
    {
      method: "POST",
      path: "/api/v1/approvals/:id/callback",
      handler: async (ctx) => {
        const body = parseInput(ApprovalCallbackBodySchema, ctx.body);
        const result = await hub.approvals.resolve(param(ctx, "id"), {
          decision: body.decision,
          approverId: body.approver_id ?? null,
          comment: body.comment ?? null,
        });
        return ok(approvalResultDto(result));
      },
    },
    {
      method: "GET",
      path: "/api/v1/approvals/:id",
      handler: async (ctx) => ok(approvalStateDto(await hub.approvals.getResult(param(ctx, "id")))),
    },
  ];
}
