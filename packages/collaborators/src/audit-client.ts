import type {
  ApprovalAuditEvent,
  AuditCollaborator,
  MessageAuditEvent,
  PermissionInitNotice,
  SubAgentNotice,
} from "@meridian/core";
import type { HttpClient } from "./http/index.js";

export interface AuditEndpoints {
  readonly messageUrl?: string;
  readonly approvalUrl?: string;
  readonly permissionInitUrl?: string;
  readonly subAgentUrl?: string;
}

/**
 * Audit/policy service client. Each report goes to its own configured
 * endpoint; an endpoint left unconfigured turns that report into a no-op.
 */
export class HttpAuditClient implements AuditCollaborator {
  constructor(
    private readonly http: HttpClient,
    private readonly endpoints: AuditEndpoints,
  ) {}

  async reportMessage(event: MessageAuditEvent): Promise<void> {
    await this.post(this.endpoints.messageUrl, {
      message_id: event.messageId,
      delivery_id: event.deliveryId,
      sender: event.sender,
      receiver: event.receiver,
      room_id: event.roomId,
      status: event.status,
      body: event.body,
      timestamp: event.timestamp,
    });
  }

  async reportApproval(event: ApprovalAuditEvent): Promise<void> {
    await this.post(this.endpoints.approvalUrl, {
      request_id: event.requestId,
      decision: event.decision,
      approver_id: event.approverId,
      comment: event.comment,
      timestamp: event.timestamp,
    });
  }

  async initializePermissions(notice: PermissionInitNotice): Promise<void> {
    await this.post(this.endpoints.permissionInitUrl, {
      agent_id: notice.agentId,
      owner_id: notice.ownerId,
      did: notice.did,
    });
  }

  async notifySubAgent(notice: SubAgentNotice): Promise<void> {
    await this.post(this.endpoints.subAgentUrl, {
      parent_agent_id: notice.parentAgentId,
      child_agent_id: notice.childAgentId,
    });
  }

  private async post(url: string | undefined, body: Record<string, unknown>): Promise<void> {
    if (url === undefined) {
      return;
    }
    await this.http.send(url, { method: "POST", body });
  }
}
