import type {
  ApprovalAuditEvent,
  AuditCollaborator,
  ChainCollaborator,
  ChannelCollaborator,
  Collaborators,
  CreateRoomRequest,
  MessageAuditEvent,
  PermissionInitNotice,
  SendMessageRequest,
  SubAgentNotice,
} from "@meridian/core";
import { vi } from "vitest";

/**
 * Mock channel collaborator.
 *
 * Rooms get sequential ids (`!room-1:test`, `!room-2:test`, ...) and every
 * sent message is recorded in `sent`. Both methods are vitest mock functions,
 * so tests can queue failures with `mockRejectedValueOnce`.
 *
 * @example
 * ```typescript
 * const channel = new MockChannelCollaborator();
 * channel.sendMessage.mockRejectedValueOnce(new CollaboratorRequestError("channel", 502, "bad gateway"));
 * ```
 */
export class MockChannelCollaborator implements ChannelCollaborator {
  readonly rooms: CreateRoomRequest[] = [];
  readonly sent: SendMessageRequest[] = [];
  private roomSeq = 0;
  private eventSeq = 0;

  readonly createRoom = vi.fn(async (request: CreateRoomRequest) => {
    this.roomSeq += 1;
    this.rooms.push(request);
    return { roomId: `!room-${this.roomSeq}:test` };
  });

  readonly sendMessage = vi.fn(async (request: SendMessageRequest) => {
    this.eventSeq += 1;
    this.sent.push(request);
    return { eventId: `$event-${this.eventSeq}` };
  });
}

/** Chain collaborator issuing `did:test:<agentId>`. */
export class MockChainCollaborator implements ChainCollaborator {
  readonly registerDid = vi.fn(async (agentId: string) => `did:test:${agentId}`);

  readonly lookupDid = vi.fn(
    async (did: string): Promise<Readonly<Record<string, unknown>> | null> => ({ id: did }),
  );
}

/** Audit collaborator that records every report it receives. */
export class MockAuditCollaborator implements AuditCollaborator {
  readonly messages: MessageAuditEvent[] = [];
  readonly approvals: ApprovalAuditEvent[] = [];
  readonly permissionInits: PermissionInitNotice[] = [];
  readonly subAgents: SubAgentNotice[] = [];

  readonly reportMessage = vi.fn(async (event: MessageAuditEvent) => {
    this.messages.push(event);
  });

  readonly reportApproval = vi.fn(async (event: ApprovalAuditEvent) => {
    this.approvals.push(event);
  });

  readonly initializePermissions = vi.fn(async (notice: PermissionInitNotice) => {
    this.permissionInits.push(notice);
  });

  readonly notifySubAgent = vi.fn(async (notice: SubAgentNotice) => {
    this.subAgents.push(notice);
  });
}

export interface MockCollaborators extends Collaborators {
  readonly channel: MockChannelCollaborator;
  readonly chain: MockChainCollaborator;
  readonly audit: MockAuditCollaborator;
}

export function createMockCollaborators(): MockCollaborators {
  return {
    channel: new MockChannelCollaborator(),
    chain: new MockChainCollaborator(),
    audit: new MockAuditCollaborator(),
  };
}

/** A promise with its resolve/reject exposed, for holding a mock mid-call. */
export interface Deferred<T> {
  readonly promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
