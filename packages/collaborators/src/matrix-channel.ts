import type {
  ChannelCollaborator,
  CreateRoomRequest,
  SendMessageRequest,
} from "@meridian/core";
import { z } from "zod";
import type { HttpClient } from "./http/index.js";

/** Content key under which the hub stamps its audit fields. */
export const AUDIT_CONTENT_KEY = "io.meridian.audit" as const;

const CreateRoomResponseSchema = z.object({ room_id: z.string().min(1) });
const SendResponseSchema = z.object({ event_id: z.string().min(1) });

export interface MatrixChannelOptions {
  /** Room topic prefix; the scope key is appended. */
  readonly topicPrefix?: string;
}

/**
 * Channel collaborator over the Matrix client-server API.
 *
 * Rooms are created private and invite-only; sends use PUT with the caller's
 * transaction id so a retried send is deduplicated by the homeserver.
 */
export class MatrixChannelClient implements ChannelCollaborator {
  private readonly topicPrefix: string;

  constructor(
    private readonly http: HttpClient,
    options: MatrixChannelOptions = {},
  ) {
    this.topicPrefix = options.topicPrefix ?? "Meridian room for";
  }

  async createRoom(request: CreateRoomRequest): Promise<{ readonly roomId: string }> {
    const response = await this.http.request(
      "/_matrix/client/v3/createRoom",
      {
        method: "POST",
        body: {
          name: request.name,
          topic: `${this.topicPrefix} ${request.scopeKey}`,
          preset: "private_chat",
          visibility: "private",
          invite: request.inviteUserIds,
        },
      },
      CreateRoomResponseSchema,
    );
    return { roomId: response.room_id };
  }

  async sendMessage(request: SendMessageRequest): Promise<{ readonly eventId: string }> {
    const { payload, audit } = request;
    const path = `/_matrix/client/v3/rooms/${encodeURIComponent(request.roomId)}/send/m.room.message/${encodeURIComponent(request.txnId)}`;
    const response = await this.http.request(
      path,
      {
        method: "PUT",
        body: {
          ...payload.extensions,
          msgtype: payload.msgtype,
          body: payload.body,
          [AUDIT_CONTENT_KEY]: {
            message_id: audit.messageId,
            sender: audit.sender,
            receiver: audit.receiver,
            timestamp: audit.timestamp,
          },
        },
      },
      SendResponseSchema,
    );
    return { eventId: response.event_id };
  }
}
