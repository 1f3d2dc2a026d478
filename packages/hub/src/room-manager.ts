import { randomUUID } from "node:crypto";
import {
  type Agent,
  backoffDelay,
  type ChannelCollaborator,
  type Clock,
  DEFAULT_RETRY_POLICY,
  defaultClock,
  defaultSleep,
  isoNow,
  type RetryPolicy,
  type Room,
  type RoomPolicy,
  type RoomRecord,
  RoomRecordSchema,
  type Sleep,
} from "@meridian/core";
import { getErrorMessage, RoomProvisioningFailedError } from "@meridian/errors";
import type { IdentityRegistry } from "@meridian/identity";
import { Collection, type PersistenceBackend } from "@meridian/storage";
import { getRoomProvisioned } from "./metrics.js";
import { attemptWithRetry } from "./retry.js";

export interface RoomManagerOptions {
  readonly backend: PersistenceBackend;
  readonly channel: ChannelCollaborator;
  readonly registry: IdentityRegistry;
  readonly policy: RoomPolicy;
  readonly clock?: Clock;
  readonly sleep?: Sleep;
  /** Retries of the channel's createRoom call. */
  readonly retry?: RetryPolicy;
  /** A provisioning claim older than this is presumed abandoned. */
  readonly claimTtlMs?: number;
  /** Backoff while waiting for another caller's claim to finish. */
  readonly wait?: RetryPolicy;
}

const DEFAULT_CLAIM_TTL_MS = 60_000;

const DEFAULT_WAIT: RetryPolicy = {
  maxAttempts: 60,
  baseDelayMs: 25,
  maxDelayMs: 1_000,
  multiplier: 2,
};

/**
 * Maps agents to rooms, creating each room at most once.
 *
 * The first caller for a scope wins an atomic `putIfAbsent` on a provisioning
 * placeholder and is the only one to call the channel collaborator. Other
 * callers poll until the placeholder turns into a ready room, or disappears
 * because provisioning failed, in which case they compete for a new claim.
 */
export class RoomManager {
  readonly policy: RoomPolicy;
  private readonly rooms: Collection<RoomRecord>;
  private readonly channel: ChannelCollaborator;
  private readonly registry: IdentityRegistry;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly retry: RetryPolicy;
  private readonly claimTtlMs: number;
  private readonly wait: RetryPolicy;

  constructor(options: RoomManagerOptions) {
    this.policy = options.policy;
    this.rooms = new Collection(options.backend, "rooms", RoomRecordSchema);
    this.channel = options.channel;
    this.registry = options.registry;
    this.clock = options.clock ?? defaultClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.claimTtlMs = options.claimTtlMs ?? DEFAULT_CLAIM_TTL_MS;
    this.wait = options.wait ?? DEFAULT_WAIT;
  }

  /**
   * Room id for the agent's scope, creating the room on first use.
   * @throws UnknownAgentError
   * @throws RoomProvisioningFailedError when the channel cannot create the room
   */
  async ensureRoomForAgent(agentId: string): Promise<string> {
    const agent = await this.registry.requireAgent(agentId);
    const scopeKey = this.scopeKeyFor(agent);

    for (let round = 1; round <= this.wait.maxAttempts; round++) {
      const current = await this.rooms.get(scopeKey);
      if (current?.status === "ready") {
        return current.roomId;
      }

      if (current === null) {
        const claimToken = randomUUID();
        const { record, created } = await this.rooms.putIfAbsent(scopeKey, {
          status: "provisioning",
          scopeKey,
          policy: this.policy,
          claimToken,
          claimedAt: isoNow(this.clock),
        });
        if (created) {
          return this.provision(scopeKey, claimToken, agent);
        }
        if (record.status === "ready") {
          return record.roomId;
        }
      } else if (this.clock.now() - Date.parse(current.claimedAt) > this.claimTtlMs) {
        console.warn(
          `[Rooms] Taking over stale provisioning claim for scope "${scopeKey}" from ${current.claimedAt}`,
        );
        await this.rooms.delete(scopeKey);
        continue;
      }

      await this.sleep(backoffDelay(this.wait, round));
    }

    throw new RoomProvisioningFailedError(
      scopeKey,
      "timed out waiting for a concurrent provisioning attempt",
    );
  }

  /**
   * Scope a room is keyed by: `owner:<ownerId>` under the shared policy,
   * else `agent:<agentId>`. The prefixes keep an owner and an agent that
   * share an id out of each other's rooms.
   */
  scopeKeyFor(agent: Agent): string {
    return this.policy === "shared" && agent.ownerId !== null
      ? `owner:${agent.ownerId}`
      : `agent:${agent.agentId}`;
  }

  async getRoom(scopeKey: string): Promise<Room | null> {
    const record = await this.rooms.get(scopeKey);
    return record?.status === "ready" ? record : null;
  }

  async listRooms(): Promise<Room[]> {
    const records = await this.rooms.query();
    return records.filter((record): record is Room => record.status === "ready");
  }

  private async provision(scopeKey: string, claimToken: string, agent: Agent): Promise<string> {
    const inviteUserIds = await this.inviteesFor(agent);

    const outcome = await attemptWithRetry(
      () => this.channel.createRoom({ scopeKey, name: scopeKey, inviteUserIds }),
      { policy: this.retry, sleep: this.sleep, tag: "Rooms", operation: `createRoom ${scopeKey}` },
    );

    if (!outcome.ok) {
      await this.releaseClaim(scopeKey, claimToken);
      throw new RoomProvisioningFailedError(
        scopeKey,
        getErrorMessage(outcome.error),
        outcome.error,
      );
    }

    const room: Room = {
      status: "ready",
      scopeKey,
      policy: this.policy,
      roomId: outcome.value.roomId,
      createdAt: isoNow(this.clock),
    };
    await this.rooms.put(scopeKey, room);
    getRoomProvisioned().add(1, { policy: this.policy });
    console.info(`[Rooms] Created room ${room.roomId} for scope "${scopeKey}"`);
    return room.roomId;
  }

  /** Remove our placeholder, unless someone else has taken the slot over. */
  private async releaseClaim(scopeKey: string, claimToken: string): Promise<void> {
    try {
      const current = await this.rooms.get(scopeKey);
      if (current?.status === "provisioning" && current.claimToken === claimToken) {
        await this.rooms.delete(scopeKey);
      }
    } catch (error) {
      console.error(
        `[Rooms] Could not release provisioning claim for scope "${scopeKey}"; it expires after ${this.claimTtlMs}ms: ${getErrorMessage(error)}`,
      );
    }
  }

  /** Channel identities of the agent and its owner, where linked. */
  private async inviteesFor(agent: Agent): Promise<string[]> {
    const principals = agent.ownerId === null ? [agent.agentId] : [agent.agentId, agent.ownerId];
    const links = await Promise.all(principals.map((id) => this.registry.getIdentityLink(id)));
    return links
      .map((link) => link?.channelUserId ?? null)
      .filter((id): id is string => id !== null);
  }
}
