import {
  type Clock,
  defaultClock,
  isoNow,
  type PresenceRecord,
  PresenceRecordSchema,
} from "@meridian/core";
import { Collection, type PersistenceBackend } from "@meridian/storage";
import type { IdentityRegistry } from "./registry.js";

export const DEFAULT_OFFLINE_AFTER_MS = 120_000;

export interface PresenceTrackerOptions {
  readonly backend: PersistenceBackend;
  readonly registry: IdentityRegistry;
  readonly clock?: Clock;
  /** Silence after which an agent counts as offline. */
  readonly offlineAfterMs?: number;
}

export interface PresenceStatus {
  readonly agentId: string;
  readonly online: boolean;
  /** Null until the agent first checks in. */
  readonly status: string | null;
  readonly lastSeenAt: string | null;
}

/**
 * Online state of registered agents.
 *
 * An agent that already holds an identity checks in with `markOnline` and
 * then sends periodic heartbeats. Nothing is re-registered. Only the last
 * heartbeat is stored; online-ness is derived from its age at read time.
 */
export class PresenceTracker {
  private readonly presence: Collection<PresenceRecord>;
  private readonly registry: IdentityRegistry;
  private readonly clock: Clock;
  private readonly offlineAfterMs: number;

  constructor(options: PresenceTrackerOptions) {
    this.presence = new Collection(options.backend, "presence", PresenceRecordSchema);
    this.registry = options.registry;
    this.clock = options.clock ?? defaultClock;
    this.offlineAfterMs = options.offlineAfterMs ?? DEFAULT_OFFLINE_AFTER_MS;
  }

  /**
   * @throws UnknownAgentError
   * @throws AgentRevokedError
   */
  async markOnline(agentId: string, status = "online"): Promise<PresenceStatus> {
    await this.registry.requireActiveAgent(agentId);
    const record: PresenceRecord = { agentId, status, lastSeenAt: isoNow(this.clock) };
    await this.presence.put(agentId, record);
    console.info(`[Presence] Agent "${agentId}" is ${status}`);
    return this.toStatus(record);
  }

  /**
   * Refresh the agent's last-seen time. The status only changes when given;
   * a first heartbeat without one marks the agent online.
   * @throws UnknownAgentError
   * @throws AgentRevokedError
   */
  async heartbeat(agentId: string, status?: string): Promise<PresenceStatus> {
    await this.registry.requireActiveAgent(agentId);
    const previous = await this.presence.get(agentId);
    const record: PresenceRecord = {
      agentId,
      status: status ?? previous?.status ?? "online",
      lastSeenAt: isoNow(this.clock),
    };
    await this.presence.put(agentId, record);
    return this.toStatus(record);
  }

  /** @throws UnknownAgentError */
  async getStatus(agentId: string): Promise<PresenceStatus> {
    await this.registry.requireAgent(agentId);
    const record = await this.presence.get(agentId);
    if (!record) {
      return { agentId, online: false, status: null, lastSeenAt: null };
    }
    return this.toStatus(record);
  }

  /** Ids of agents heard from within the offline threshold, ordered by id. */
  async listOnline(): Promise<string[]> {
    const records = await this.presence.query((record) => this.isFresh(record));
    return records.map((record) => record.agentId);
  }

  private toStatus(record: PresenceRecord): PresenceStatus {
    return {
      agentId: record.agentId,
      online: this.isFresh(record),
      status: record.status,
      lastSeenAt: record.lastSeenAt,
    };
  }

  private isFresh(record: PresenceRecord): boolean {
    return this.clock.now() - Date.parse(record.lastSeenAt) <= this.offlineAfterMs;
  }
}
