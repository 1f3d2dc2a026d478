import { createHttpCollaborators } from "@meridian/collaborators";
import {
  BackgroundTasks,
  type Clock,
  type Collaborators,
  defaultClock,
  defaultSleep,
  type Sleep,
} from "@meridian/core";
import { IdentityRegistry, PresenceTracker } from "@meridian/identity";
import { PairingService } from "@meridian/pairing";
import { createBackend, type PersistenceBackend } from "@meridian/storage";
import { ApprovalCoordinator } from "./approval-coordinator.js";
import type { HubConfig } from "./config.js";
import { DeliveryPipeline } from "./delivery-pipeline.js";
import { RegistrationService } from "./registration-service.js";
import { RoomManager } from "./room-manager.js";
import { Translator } from "./translator.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Hub {
  readonly config: HubConfig;
  readonly backend: PersistenceBackend;
  readonly registry: IdentityRegistry;
  readonly presence: PresenceTracker;
  readonly pairing: PairingService;
  readonly registration: RegistrationService;
  readonly rooms: RoomManager;
  readonly translator: Translator;
  readonly pipeline: DeliveryPipeline;
  readonly approvals: ApprovalCoordinator;
  /** Wait for every background task (audit reports, DID refreshes) to settle. */
  drain(): Promise<void>;
  /** Drain, then release the backend. */
  close(): Promise<void>;
}

export interface HubOptions {
  readonly clock?: Clock;
  readonly sleep?: Sleep;
  /** Use this backend instead of building one from `config.storage`. */
  readonly backend?: PersistenceBackend;
}

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

/**
 * Construct every component once, wired to one backend and one set of
 * collaborators. Agents whose DID registration was interrupted by a restart
 * are picked up again.
 */
export async function createHub(
  config: HubConfig,
  collaborators: Collaborators,
  options: HubOptions = {},
): Promise<Hub> {
  const clock = options.clock ?? defaultClock;
  const sleep = options.sleep ?? defaultSleep;
  const retry = config.retry;
  const backend = options.backend ?? createBackend(config.storage, { retry, sleep });
  const tasks = new BackgroundTasks();
  const { channel, chain, audit } = collaborators;

  const registry = new IdentityRegistry({
    backend,
    clock,
    chain,
    audit,
    sleep,
    didRetry: retry,
  });
  const presence = new PresenceTracker({
    backend,
    registry,
    clock,
    offlineAfterMs: config.presenceOfflineMs,
  });
  const pairing = new PairingService({ backend, registry, clock }, { ttlMs: config.pairingTtlMs });
  const registration = new RegistrationService({ registry, pairing, audit, tasks });
  const rooms = new RoomManager({
    backend,
    channel,
    registry,
    policy: config.roomPolicy,
    clock,
    sleep,
    retry,
    claimTtlMs: config.roomClaimTtlMs,
  });
  const translator = new Translator(registry);
  const pipeline = new DeliveryPipeline({
    backend,
    registry,
    rooms,
    translator,
    channel,
    audit,
    clock,
    sleep,
    retry,
    ordering: config.deliveryOrdering,
    tasks,
  });
  const approvals = new ApprovalCoordinator({
    backend,
    clock,
    audit,
    tasks,
    pipeline,
    replyWindowMs: config.approvalReplyWindowMs,
  });

  const resumed = await registry.dids?.resumePending();
  if (resumed !== undefined && resumed > 0) {
    console.info(`[Hub] Resumed ${resumed} pending DID registration(s)`);
  }

  const drain = async (): Promise<void> => {
    await Promise.all([tasks.drain(), registry.drain()]);
  };

  return {
    config,
    backend,
    registry,
    presence,
    pairing,
    registration,
    rooms,
    translator,
    pipeline,
    approvals,
    drain,
    async close() {
      try {
        await drain();
      } finally {
        await backend.close();
      }
    },
  };
}

/** HTTP-backed collaborators for the configured services. */
export function createCollaborators(config: HubConfig, sleep?: Sleep): Collaborators {
  return createHttpCollaborators({
    matrix: config.matrix,
    chain: config.chain,
    audit: config.audit,
    timeoutMs: config.collaboratorTimeoutMs,
    retry: config.retry,
    ...(sleep === undefined ? {} : { sleep }),
  });
}
