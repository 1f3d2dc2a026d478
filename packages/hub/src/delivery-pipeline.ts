import {
  type AuditCollaborator,
  type AuditFields,
  BackgroundTasks,
  type ChannelCollaborator,
  type ChannelPayload,
  type Clock,
  DEFAULT_RETRY_POLICY,
  defaultClock,
  defaultSleep,
  type DeliveryRecord,
  DeliveryRecordSchema,
  type DeliveryStatus,
  isoNow,
  KeyedSerialExecutor,
  type RetryPolicy,
  type Sleep,
  SYSTEM_SENDER,
  type TranslationWarning,
} from "@meridian/core";
import { DeliveryFailedError, getErrorMessage } from "@meridian/errors";
import type { IdentityRegistry } from "@meridian/identity";
import { Collection, type PersistenceBackend } from "@meridian/storage";
import type { DeliveryOrdering } from "./config.js";
import { getDeliveryLatency, getDeliveryTotal } from "./metrics.js";
import { attemptWithRetry } from "./retry.js";
import type { RoomManager } from "./room-manager.js";
import type { Translator } from "./translator.js";

export interface DeliveryPipelineOptions {
  readonly backend: PersistenceBackend;
  readonly registry: IdentityRegistry;
  readonly rooms: RoomManager;
  readonly translator: Translator;
  readonly channel: ChannelCollaborator;
  readonly audit?: AuditCollaborator;
  readonly clock?: Clock;
  readonly sleep?: Sleep;
  readonly retry?: RetryPolicy;
  readonly ordering?: DeliveryOrdering;
  /** Where fire-and-forget audit reports run; shared with the rest of the hub. */
  readonly tasks?: BackgroundTasks;
}

export interface SendRequest {
  readonly deliveryId: string;
  /** Null for hub-originated messages. */
  readonly sender: string | null;
  readonly receiver: string;
  /** A native message (`{ kind, ... }`) or channel content (`{ body, msgtype? }`). */
  readonly content: unknown;
}

export interface SendResult {
  readonly delivery: DeliveryRecord;
  /** Fields the translator dropped. Empty for duplicates. */
  readonly warnings: readonly TranslationWarning[];
  /** True when the delivery id had been seen before and nothing was sent. */
  readonly duplicate: boolean;
}

export interface DeliveryQuery {
  readonly receiver?: string;
  readonly status?: DeliveryStatus;
  /** ISO timestamp; records created before it are skipped. */
  readonly since?: string;
  readonly limit?: number;
}

const DEFAULT_QUERY_LIMIT = 50;

/**
 * Agent-to-agent message delivery.
 *
 * A delivery id is applied at most once: the `started` record is claimed with
 * `putIfAbsent` before the channel is called, and any later send with the same
 * id returns the stored record instead of sending again. Channel sends reuse
 * the delivery id as transaction id, so retried sends are deduplicated on the
 * channel side too.
 */
export class DeliveryPipeline {
  private readonly deliveries: Collection<DeliveryRecord>;
  private readonly registry: IdentityRegistry;
  private readonly rooms: RoomManager;
  private readonly translator: Translator;
  private readonly channel: ChannelCollaborator;
  private readonly audit: AuditCollaborator | undefined;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly retry: RetryPolicy;
  private readonly tasks: BackgroundTasks;
  private readonly sequencer: KeyedSerialExecutor | undefined;

  constructor(options: DeliveryPipelineOptions) {
    this.deliveries = new Collection(options.backend, "deliveries", DeliveryRecordSchema);
    this.registry = options.registry;
    this.rooms = options.rooms;
    this.translator = options.translator;
    this.channel = options.channel;
    this.audit = options.audit;
    this.clock = options.clock ?? defaultClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.tasks = options.tasks ?? new BackgroundTasks();
    this.sequencer = options.ordering === "per-room" ? new KeyedSerialExecutor() : undefined;
  }

  /**
   * Deliver `content` into the receiver's room. Under per-room ordering,
   * sends into one room run one at a time, whichever agent receives them.
   * @throws UnknownAgentError when the receiver (or a non-null sender) is not registered
   * @throws RoomProvisioningFailedError
   * @throws DeliveryFailedError once the channel send is out of retries
   */
  async send(request: SendRequest): Promise<SendResult> {
    if (!this.sequencer) {
      return this.deliver(request);
    }
    const receiver = await this.registry.requireAgent(request.receiver);
    return this.sequencer.run(this.rooms.scopeKeyFor(receiver), () => this.deliver(request));
  }

  async getDelivery(deliveryId: string): Promise<DeliveryRecord | null> {
    return this.deliveries.get(deliveryId);
  }

  /** Matching records, newest first. */
  async queryDeliveries(query: DeliveryQuery = {}): Promise<DeliveryRecord[]> {
    const since = query.since === undefined ? undefined : Date.parse(query.since);
    const records = await this.deliveries.query(
      (d) =>
        (query.receiver === undefined || d.receiver === query.receiver) &&
        (query.status === undefined || d.status === query.status) &&
        (since === undefined || Date.parse(d.createdAt) >= since),
    );
    return records
      .sort(
        (a, b) =>
          b.createdAt.localeCompare(a.createdAt) || a.deliveryId.localeCompare(b.deliveryId),
      )
      .slice(0, query.limit ?? DEFAULT_QUERY_LIMIT);
  }

  /**
   * @throws UnknownAgentError
   * @throws AgentRevokedError
   */
  async assertDeliverable(sender: string | null, receiver: string): Promise<void> {
    await this.registry.requireActiveAgent(receiver);
    if (sender !== null) {
      await this.registry.requireActiveAgent(sender);
    }
  }

  /** Wait for pending audit reports. */
  async drain(): Promise<void> {
    await this.tasks.drain();
  }

  private async deliver(request: SendRequest): Promise<SendResult> {
    const { deliveryId, sender, receiver } = request;

    const seen = await this.deliveries.get(deliveryId);
    if (seen) {
      return { delivery: seen, warnings: [], duplicate: true };
    }

    // Nothing is recorded for a delivery that fails validation.
    await this.assertDeliverable(sender, receiver);
    const roomId = await this.rooms.ensureRoomForAgent(receiver);
    const { value: payload, warnings } = await this.translator.translate(request.content);
    for (const warning of warnings) {
      console.warn(`[Delivery] "${deliveryId}": dropped ${warning.field} (${warning.reason})`);
    }

    const startedAt = this.clock.now();
    const started: DeliveryRecord = {
      deliveryId,
      sender: sender ?? SYSTEM_SENDER,
      receiver,
      roomId,
      status: "started",
      attempts: 0,
      eventId: null,
      error: null,
      createdAt: isoNow(this.clock),
      updatedAt: isoNow(this.clock),
    };
    const claim = await this.deliveries.putIfAbsent(deliveryId, started);
    if (!claim.created) {
      return { delivery: claim.record, warnings: [], duplicate: true };
    }

    const audit: AuditFields = {
      messageId: deliveryId,
      sender: started.sender,
      receiver,
      timestamp: started.createdAt,
    };
    const outcome = await attemptWithRetry(
      () => this.channel.sendMessage({ roomId, txnId: deliveryId, payload, audit }),
      { policy: this.retry, sleep: this.sleep, tag: "Delivery", operation: `send ${deliveryId}` },
    );

    const finished: DeliveryRecord = outcome.ok
      ? {
          ...started,
          status: "completed",
          attempts: outcome.attempts,
          eventId: outcome.value.eventId,
          updatedAt: isoNow(this.clock),
        }
      : {
          ...started,
          status: "failed",
          attempts: outcome.attempts,
          error: getErrorMessage(outcome.error),
          updatedAt: isoNow(this.clock),
        };
    try {
      await this.deliveries.put(deliveryId, finished);
    } catch (error) {
      console.error(
        `[Delivery] Could not record "${finished.status}" for "${deliveryId}"; the stored record still reads "started": ${getErrorMessage(error)}`,
      );
      throw error;
    }

    getDeliveryTotal().add(1, { status: finished.status });
    getDeliveryLatency().record(this.clock.now() - startedAt, { status: finished.status });
    this.report(finished, audit, payload);

    if (!outcome.ok) {
      throw new DeliveryFailedError(
        deliveryId,
        outcome.attempts,
        getErrorMessage(outcome.error),
        outcome.error,
      );
    }
    return { delivery: finished, warnings, duplicate: false };
  }

  private report(delivery: DeliveryRecord, fields: AuditFields, payload: ChannelPayload): void {
    const audit = this.audit;
    if (!audit || delivery.status === "started") {
      return;
    }
    const status = delivery.status;
    this.tasks.run(
      () =>
        audit.reportMessage({
          ...fields,
          deliveryId: delivery.deliveryId,
          roomId: delivery.roomId,
          status,
          body: payload.body,
        }),
      (error) => {
        console.warn(
          `[Delivery] Audit report for "${delivery.deliveryId}" failed: ${getErrorMessage(error)}`,
        );
      },
    );
  }
}
