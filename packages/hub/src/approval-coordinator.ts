import {
  type ApprovalCard,
  ApprovalCardSchema,
  type ApprovalDecision,
  type ApprovalRequest,
  ApprovalRequestSchema,
  type ApprovalResult,
  ApprovalResultSchema,
  type AuditCollaborator,
  BackgroundTasks,
  type Clock,
  defaultClock,
  isoNow,
  type JsonObject,
  jsonEquals,
  type NativeMessageInput,
} from "@meridian/core";
import {
  DuplicateRequestError,
  getErrorMessage,
  InternalError,
  UnknownRequestError,
} from "@meridian/errors";
import { Collection, type PersistenceBackend } from "@meridian/storage";
import type { DeliveryPipeline, SendResult } from "./delivery-pipeline.js";
import { getApprovalResolved } from "./metrics.js";

export interface ApprovalCoordinatorOptions {
  readonly backend: PersistenceBackend;
  readonly clock?: Clock;
  readonly audit?: AuditCollaborator;
  readonly tasks?: BackgroundTasks;
  /** Enables `submit`, which posts an approval card to the receiver. */
  readonly pipeline?: DeliveryPipeline;
  /** How long a reply to an approval card can still decide the request. */
  readonly replyWindowMs?: number;
}

export const DEFAULT_REPLY_WINDOW_MS = 3_600_000;

export interface ReplyInput {
  readonly roomId: string;
  /** Event the reply answers; must be an approval card posted by `submit`. */
  readonly inReplyTo: string;
  readonly decision: ApprovalDecision;
  readonly approverId?: string | null;
  readonly comment?: string | null;
}

export interface ResolveInput {
  readonly decision: ApprovalDecision;
  readonly approverId?: string | null;
  readonly comment?: string | null;
}

export type ApprovalState =
  | { readonly status: "pending"; readonly request: ApprovalRequest }
  | {
      readonly status: "resolved";
      readonly request: ApprovalRequest;
      readonly result: ApprovalResult;
    };

export interface SubmitResult {
  readonly request: ApprovalRequest;
  readonly delivery: SendResult;
  /** Null when the channel returned no event id for the card. */
  readonly card: ApprovalCard | null;
}

/**
 * Approval requests and their single resolution.
 *
 * Requests and results live in separate collections, both written with
 * `putIfAbsent`: the first callback to store a result decides the request, and
 * every later callback gets that stored result back unchanged.
 *
 * Cards posted by `submit` are remembered by event id, so a channel reply to
 * a card resolves its request like a callback would.
 */
export class ApprovalCoordinator {
  private readonly requests: Collection<ApprovalRequest>;
  private readonly results: Collection<ApprovalResult>;
  private readonly cards: Collection<ApprovalCard>;
  private readonly clock: Clock;
  private readonly audit: AuditCollaborator | undefined;
  private readonly tasks: BackgroundTasks;
  private readonly pipeline: DeliveryPipeline | undefined;
  private readonly replyWindowMs: number;

  constructor(options: ApprovalCoordinatorOptions) {
    this.requests = new Collection(options.backend, "approval_requests", ApprovalRequestSchema);
    this.results = new Collection(options.backend, "approval_results", ApprovalResultSchema);
    this.cards = new Collection(options.backend, "approval_cards", ApprovalCardSchema);
    this.clock = options.clock ?? defaultClock;
    this.audit = options.audit;
    this.tasks = options.tasks ?? new BackgroundTasks();
    this.pipeline = options.pipeline;
    this.replyWindowMs = options.replyWindowMs ?? DEFAULT_REPLY_WINDOW_MS;
  }

  /**
   * Idempotent for an identical payload.
   * @throws DuplicateRequestError when the id exists with a different payload
   */
  async createRequest(
    requestId: string,
    payload: JsonObject,
    receiver: string | null = null,
  ): Promise<ApprovalRequest> {
    const { record, created } = await this.requests.putIfAbsent(requestId, {
      requestId,
      payload,
      receiver,
      createdAt: isoNow(this.clock),
    });
    if (!created && !jsonEquals(record.payload, payload)) {
      throw new DuplicateRequestError(requestId);
    }
    return record;
  }

  /**
   * Record a decision. The first resolution wins; later calls return it.
   * @throws UnknownRequestError
   */
  async resolve(requestId: string, input: ResolveInput): Promise<ApprovalResult> {
    const request = await this.requests.get(requestId);
    if (!request) {
      throw new UnknownRequestError(requestId);
    }

    const { record, created } = await this.results.putIfAbsent(requestId, {
      requestId,
      decision: input.decision,
      approverId: input.approverId ?? null,
      comment: input.comment ?? null,
      resolvedAt: isoNow(this.clock),
    });

    if (created) {
      getApprovalResolved().add(1, { decision: record.decision });
      this.report(record);
    } else if (record.decision !== input.decision) {
      console.info(
        `[Approvals] Ignoring "${input.decision}" for "${requestId}": already ${record.decision}`,
      );
    }
    return record;
  }

  /**
   * Current state; never waits for a decision.
   * @throws UnknownRequestError
   */
  async getResult(requestId: string): Promise<ApprovalState> {
    const [request, result] = await Promise.all([
      this.requests.get(requestId),
      this.results.get(requestId),
    ]);
    if (!request) {
      throw new UnknownRequestError(requestId);
    }
    return result ? { status: "resolved", request, result } : { status: "pending", request };
  }

  async listPending(): Promise<ApprovalRequest[]> {
    const [requests, results] = await Promise.all([this.requests.query(), this.results.query()]);
    const resolved = new Set(results.map((r) => r.requestId));
    return requests.filter((r) => !resolved.has(r.requestId));
  }

  /**
   * Create the request and post an approval card into the receiver's room.
   * The receiver is checked before anything is stored.
   */
  async submit(requestId: string, payload: JsonObject, receiver: string): Promise<SubmitResult> {
    if (!this.pipeline) {
      throw new InternalError({
        code: "INTERNAL_ERROR",
        message: "Approval cards need a delivery pipeline",
      });
    }
    await this.pipeline.assertDeliverable(null, receiver);
    const request = await this.createRequest(requestId, payload, receiver);
    const delivery = await this.pipeline.send({
      deliveryId: `approval:${requestId}`,
      sender: null,
      receiver,
      content: approvalCard(requestId, payload),
    });
    const card = await this.recordCard(requestId, delivery);
    return { request, delivery, card };
  }

  /**
   * Resolve the request whose card `inReplyTo` points at. Returns null when
   * the event is no card from this room, or the card is older than the reply
   * window.
   */
  async resolveReply(input: ReplyInput): Promise<ApprovalResult | null> {
    const card = await this.cards.get(input.inReplyTo);
    if (!card || card.roomId !== input.roomId) {
      return null;
    }
    if (this.clock.now() - Date.parse(card.postedAt) > this.replyWindowMs) {
      console.info(
        `[Approvals] Reply to card "${card.eventId}" for "${card.requestId}" came after the reply window`,
      );
      return null;
    }
    return this.resolve(card.requestId, {
      decision: input.decision,
      approverId: input.approverId ?? null,
      comment: input.comment ?? null,
    });
  }

  private async recordCard(requestId: string, result: SendResult): Promise<ApprovalCard | null> {
    const { eventId, roomId } = result.delivery;
    if (eventId === null) {
      console.warn(`[Approvals] Card for "${requestId}" has no event id; replies cannot resolve it`);
      return null;
    }
    const { record } = await this.cards.putIfAbsent(eventId, {
      requestId,
      roomId,
      eventId,
      postedAt: result.delivery.updatedAt,
    });
    return record;
  }

  async drain(): Promise<void> {
    await this.tasks.drain();
  }

  private report(result: ApprovalResult): void {
    const audit = this.audit;
    if (!audit) {
      return;
    }
    this.tasks.run(
      () =>
        audit.reportApproval({
          requestId: result.requestId,
          decision: result.decision,
          approverId: result.approverId,
          comment: result.comment,
          timestamp: result.resolvedAt,
        }),
      (error) => {
        console.warn(
          `[Approvals] Audit report for "${result.requestId}" failed: ${getErrorMessage(error)}`,
        );
      },
    );
  }
}

/** Interactive card asking the receiver to approve or reject. */
export function approvalCard(requestId: string, payload: JsonObject): NativeMessageInput {
  return {
    kind: "interactive",
    header: `Approval requested: ${requestId}`,
    elements: [
      { tag: "markdown", content: "```\n" + JSON.stringify(payload, null, 2) + "\n```" },
      {
        tag: "action",
        actions: [
          { text: "Approve", value: "approved" },
          { text: "Reject", value: "rejected" },
        ],
      },
    ],
    extensions: { "io.meridian.approval": { request_id: requestId } },
  };
}

const APPROVE_WORDS = new Set(["approve", "approved", "yes", "y", "ok", "lgtm"]);
const REJECT_WORDS = new Set(["reject", "rejected", "no", "n", "deny", "denied"]);

/**
 * Decision expressed by a reply's first word, ignoring quoted fallback lines
 * (`> ...`) a client puts before the reply text. Null when it names none.
 */
export function replyDecision(body: string): ApprovalDecision | null {
  const text = body
    .split("\n")
    .filter((line) => !line.startsWith(">"))
    .join(" ")
    .trim()
    .toLowerCase();
  const word = text.split(/[\s,.!:;]+/)[0] ?? "";
  if (APPROVE_WORDS.has(word)) {
    return "approved";
  }
  if (REJECT_WORDS.has(word)) {
    return "rejected";
  }
  return null;
}
