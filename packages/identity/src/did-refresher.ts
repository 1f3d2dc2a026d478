import {
  BackgroundTasks,
  backoffDelay,
  type ChainCollaborator,
  type Clock,
  DEFAULT_RETRY_POLICY,
  defaultClock,
  defaultSleep,
  type DidRegistration,
  DidRegistrationSchema,
  isoNow,
  type RetryPolicy,
  type Sleep,
} from "@meridian/core";
import { getErrorMessage } from "@meridian/errors";
import { Collection, type PersistenceBackend } from "@meridian/storage";

/** Where a successfully issued DID is written back. */
export interface DidSink {
  recordDid(agentId: string, did: string): Promise<void>;
}

export interface DidRefresherOptions {
  readonly backend: PersistenceBackend;
  readonly chain: ChainCollaborator;
  readonly sink: DidSink;
  readonly clock?: Clock;
  readonly sleep?: Sleep;
  readonly retry?: RetryPolicy;
}

/**
 * Obtains agent DIDs from the chain service in the background.
 *
 * Progress lives in the `did_registrations` collection, so a refresh cut short
 * by a restart is visible as `pending` and can be resumed with
 * `resumePending()`.
 */
export class DidRefresher {
  private readonly registrations: Collection<DidRegistration>;
  private readonly chain: ChainCollaborator;
  private readonly sink: DidSink;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly retry: RetryPolicy;
  private readonly background = new BackgroundTasks();
  private readonly inflight = new Map<string, Promise<DidRegistration>>();

  constructor(options: DidRefresherOptions) {
    this.registrations = new Collection(
      options.backend,
      "did_registrations",
      DidRegistrationSchema,
    );
    this.chain = options.chain;
    this.sink = options.sink;
    this.clock = options.clock ?? defaultClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
  }

  /** Start a refresh without waiting for it. */
  schedule(agentId: string): void {
    this.background.run(
      async () => {
        const result = await this.refresh(agentId);
        if (result.status === "failed") {
          console.warn(
            `[Identity] DID registration for agent "${agentId}" gave up after ${result.attempts} attempt(s): ${result.lastError ?? "unknown error"}`,
          );
        }
      },
      (error) => {
        console.error(
          `[Identity] DID refresh for agent "${agentId}" aborted: ${getErrorMessage(error)}`,
        );
      },
    );
  }

  /**
   * Register the agent's DID, retrying with bounded exponential backoff.
   * Concurrent calls for one agent share a single run.
   */
  refresh(agentId: string): Promise<DidRegistration> {
    const running = this.inflight.get(agentId);
    if (running) {
      return running;
    }
    const run = this.run(agentId).finally(() => {
      this.inflight.delete(agentId);
    });
    this.inflight.set(agentId, run);
    return run;
  }

  status(agentId: string): Promise<DidRegistration | null> {
    return this.registrations.get(agentId);
  }

  /** Reschedule every registration left pending. Returns how many were resumed. */
  async resumePending(): Promise<number> {
    const pending = await this.registrations.query((r) => r.status === "pending");
    for (const registration of pending) {
      this.schedule(registration.agentId);
    }
    return pending.length;
  }

  /** Wait for every scheduled refresh to settle. */
  drain(): Promise<void> {
    return this.background.drain();
  }

  private async run(agentId: string): Promise<DidRegistration> {
    const existing = await this.registrations.get(agentId);
    if (existing?.status === "registered") {
      return existing;
    }

    let lastError = "";
    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      await this.save({
        agentId,
        status: "pending",
        attempts: attempt - 1,
        did: null,
        lastError: attempt === 1 ? null : lastError,
      });
      try {
        const did = await this.chain.registerDid(agentId);
        await this.sink.recordDid(agentId, did);
        return await this.save({
          agentId,
          status: "registered",
          attempts: attempt,
          did,
          lastError: null,
        });
      } catch (error) {
        lastError = getErrorMessage(error);
        if (attempt < this.retry.maxAttempts) {
          const delay = backoffDelay(this.retry, attempt);
          console.warn(
            `[Identity] DID registration for agent "${agentId}" failed (attempt ${attempt}/${this.retry.maxAttempts}), retrying in ${delay}ms: ${lastError}`,
          );
          await this.sleep(delay);
        }
      }
    }

    return this.save({
      agentId,
      status: "failed",
      attempts: this.retry.maxAttempts,
      did: null,
      lastError,
    });
  }

  private async save(fields: Omit<DidRegistration, "updatedAt">): Promise<DidRegistration> {
    const record: DidRegistration = { ...fields, updatedAt: isoNow(this.clock) };
    await this.registrations.put(record.agentId, record);
    return record;
  }
}
