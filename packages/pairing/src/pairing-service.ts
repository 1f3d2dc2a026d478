/**
 * PairingService: owner-initiated agent registration through short-lived codes.
 *
 * Owner requests a code → shares it out of band → the agent submits it with
 * its id → the agent is registered and bound to the owner.
 *
 * Codes and their consumption are durable records, so a code is consumed at
 * most once across every hub instance sharing the backend.
 */

import {
  type Agent,
  type Clock,
  defaultClock,
  type PairingCodeRecord,
  PairingCodeRecordSchema,
  type PairingConsumption,
  PairingConsumptionSchema,
} from "@meridian/core";
import {
  getErrorMessage,
  InternalError,
  PairingCodeExpiredError,
  PairingCodeInvalidError,
  UnknownOwnerError,
} from "@meridian/errors";
import type { IdentityRegistry } from "@meridian/identity";
import { Collection, type PersistenceBackend } from "@meridian/storage";
import {
  type CodeGenerator,
  formatPairingCode,
  generatePairingCode,
  isWellFormedCode,
  normalizePairingCode,
} from "./code-generator.js";
import {
  DEFAULT_PAIRING_CONFIG,
  type IssuedCode,
  type PairingConfig,
  validatePairingConfig,
} from "./types.js";

/** Fresh codes drawn before giving up on collisions. */
const MAX_ISSUE_ATTEMPTS = 5;

export interface PairingServiceDeps {
  readonly backend: PersistenceBackend;
  readonly registry: IdentityRegistry;
  readonly clock?: Clock;
  readonly generate?: CodeGenerator;
}

export interface PairingResult {
  readonly agent: Agent;
  readonly ownerId: string;
  /** False when the same agent re-submitted a code it already consumed. */
  readonly created: boolean;
}

export class PairingService {
  private readonly config: PairingConfig;
  private readonly codes: Collection<PairingCodeRecord>;
  private readonly consumptions: Collection<PairingConsumption>;
  private readonly registry: IdentityRegistry;
  private readonly clock: Clock;
  private readonly generate: CodeGenerator;

  constructor(deps: PairingServiceDeps, config?: Partial<PairingConfig>) {
    const merged: PairingConfig = { ...DEFAULT_PAIRING_CONFIG, ...config };
    validatePairingConfig(merged);
    this.config = merged;
    this.codes = new Collection(deps.backend, "pairing_codes", PairingCodeRecordSchema);
    this.consumptions = new Collection(
      deps.backend,
      "pairing_consumptions",
      PairingConsumptionSchema,
    );
    this.registry = deps.registry;
    this.clock = deps.clock ?? defaultClock;
    this.generate = deps.generate ?? generatePairingCode;
  }

  /**
   * Issue a code the owner can hand to an agent.
   * @throws UnknownOwnerError
   */
  async issueCode(ownerId: string): Promise<IssuedCode> {
    if (!(await this.registry.getOwner(ownerId))) {
      throw new UnknownOwnerError(ownerId);
    }

    const now = this.clock.now();
    const expiresAt = new Date(now + this.config.ttlMs).toISOString();
    for (let attempt = 0; attempt < MAX_ISSUE_ATTEMPTS; attempt++) {
      const { code, formatted } = this.generate(this.config.codeLength);
      const record: PairingCodeRecord = {
        code,
        ownerId,
        createdAt: new Date(now).toISOString(),
        expiresAt,
      };
      const { created } = await this.codes.putIfAbsent(code, record);
      if (created) {
        return { code, formatted, ownerId, expiresAt };
      }
    }
    throw new InternalError({
      code: "INTERNAL_ERROR",
      message: `Could not issue a unique pairing code after ${MAX_ISSUE_ATTEMPTS} attempts`,
      metadata: { ownerId },
    });
  }

  /**
   * Register `agentId` under the code's owner and consume the code.
   *
   * @throws PairingCodeInvalidError for unknown codes and codes consumed by another agent
   * @throws PairingCodeExpiredError
   */
  async submit(
    rawCode: string,
    agentId: string,
    metadata?: Record<string, string>,
  ): Promise<PairingResult> {
    const code = normalizePairingCode(rawCode);
    const record = isWellFormedCode(code) ? await this.codes.get(code) : null;
    if (!record) {
      throw new PairingCodeInvalidError(rawCode, "unissued");
    }

    const consumption: PairingConsumption = {
      code,
      agentId,
      consumedAt: new Date(this.clock.now()).toISOString(),
    };
    const claim = await this.consumptions.putIfAbsent(code, consumption);
    if (!claim.created) {
      if (claim.record.agentId !== agentId) {
        throw new PairingCodeInvalidError(formatPairingCode(code), "consumed");
      }
      const agent = await this.registry.requireAgent(agentId);
      return { agent, ownerId: record.ownerId, created: false };
    }

    if (this.clock.now() > Date.parse(record.expiresAt)) {
      await this.consumptions.delete(code);
      throw new PairingCodeExpiredError(formatPairingCode(code), record.expiresAt);
    }

    try {
      await this.registry.registerAgent({
        agentId,
        initiator: "pairing",
        ...(metadata ? { metadata } : {}),
      });
      await this.registry.bind(record.ownerId, agentId);
    } catch (error) {
      // A failed registration leaves the code unconsumed.
      await this.consumptions.delete(code);
      console.warn(
        `[Pairing] Registration of "${agentId}" with code ${formatPairingCode(code)} failed: ${getErrorMessage(error)}`,
      );
      throw error;
    }

    const agent = await this.registry.requireAgent(agentId);
    console.info(`[Pairing] Agent "${agentId}" paired with owner "${record.ownerId}"`);
    return { agent, ownerId: record.ownerId, created: true };
  }

  /** Delete expired codes that were never consumed. Returns how many went. */
  async purgeExpired(): Promise<number> {
    const now = this.clock.now();
    const expired = await this.codes.query((c) => now > Date.parse(c.expiresAt));
    let purged = 0;
    for (const code of expired) {
      if (!(await this.consumptions.get(code.code)) && (await this.codes.delete(code.code))) {
        purged += 1;
      }
    }
    return purged;
  }
}
