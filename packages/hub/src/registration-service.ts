import {
  type Agent,
  type AuditCollaborator,
  BackgroundTasks,
  type Binding,
  type Owner,
  type RelationshipEdge,
} from "@meridian/core";
import { DuplicateAgentError, getErrorMessage } from "@meridian/errors";
import type { IdentityRegistry } from "@meridian/identity";
import type { PairingResult, PairingService } from "@meridian/pairing";

export interface RegistrationServiceOptions {
  readonly registry: IdentityRegistry;
  readonly pairing: PairingService;
  readonly audit?: AuditCollaborator;
  readonly tasks?: BackgroundTasks;
}

export interface HumanRegistration {
  readonly ownerId: string;
  readonly agentId: string;
  readonly ownerMetadata?: Readonly<Record<string, string>>;
  readonly agentMetadata?: Readonly<Record<string, string>>;
}

export interface HumanRegistrationResult {
  readonly owner: Owner;
  readonly agent: Agent;
  readonly binding: Binding;
}

export interface SubAgentRegistration {
  readonly parentAgentId: string;
  readonly childAgentId: string;
  readonly metadata?: Readonly<Record<string, string>>;
}

export interface SubAgentRegistrationResult {
  readonly child: Agent;
  readonly edge: RelationshipEdge;
  /** False when the child agent already existed. */
  readonly created: boolean;
}

/**
 * The three ways an agent joins the hub: a human registers it, it presents
 * an owner's pairing code, or an existing agent spawns it.
 *
 * Each flow returns once the identity records are committed. Permission
 * initialization and DID issuance follow in the background; their failures
 * are logged and never undo the registration.
 */
export class RegistrationService {
  private readonly registry: IdentityRegistry;
  private readonly pairing: PairingService;
  private readonly audit: AuditCollaborator | undefined;
  private readonly tasks: BackgroundTasks;

  constructor(options: RegistrationServiceOptions) {
    this.registry = options.registry;
    this.pairing = options.pairing;
    this.audit = options.audit;
    this.tasks = options.tasks ?? new BackgroundTasks();
  }

  /**
   * An existing owner is reused as is when no owner metadata is given.
   * @throws IdentityConflictError when the owner exists with other metadata
   * @throws DuplicateAgentError
   */
  async registerHuman(input: HumanRegistration): Promise<HumanRegistrationResult> {
    const existing =
      input.ownerMetadata === undefined ? await this.registry.getOwner(input.ownerId) : null;
    const owner =
      existing ?? (await this.registry.registerOwner(input.ownerId, input.ownerMetadata));
    await this.registry.registerAgent({
      agentId: input.agentId,
      initiator: "human",
      ...(input.agentMetadata ? { metadata: input.agentMetadata } : {}),
    });
    const binding = await this.registry.bind(owner.ownerId, input.agentId);
    const agent = await this.registry.requireAgent(input.agentId);
    await this.followUp(agent);
    return { owner, agent, binding };
  }

  /**
   * @throws PairingCodeInvalidError
   * @throws PairingCodeExpiredError
   */
  async registerWithPairingCode(
    code: string,
    agentId: string,
    metadata?: Record<string, string>,
  ): Promise<PairingResult> {
    const result = await this.pairing.submit(code, agentId, metadata);
    if (result.created) {
      await this.followUp(result.agent);
    }
    return result;
  }

  /**
   * Register `childAgentId` under `parentAgentId`, creating the child if needed.
   * A new child is bound to the parent's owner.
   * @throws UnknownAgentError when the parent does not exist
   * @throws CycleDetectedError
   */
  async registerSubAgent(input: SubAgentRegistration): Promise<SubAgentRegistrationResult> {
    const parent = await this.registry.requireActiveAgent(input.parentAgentId);

    let created = false;
    if (!(await this.registry.getAgent(input.childAgentId))) {
      try {
        await this.registry.registerAgent({
          agentId: input.childAgentId,
          initiator: "agent",
          ...(input.metadata ? { metadata: input.metadata } : {}),
        });
        created = true;
      } catch (error) {
        // Lost a race with a concurrent registration of the same child.
        if (!(error instanceof DuplicateAgentError)) {
          throw error;
        }
      }
      if (created && parent.ownerId !== null) {
        await this.registry.bind(parent.ownerId, input.childAgentId);
      }
    }

    const edge = await this.registry.registerSubAgent(parent.agentId, input.childAgentId);
    const child = await this.registry.requireAgent(input.childAgentId);
    if (created) {
      await this.followUp(child);
    }
    return { child, edge, created };
  }

  async drain(): Promise<void> {
    await this.tasks.drain();
  }

  private async followUp(agent: Agent): Promise<void> {
    const audit = this.audit;
    if (audit && agent.ownerId !== null) {
      const notice = { agentId: agent.agentId, ownerId: agent.ownerId, did: agent.did };
      this.tasks.run(
        () => audit.initializePermissions(notice),
        (error) => {
          console.warn(
            `[Registration] Permission init for agent "${agent.agentId}" failed: ${getErrorMessage(error)}`,
          );
        },
      );
    }
    await this.registry.refreshDid(agent.agentId);
  }
}
