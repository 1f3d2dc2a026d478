import {
  type Agent,
  AgentSchema,
  type AuditCollaborator,
  BackgroundTasks,
  type Binding,
  BindingSchema,
  type ChainCollaborator,
  type Clock,
  defaultClock,
  type IdentityLink,
  IdentityLinkSchema,
  type IdentityNamespace,
  isoNow,
  jsonEquals,
  KeyedSerialExecutor,
  MAX_ID_LENGTH,
  type Owner,
  type OwnerChange,
  OwnerChangeSchema,
  OwnerSchema,
  type RegistrationInitiator,
  type RelationshipEdge,
  RelationshipEdgeSchema,
  type RetryPolicy,
  type Sleep,
} from "@meridian/core";
import {
  AgentRevokedError,
  CycleDetectedError,
  DuplicateAgentError,
  getErrorMessage,
  IdentityConflictError,
  UnknownAgentError,
  UnknownOwnerError,
  ValidationError,
} from "@meridian/errors";
import { Collection, type PersistenceBackend } from "@meridian/storage";
import { DidRefresher } from "./did-refresher.js";
import {
  type ChainSummary,
  edgeKey,
  summarizeChain,
  wouldCreateCycle,
} from "./relationship-graph.js";

export interface IdentityRegistryOptions {
  readonly backend: PersistenceBackend;
  readonly clock?: Clock;
  /** Enables `refreshDid`. Without it, agents keep a null DID. */
  readonly chain?: ChainCollaborator;
  /** Receives sub-agent notices. */
  readonly audit?: AuditCollaborator;
  readonly sleep?: Sleep;
  readonly didRetry?: RetryPolicy;
}

export interface RegisterAgentInput {
  readonly agentId: string;
  readonly initiator?: RegistrationInitiator;
  readonly metadata?: Readonly<Record<string, string>>;
}

export interface AgentRelationships {
  readonly agentId: string;
  readonly ownerId: string | null;
  readonly parents: readonly string[];
  readonly children: readonly string[];
  readonly chain: ChainSummary;
}

/** One row of the audit service's pull view. */
export interface RelationshipEntry {
  readonly agentId: string;
  readonly ownerId: string | null;
  readonly status: Agent["status"];
  readonly did: string | null;
  readonly subAgents: readonly string[];
}

export interface LinkIdentityInput {
  readonly imUserId?: string;
  readonly channelUserId?: string;
}

/** Zero-padded so history keys sort in append order. */
const HISTORY_SEQ_WIDTH = 8;

/**
 * Owners, agents, bindings and the sub-agent graph.
 *
 * All state lives in the persistence backend. In process, writes to one agent
 * record run one at a time, and so do sub-agent edge insertions.
 */
export class IdentityRegistry {
  private readonly owners: Collection<Owner>;
  private readonly agents: Collection<Agent>;
  private readonly bindings: Collection<Binding>;
  private readonly history: Collection<OwnerChange>;
  private readonly edges: Collection<RelationshipEdge>;
  private readonly links: Collection<IdentityLink>;
  private readonly clock: Clock;
  private readonly audit: AuditCollaborator | undefined;
  private readonly didRefresher: DidRefresher | undefined;
  private readonly notices = new BackgroundTasks();
  private edgeQueue: Promise<unknown> = Promise.resolve();
  private readonly agentWrites = new KeyedSerialExecutor();

  constructor(options: IdentityRegistryOptions) {
    const { backend } = options;
    this.owners = new Collection(backend, "owners", OwnerSchema);
    this.agents = new Collection(backend, "agents", AgentSchema);
    this.bindings = new Collection(backend, "bindings", BindingSchema);
    this.history = new Collection(backend, "owner_changes", OwnerChangeSchema);
    this.edges = new Collection(backend, "relationships", RelationshipEdgeSchema);
    this.links = new Collection(backend, "identity_links", IdentityLinkSchema);
    this.clock = options.clock ?? defaultClock;
    this.audit = options.audit;
    this.didRefresher =
      options.chain === undefined
        ? undefined
        : new DidRefresher({
            backend,
            chain: options.chain,
            sink: this,
            clock: this.clock,
            ...(options.sleep === undefined ? {} : { sleep: options.sleep }),
            ...(options.didRetry === undefined ? {} : { retry: options.didRetry }),
          });
  }

  // -------------------------------------------------------------------------
  // Owners and agents
  // -------------------------------------------------------------------------

  /**
   * Create the owner, or return the existing one when its metadata matches.
   * @throws IdentityConflictError when the owner exists with other metadata
   */
  async registerOwner(
    ownerId: string,
    metadata: Readonly<Record<string, string>> = {},
  ): Promise<Owner> {
    requireId("ownerId", ownerId);
    const owner: Owner = { ownerId, metadata: { ...metadata }, createdAt: isoNow(this.clock) };
    const { record, created } = await this.owners.putIfAbsent(ownerId, owner);
    if (!created && !jsonEquals(record.metadata, owner.metadata)) {
      throw new IdentityConflictError(ownerId);
    }
    return record;
  }

  async getOwner(ownerId: string): Promise<Owner | null> {
    return this.owners.get(ownerId);
  }

  /**
   * Create a pending, unbound agent.
   * @throws DuplicateAgentError when the id is taken
   */
  async registerAgent(input: RegisterAgentInput): Promise<Agent> {
    requireId("agentId", input.agentId);
    const now = isoNow(this.clock);
    const agent: Agent = {
      agentId: input.agentId,
      ownerId: null,
      did: null,
      status: "pending",
      initiator: input.initiator ?? "human",
      metadata: { ...input.metadata },
      createdAt: now,
      updatedAt: now,
    };
    const { created } = await this.agents.putIfAbsent(agent.agentId, agent);
    if (!created) {
      throw new DuplicateAgentError(agent.agentId);
    }
    return agent;
  }

  async getAgent(agentId: string): Promise<Agent | null> {
    return this.agents.get(agentId);
  }

  /** @throws UnknownAgentError */
  async requireAgent(agentId: string): Promise<Agent> {
    const agent = await this.agents.get(agentId);
    if (!agent) {
      throw new UnknownAgentError(agentId);
    }
    return agent;
  }

  /** Like `requireAgent`, and additionally rejects revoked agents. */
  async requireActiveAgent(agentId: string): Promise<Agent> {
    const agent = await this.requireAgent(agentId);
    if (agent.status === "revoked") {
      throw new AgentRevokedError(agentId);
    }
    return agent;
  }

  /** Agents currently bound to the owner, ordered by agent id. */
  async agentsByOwner(ownerId: string): Promise<Agent[]> {
    if (!(await this.owners.get(ownerId))) {
      throw new UnknownOwnerError(ownerId);
    }
    const bindings = await this.bindings.query((b) => b.ownerId === ownerId);
    const agents = await Promise.all(bindings.map((b) => this.agents.get(b.agentId)));
    return agents.filter((agent): agent is Agent => agent !== null);
  }

  /** Terminal: a revoked agent cannot be bound, parented or delivered to. */
  revokeAgent(agentId: string): Promise<Agent> {
    return this.agentWrites.run(agentId, async () => {
      const agent = await this.requireAgent(agentId);
      if (agent.status === "revoked") {
        return agent;
      }
      const revoked: Agent = { ...agent, status: "revoked", updatedAt: isoNow(this.clock) };
      await this.agents.put(agentId, revoked);
      console.info(`[Identity] Agent "${agentId}" revoked`);
      return revoked;
    });
  }

  // -------------------------------------------------------------------------
  // Bindings
  // -------------------------------------------------------------------------

  /**
   * Bind the agent to the owner, replacing any previous binding. The first
   * bind activates a pending agent.
   */
  bind(ownerId: string, agentId: string): Promise<Binding> {
    return this.agentWrites.run(agentId, () => this.writeBinding(ownerId, agentId));
  }

  private async writeBinding(ownerId: string, agentId: string): Promise<Binding> {
    if (!(await this.owners.get(ownerId))) {
      throw new UnknownOwnerError(ownerId);
    }
    const agent = await this.requireActiveAgent(agentId);
    const previous = await this.bindings.get(agentId);
    if (previous?.ownerId === ownerId) {
      return previous;
    }

    const now = isoNow(this.clock);
    const binding: Binding = { agentId, ownerId, boundAt: now };
    await this.bindings.put(agentId, binding);
    await this.agents.put(agentId, {
      ...agent,
      ownerId,
      status: agent.status === "pending" ? "active" : agent.status,
      updatedAt: now,
    });
    await this.appendHistory(agentId, previous?.ownerId ?? null, ownerId, now);
    if (previous) {
      console.info(
        `[Identity] Agent "${agentId}" rebound from "${previous.ownerId}" to "${ownerId}"`,
      );
    }
    return binding;
  }

  /** Remove the agent's binding. Returns false when it had none. */
  unbind(agentId: string): Promise<boolean> {
    return this.agentWrites.run(agentId, async () => {
      const agent = await this.requireAgent(agentId);
      const previous = await this.bindings.get(agentId);
      if (!previous || !(await this.bindings.delete(agentId))) {
        return false;
      }
      const now = isoNow(this.clock);
      await this.agents.put(agentId, { ...agent, ownerId: null, updatedAt: now });
      await this.appendHistory(agentId, previous.ownerId, null, now);
      return true;
    });
  }

  /** Owner changes for the agent, newest first. */
  async ownerChangeHistory(agentId: string, limit = 50): Promise<OwnerChange[]> {
    const entries = await this.history.query((entry) => entry.agentId === agentId);
    return entries.reverse().slice(0, Math.max(0, limit));
  }

  private async appendHistory(
    agentId: string,
    fromOwner: string | null,
    toOwner: string | null,
    at: string,
  ): Promise<void> {
    const entry: OwnerChange = { agentId, fromOwner, toOwner, at };
    let seq = (await this.history.query((e) => e.agentId === agentId)).length;
    // Concurrent appends race for the same slot; the loser takes the next one.
    for (;;) {
      const key = `${agentId}/${String(seq).padStart(HISTORY_SEQ_WIDTH, "0")}`;
      const { created } = await this.history.putIfAbsent(key, entry);
      if (created) {
        return;
      }
      seq += 1;
    }
  }

  // -------------------------------------------------------------------------
  // Collaboration chain
  // -------------------------------------------------------------------------

  /**
   * Record `parent -> child`. Idempotent for an existing edge.
   * @throws CycleDetectedError when the child already reaches the parent
   */
  registerSubAgent(parentAgentId: string, childAgentId: string): Promise<RelationshipEdge> {
    // Cycle check and insert must not interleave with another insert.
    const run = this.edgeQueue.then(() => this.insertEdge(parentAgentId, childAgentId));
    this.edgeQueue = run.catch(() => undefined);
    return run;
  }

  private async insertEdge(
    parentAgentId: string,
    childAgentId: string,
  ): Promise<RelationshipEdge> {
    await this.requireActiveAgent(parentAgentId);
    await this.requireActiveAgent(childAgentId);

    const edges = await this.edges.query();
    if (wouldCreateCycle(parentAgentId, childAgentId, edges)) {
      throw new CycleDetectedError(parentAgentId, childAgentId);
    }

    const edge: RelationshipEdge = { parentAgentId, childAgentId, createdAt: isoNow(this.clock) };
    const { record, created } = await this.edges.putIfAbsent(
      edgeKey(parentAgentId, childAgentId),
      edge,
    );
    if (created && this.audit) {
      const audit = this.audit;
      this.notices.run(
        () => audit.notifySubAgent({ parentAgentId, childAgentId }),
        (error) => {
          console.warn(
            `[Identity] Sub-agent notice ${parentAgentId} -> ${childAgentId} failed: ${getErrorMessage(error)}`,
          );
        },
      );
    }
    return record;
  }

  async children(agentId: string): Promise<string[]> {
    const edges = await this.edges.query((e) => e.parentAgentId === agentId);
    return edges.map((e) => e.childAgentId);
  }

  async parents(agentId: string): Promise<string[]> {
    const edges = await this.edges.query((e) => e.childAgentId === agentId);
    return edges.map((e) => e.parentAgentId);
  }

  /** Breadth-first closure of sub-agents under `rootAgentId`. */
  async chainSummary(rootAgentId: string): Promise<ChainSummary> {
    await this.requireAgent(rootAgentId);
    return summarizeChain(rootAgentId, await this.edges.query());
  }

  async agentRelationships(agentId: string): Promise<AgentRelationships> {
    const agent = await this.requireAgent(agentId);
    const edges = await this.edges.query();
    return {
      agentId,
      ownerId: agent.ownerId,
      parents: edges.filter((e) => e.childAgentId === agentId).map((e) => e.parentAgentId),
      children: edges.filter((e) => e.parentAgentId === agentId).map((e) => e.childAgentId),
      chain: summarizeChain(agentId, edges),
    };
  }

  /** Every agent with its owner and direct sub-agents, ordered by agent id. */
  async listRelationships(): Promise<RelationshipEntry[]> {
    const [agents, edges] = await Promise.all([this.agents.query(), this.edges.query()]);
    return agents.map((agent) => ({
      agentId: agent.agentId,
      ownerId: agent.ownerId,
      status: agent.status,
      did: agent.did,
      subAgents: edges.filter((e) => e.parentAgentId === agent.agentId).map((e) => e.childAgentId),
    }));
  }

  // -------------------------------------------------------------------------
  // Cross-namespace identity links
  // -------------------------------------------------------------------------

  /** Merge the given identifiers into the principal's link record. */
  async linkIdentity(principalId: string, input: LinkIdentityInput): Promise<IdentityLink> {
    requireId("principalId", principalId);
    const existing = await this.links.get(principalId);
    const link: IdentityLink = {
      principalId,
      imUserId: input.imUserId ?? existing?.imUserId ?? null,
      channelUserId: input.channelUserId ?? existing?.channelUserId ?? null,
      updatedAt: isoNow(this.clock),
    };
    await this.links.put(principalId, link);
    return link;
  }

  async getIdentityLink(principalId: string): Promise<IdentityLink | null> {
    return this.links.get(principalId);
  }

  /**
   * Map an identifier from `namespace` to the same principal's identifier in
   * the other namespace. Null when no link covers it.
   */
  async resolveCounterpart(namespace: IdentityNamespace, id: string): Promise<string | null> {
    const [link] = await this.links.query((l) =>
      namespace === "im" ? l.imUserId === id : l.channelUserId === id,
    );
    if (!link) {
      return null;
    }
    return namespace === "im" ? link.channelUserId : link.imUserId;
  }

  // -------------------------------------------------------------------------
  // DIDs
  // -------------------------------------------------------------------------

  /**
   * Request a DID for the agent in the background. Returns immediately; the
   * agent keeps a null DID until the chain service answers.
   */
  async refreshDid(agentId: string): Promise<void> {
    await this.requireAgent(agentId);
    if (!this.didRefresher) {
      console.warn(
        `[Identity] No chain service configured; DID for agent "${agentId}" not requested`,
      );
      return;
    }
    this.didRefresher.schedule(agentId);
  }

  /** Sets only the DID; status and owner stay as the latest write left them. */
  recordDid(agentId: string, did: string): Promise<void> {
    return this.agentWrites.run(agentId, async () => {
      const agent = await this.requireAgent(agentId);
      await this.agents.put(agentId, { ...agent, did, updatedAt: isoNow(this.clock) });
    });
  }

  get dids(): DidRefresher | undefined {
    return this.didRefresher;
  }

  /** Wait for background DID refreshes and audit notices to settle. */
  async drain(): Promise<void> {
    await Promise.all([this.didRefresher?.drain(), this.notices.drain()]);
  }
}

function requireId(field: string, value: string): void {
  if (value.trim().length === 0) {
    throw new ValidationError({
      code: "VALIDATION_FAILED",
      message: `${field} must not be empty`,
      issues: [{ field, message: "must not be empty", code: "empty" }],
    });
  }
  if (value.length > MAX_ID_LENGTH) {
    throw new ValidationError({
      code: "VALIDATION_FAILED",
      message: `${field} must be at most ${MAX_ID_LENGTH} characters`,
      issues: [{ field, message: `must be at most ${MAX_ID_LENGTH} characters`, code: "too_big" }],
    });
  }
}
