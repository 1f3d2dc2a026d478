/**
 * @meridian/identity
 *
 * Owners, agents, bindings, the sub-agent collaboration graph,
 * background DID registration and agent presence.
 */

export { DidRefresher, type DidRefresherOptions, type DidSink } from "./did-refresher.js";
export {
  DEFAULT_OFFLINE_AFTER_MS,
  type PresenceStatus,
  PresenceTracker,
  type PresenceTrackerOptions,
} from "./presence.js";
export {
  type AgentRelationships,
  IdentityRegistry,
  type IdentityRegistryOptions,
  type LinkIdentityInput,
  type RegisterAgentInput,
  type RelationshipEntry,
} from "./registry.js";
export {
  type ChainSummary,
  edgeKey,
  summarizeChain,
  wouldCreateCycle,
} from "./relationship-graph.js";
