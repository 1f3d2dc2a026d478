import type { RelationshipEdge } from "@meridian/core";

/** Transitive closure of sub-agent edges rooted at one agent. */
export interface ChainSummary {
  readonly rootAgentId: string;
  /** Descendants in breadth-first order, root excluded. */
  readonly agentIds: readonly string[];
  readonly edges: readonly RelationshipEdge[];
  /** Longest parent-to-child hop count reached from the root. */
  readonly depth: number;
}

/**
 * Storage key of an edge. The parent's length leads the key, so no two
 * (parent, child) pairs share one whatever characters the ids contain.
 */
export function edgeKey(parentAgentId: string, childAgentId: string): string {
  return `${parentAgentId.length}:${parentAgentId}/${childAgentId}`;
}

function childrenIndex(edges: readonly RelationshipEdge[]): Map<string, RelationshipEdge[]> {
  const index = new Map<string, RelationshipEdge[]>();
  for (const edge of edges) {
    const list = index.get(edge.parentAgentId);
    if (list) {
      list.push(edge);
    } else {
      index.set(edge.parentAgentId, [edge]);
    }
  }
  return index;
}

/**
 * Breadth-first walk from `rootAgentId`. Each agent is visited once, so the
 * walk terminates even if the stored edges were to contain a cycle.
 */
export function summarizeChain(
  rootAgentId: string,
  edges: readonly RelationshipEdge[],
): ChainSummary {
  const index = childrenIndex(edges);
  const visited = new Set<string>([rootAgentId]);
  const agentIds: string[] = [];
  const reached: RelationshipEdge[] = [];
  let frontier = [rootAgentId];
  let depth = 0;

  while (frontier.length > 0) {
    const next: string[] = [];
    for (const parent of frontier) {
      for (const edge of index.get(parent) ?? []) {
        reached.push(edge);
        if (!visited.has(edge.childAgentId)) {
          visited.add(edge.childAgentId);
          agentIds.push(edge.childAgentId);
          next.push(edge.childAgentId);
        }
      }
    }
    if (next.length > 0) {
      depth += 1;
    }
    frontier = next;
  }

  return { rootAgentId, agentIds, edges: reached, depth };
}

/**
 * Whether adding `parent -> child` would close a cycle: true for a self edge
 * or when `parent` is already reachable from `child`.
 */
export function wouldCreateCycle(
  parentAgentId: string,
  childAgentId: string,
  edges: readonly RelationshipEdge[],
): boolean {
  if (parentAgentId === childAgentId) {
    return true;
  }
  return summarizeChain(childAgentId, edges).agentIds.includes(parentAgentId);
}
