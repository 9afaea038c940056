import { canonicalEdges } from "../determinism/CanonicalOrder.js";
import { ResolutionError } from "./errors.js";
import type { ChangeEdge, ChangeNode, ChangeSet, NodeId } from "./types.js";

export interface IndexedChangeSet {
  nodeById: Map<NodeId, ChangeNode>;
  /** Deduplicated, sorted by (from, to). */
  edges: ChangeEdge[];
}

function checkNodes(nodes: readonly ChangeNode[]): Map<NodeId, ChangeNode> {
  const nodeById = new Map<NodeId, ChangeNode>();
  for (const node of nodes) {
    if (nodeById.has(node.id)) {
      throw new ResolutionError({ kind: "DuplicateNode", node: node.id });
    }
    nodeById.set(node.id, node);
  }
  return nodeById;
}

function checkParents(nodeById: Map<NodeId, ChangeNode>): void {
  for (const node of nodeById.values()) {
    if (node.parent !== undefined && !nodeById.has(node.parent)) {
      throw new ResolutionError({ kind: "UnknownReference", missing: node.parent, node: node.id });
    }
  }

  for (const node of nodeById.values()) {
    const chain: NodeId[] = [node.id];
    const seen = new Set<NodeId>(chain);
    let parent = node.parent;
    while (parent !== undefined) {
      chain.push(parent);
      if (seen.has(parent)) {
        throw new ResolutionError({ kind: "InvalidNesting", chain });
      }
      seen.add(parent);
      parent = nodeById.get(parent)?.parent;
    }
  }
}

function checkEdges(nodeById: Map<NodeId, ChangeNode>, edges: readonly ChangeEdge[]): void {
  for (const edge of edges) {
    if (edge.from === edge.to) {
      throw new ResolutionError({ kind: "SelfDependency", node: edge.from });
    }
    for (const endpoint of [edge.from, edge.to]) {
      if (!nodeById.has(endpoint)) {
        throw new ResolutionError({
          kind: "UnknownReference",
          missing: endpoint,
          edge: { from: edge.from, to: edge.to },
        });
      }
    }
  }
}

/**
 * Validate a change-set and index it. First failure wins, in this order:
 * duplicate nodes, unknown parents, parent loops, then edges in input order.
 */
export function indexChangeSet(changeSet: ChangeSet): IndexedChangeSet {
  const nodeById = checkNodes(changeSet.nodes);
  checkParents(nodeById);
  checkEdges(nodeById, changeSet.edges);
  return { nodeById, edges: canonicalEdges(changeSet.edges) };
}

/**
 * Override must name known nodes at most once, and never a node ahead of its
 * parent (a parent left out of the override would land after the child).
 */
export function checkOverride(nodeById: Map<NodeId, ChangeNode>, override: readonly NodeId[]): void {
  const position = new Map<NodeId, number>();
  override.forEach((id, i) => {
    if (!nodeById.has(id)) {
      throw new ResolutionError({ kind: "InvalidOverride", node: id, reason: "unknown" });
    }
    if (position.has(id)) {
      throw new ResolutionError({ kind: "InvalidOverride", node: id, reason: "duplicate" });
    }
    position.set(id, i);
  });

  override.forEach((id, i) => {
    const parent = nodeById.get(id)?.parent;
    if (parent === undefined) return;
    const parentPos = position.get(parent);
    if (parentPos === undefined || parentPos > i) {
      throw new ResolutionError({ kind: "InvalidOverride", node: id, reason: "before_parent", parent });
    }
  });
}
