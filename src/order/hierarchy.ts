import { sortIds } from "../determinism/CanonicalOrder.js";
import type { ChangeEdge, ChangeNode, NodeId } from "./types.js";

export interface Hierarchy {
  /** Children of every given parent, sorted by id. `null` stands for the top level. */
  childrenOf(parents: readonly (NodeId | null)[]): NodeId[];
  /** Dependency edges between members of one level, lifted from their descendants. */
  edgesWithin(level: readonly NodeId[]): ChangeEdge[];
}

/**
 * Group nodes into sibling levels. An edge is lifted to the pair of siblings
 * where the endpoints' ancestries diverge, and to each deeper pair of ancestors
 * below it: when that pair lands in one cycle group, their children share a
 * level and the deeper pair orders them. Containment is never an edge: an edge
 * from a node to its own ancestor or descendant disappears.
 */
export function buildHierarchy(nodeById: Map<NodeId, ChangeNode>, edges: readonly ChangeEdge[]): Hierarchy {
  const children = new Map<NodeId | null, NodeId[]>();
  for (const node of nodeById.values()) {
    const key = node.parent ?? null;
    const list = children.get(key) ?? [];
    list.push(node.id);
    children.set(key, list);
  }

  // Ancestor chain from the top level down to the node inclusive, built once per node.
  const paths = new Map<NodeId, NodeId[]>();
  function pathOf(id: NodeId): NodeId[] {
    const pending: NodeId[] = [];
    let cur: NodeId | undefined = id;
    while (cur !== undefined && !paths.has(cur)) {
      pending.push(cur);
      cur = nodeById.get(cur)?.parent;
    }
    let path = cur === undefined ? [] : (paths.get(cur) ?? []);
    for (let i = pending.length - 1; i >= 0; i--) {
      path = [...path, pending[i]];
      paths.set(pending[i], path);
    }
    return path;
  }

  const lifted = new Map<NodeId, ChangeEdge[]>();
  const seen = new Set<string>();
  for (const edge of edges) {
    const fromPath = pathOf(edge.from);
    const toPath = pathOf(edge.to);
    let i = 0;
    while (i < fromPath.length && i < toPath.length && fromPath[i] === toPath[i]) i++;

    for (let k = i; k < fromPath.length && k < toPath.length; k++) {
      const from = fromPath[k];
      const to = toPath[k];
      const key = `${from}\u0000${to}`;
      if (seen.has(key)) continue;
      seen.add(key);
      const list = lifted.get(from) ?? [];
      list.push({ from, to });
      lifted.set(from, list);
    }
  }

  return {
    childrenOf(parents) {
      const out: NodeId[] = [];
      for (const parent of parents) {
        for (const child of children.get(parent) ?? []) out.push(child);
      }
      return sortIds(out);
    },
    edgesWithin(level) {
      const members = new Set(level);
      const out: ChangeEdge[] = [];
      for (const id of level) {
        for (const edge of lifted.get(id) ?? []) {
          if (members.has(edge.to)) out.push(edge);
        }
      }
      return out;
    },
  };
}
