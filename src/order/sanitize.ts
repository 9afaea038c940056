import type { ChangeEdge, ChangeSet } from "./types.js";

export interface DroppedEdge {
  edge: ChangeEdge;
  kind: "SelfDependency" | "UnknownReference";
}

/**
 * Remove edges that would fail validation, so a caller can retry with partial
 * information instead of aborting. Nodes and override pass through untouched.
 */
export function dropInvalidEdges(changeSet: ChangeSet): { changeSet: ChangeSet; dropped: DroppedEdge[] } {
  const ids = new Set(changeSet.nodes.map((n) => n.id));
  const kept: ChangeEdge[] = [];
  const dropped: DroppedEdge[] = [];

  for (const edge of changeSet.edges) {
    if (edge.from === edge.to) {
      dropped.push({ edge, kind: "SelfDependency" });
    } else if (!ids.has(edge.from) || !ids.has(edge.to)) {
      dropped.push({ edge, kind: "UnknownReference" });
    } else {
      kept.push(edge);
    }
  }

  return { changeSet: { ...changeSet, edges: kept }, dropped };
}
