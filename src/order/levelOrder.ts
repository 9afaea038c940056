import { stringCompareBinary } from "../determinism/CanonicalOrder.js";
import { assertAcyclic, condense } from "../graph/condense.js";
import { kahnOrder } from "../graph/kahn.js";
import { stronglyConnectedComponents } from "../graph/tarjan.js";
import { internalViolation } from "./errors.js";
import { layerRank } from "./layers.js";
import type { ChangeEdge, LayerHint, NodeId } from "./types.js";

/** One presentation slot: a single node, or a cycle group when members.length > 1. */
export interface LevelGroup {
  members: NodeId[];
}

/** Member order inside a cycle group: layer rank, then id. */
export function compareMembers(
  a: NodeId,
  b: NodeId,
  layerOf: (id: NodeId) => LayerHint | undefined,
): number {
  const rankCmp = layerRank(layerOf(a)) - layerRank(layerOf(b));
  if (rankCmp !== 0) return rankCmp;
  return stringCompareBinary(a, b);
}

interface GroupKey {
  rank: number;
  fanOut: number;
  firstId: NodeId;
}

/** Frontier tie-break: layer rank, then fewer outgoing dependencies, then id. */
export function compareGroupKeys(a: GroupKey, b: GroupKey): number {
  if (a.rank !== b.rank) return a.rank - b.rank;
  if (a.fanOut !== b.fanOut) return a.fanOut - b.fanOut;
  return stringCompareBinary(a.firstId, b.firstId);
}

/**
 * Order one sibling level: collapse strongly connected components, then
 * topologically sort the condensation so dependencies come first.
 */
export function orderLevel(
  ids: readonly NodeId[],
  edges: readonly ChangeEdge[],
  layerOf: (id: NodeId) => LayerHint | undefined,
): LevelGroup[] {
  const indexOf = new Map<NodeId, number>();
  ids.forEach((id, i) => indexOf.set(id, i));

  const targets = ids.map(() => new Set<number>());
  for (const e of edges) {
    const from = indexOf.get(e.from);
    const to = indexOf.get(e.to);
    if (from === undefined || to === undefined) {
      throw internalViolation(`lifted edge ${e.from} -> ${e.to} stays within its level`);
    }
    if (from !== to) targets[from].add(to);
  }
  const adjacency = targets.map((t) => [...t]);

  const components = stronglyConnectedComponents(ids.length, adjacency);
  const condensed = condense(ids.length, adjacency, components);
  assertAcyclic(components.length, condensed.adjacency);

  const members = components.map((c) =>
    c.map((i) => ids[i]).sort((a, b) => compareMembers(a, b, layerOf)),
  );
  // Fan-out counts every dependency leaving the component, not distinct target components.
  const fanOut = new Array<number>(components.length).fill(0);
  adjacency.forEach((deps, v) => {
    const c = condensed.componentOf[v];
    for (const w of deps) {
      if (condensed.componentOf[w] !== c) fanOut[c]++;
    }
  });

  const keys: GroupKey[] = members.map((m, c) => {
    let rank = Number.POSITIVE_INFINITY;
    let firstId = m[0];
    for (const id of m) {
      rank = Math.min(rank, layerRank(layerOf(id)));
      if (stringCompareBinary(id, firstId) < 0) firstId = id;
    }
    return { rank, fanOut: fanOut[c], firstId };
  });

  const order = kahnOrder(components.length, condensed.adjacency, (a, b) =>
    compareGroupKeys(keys[a], keys[b]),
  );
  if (order === null) {
    throw internalViolation("topological sort of the condensed graph emits every component");
  }

  return order.map((c) => ({ members: members[c] }));
}
