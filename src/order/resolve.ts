import { ResolutionError, internalViolation } from "./errors.js";
import { buildHierarchy } from "./hierarchy.js";
import { orderLevel, type LevelGroup } from "./levelOrder.js";
import { checkOverride, indexChangeSet, type IndexedChangeSet } from "./validate.js";
import type {
  ChangeEdge,
  ChangeNode,
  ChangeSet,
  NodeId,
  OrderEntry,
  OverrideContradiction,
  Resolution,
} from "./types.js";

interface ComputedOrder {
  order: NodeId[];
  entries: OrderEntry[];
  cycles: NodeId[][];
}

function computeOrder(indexed: IndexedChangeSet): ComputedOrder {
  const { nodeById, edges } = indexed;
  const hierarchy = buildHierarchy(nodeById, edges);
  const layerOf = (id: NodeId) => nodeById.get(id)?.layer;
  const parentOf = (id: NodeId) => nodeById.get(id)?.parent ?? null;

  const order: NodeId[] = [];
  const entries: OrderEntry[] = [];
  const cycles: NodeId[][] = [];

  function levelUnder(parents: readonly (NodeId | null)[]): LevelGroup[] {
    const ids = hierarchy.childrenOf(parents);
    return orderLevel(ids, hierarchy.edgesWithin(ids), layerOf);
  }

  // Depth-first: a group, then the joint level of all its members' children,
  // then the next group.
  const frames: { groups: LevelGroup[]; next: number }[] = [{ groups: levelUnder([null]), next: 0 }];
  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    if (frame.next === frame.groups.length) {
      frames.pop();
      continue;
    }
    const { members } = frame.groups[frame.next++];
    if (members.length === 1) {
      entries.push({ kind: "node", id: members[0], parent: parentOf(members[0]) });
    } else {
      entries.push({ kind: "cycle", members, parent: parentOf(members[0]) });
      cycles.push(members);
    }
    for (const m of members) order.push(m);

    const below = levelUnder(members);
    if (below.length > 0) frames.push({ groups: below, next: 0 });
  }

  return { order, entries, cycles };
}

/** Sub-change-set of the nodes the override leaves out; named parents drop away. */
function remainderOf(indexed: IndexedChangeSet, named: ReadonlySet<NodeId>): IndexedChangeSet {
  const nodeById = new Map<NodeId, ChangeNode>();
  for (const node of indexed.nodeById.values()) {
    if (named.has(node.id)) continue;
    const parent = node.parent !== undefined && named.has(node.parent) ? undefined : node.parent;
    nodeById.set(node.id, { id: node.id, parent, layer: node.layer });
  }
  const edges = indexed.edges.filter((e) => nodeById.has(e.from) && nodeById.has(e.to));
  return { nodeById, edges };
}

function findContradictions(
  order: readonly NodeId[],
  edges: readonly ChangeEdge[],
  named: ReadonlySet<NodeId>,
): OverrideContradiction[] {
  const position = new Map<NodeId, number>();
  order.forEach((id, i) => position.set(id, i));
  const out: OverrideContradiction[] = [];
  for (const e of edges) {
    if (!named.has(e.from) && !named.has(e.to)) continue;
    const dependent = position.get(e.from) ?? -1;
    const dependency = position.get(e.to) ?? -1;
    if (dependent < dependency) out.push({ dependent: e.from, dependency: e.to });
  }
  return out;
}

function assertPermutation(order: readonly NodeId[], nodeById: Map<NodeId, ChangeNode>): void {
  const seen = new Set(order);
  if (order.length !== nodeById.size || seen.size !== order.length) {
    throw internalViolation("output is a permutation of the input nodes");
  }
  for (const id of seen) {
    if (!nodeById.has(id)) throw internalViolation("output is a permutation of the input nodes");
  }
}

/**
 * Order the units of a change-set for presentation: dependencies before
 * dependents, parents before children, strongly connected nodes grouped.
 * A non-empty override is used verbatim for the nodes it names; the rest follow
 * in computed order. Pure; throws ResolutionError.
 */
export function resolveOrder(changeSet: ChangeSet): Resolution {
  const indexed = indexChangeSet(changeSet);
  const override = changeSet.override ?? [];

  if (override.length === 0) {
    const computed = computeOrder(indexed);
    assertPermutation(computed.order, indexed.nodeById);
    return {
      ...computed,
      override: { applied: false, named: [], contradictions: [], contradicted: false },
    };
  }

  checkOverride(indexed.nodeById, override);
  const named = new Set(override);
  const rest = computeOrder(remainderOf(indexed, named));
  const order = [...override, ...rest.order];
  assertPermutation(order, indexed.nodeById);

  const parentOf = (id: NodeId) => indexed.nodeById.get(id)?.parent ?? null;
  const namedEntries = override.map((id): OrderEntry => ({ kind: "node", id, parent: parentOf(id) }));
  const restEntries = rest.entries.map((e): OrderEntry =>
    e.kind === "node" ? { ...e, parent: parentOf(e.id) } : { ...e, parent: parentOf(e.members[0]) },
  );
  const contradictions = findContradictions(order, indexed.edges, named);

  return {
    order,
    entries: [...namedEntries, ...restEntries],
    cycles: rest.cycles,
    override: {
      applied: true,
      named: [...override],
      contradictions,
      contradicted: contradictions.length > 0,
    },
  };
}

export type ResolveOutcome =
  | { ok: true; resolution: Resolution }
  | { ok: false; error: ResolutionError };

/** resolveOrder without the throw, for callers that branch on the error kind. */
export function tryResolveOrder(changeSet: ChangeSet): ResolveOutcome {
  try {
    return { ok: true, resolution: resolveOrder(changeSet) };
  } catch (err) {
    if (err instanceof ResolutionError) return { ok: false, error: err };
    throw err;
  }
}
