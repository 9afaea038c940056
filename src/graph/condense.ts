import { internalViolation } from "../order/errors.js";

export interface Condensation {
  /** Component index of each node. */
  componentOf: number[];
  /** Deduplicated, self-loop-free "depends-on" edges between components. */
  adjacency: number[][];
}

export function condense(
  count: number,
  adjacency: readonly (readonly number[])[],
  components: readonly (readonly number[])[],
): Condensation {
  const componentOf = new Array<number>(count).fill(-1);
  components.forEach((members, c) => {
    for (const m of members) componentOf[m] = c;
  });
  if (componentOf.some((c) => c === -1)) {
    throw internalViolation("every node belongs to exactly one component");
  }

  const seen = components.map(() => new Set<number>());
  const out = components.map((): number[] => []);
  for (let v = 0; v < count; v++) {
    const from = componentOf[v];
    for (const w of adjacency[v] ?? []) {
      const to = componentOf[w];
      if (from === to || seen[from].has(to)) continue;
      seen[from].add(to);
      out[from].push(to);
    }
  }
  for (const list of out) list.sort((a, b) => a - b);

  return { componentOf, adjacency: out };
}

/** Throws InternalInvariantViolation when a cycle survives condensation. */
export function assertAcyclic(count: number, adjacency: readonly (readonly number[])[]): void {
  const state = new Array<0 | 1 | 2>(count).fill(0);
  const frames: { v: number; next: number }[] = [];

  for (let root = 0; root < count; root++) {
    if (state[root] !== 0) continue;
    state[root] = 1;
    frames.push({ v: root, next: 0 });
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const edges = adjacency[frame.v] ?? [];
      if (frame.next < edges.length) {
        const w = edges[frame.next++];
        if (state[w] === 1) throw internalViolation("condensed graph is acyclic");
        if (state[w] === 0) {
          state[w] = 1;
          frames.push({ v: w, next: 0 });
        }
        continue;
      }
      state[frame.v] = 2;
      frames.pop();
    }
  }
}
