/** Binary min-heap over node indices, ordered by `compare`. */
class Frontier {
  private readonly items: number[] = [];

  constructor(private readonly compare: (a: number, b: number) => number) {}

  get size(): number {
    return this.items.length;
  }

  push(v: number): void {
    const items = this.items;
    items.push(v);
    let i = items.length - 1;
    while (i > 0) {
      const up = (i - 1) >> 1;
      if (this.compare(items[i], items[up]) >= 0) break;
      [items[i], items[up]] = [items[up], items[i]];
      i = up;
    }
  }

  pop(): number | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (items.length === 0 || last === undefined) return top;
    items[0] = last;
    let i = 0;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let best = i;
      if (l < items.length && this.compare(items[l], items[best]) < 0) best = l;
      if (r < items.length && this.compare(items[r], items[best]) < 0) best = r;
      if (best === i) break;
      [items[i], items[best]] = [items[best], items[i]];
      i = best;
    }
    return top;
  }
}

/**
 * Kahn's algorithm over "depends-on" adjacency: a node becomes ready once every
 * node it depends on has been emitted. `compare` picks among ready nodes and
 * must be a total order.
 * Returns null when nodes remain unemitted (the graph has a cycle).
 */
export function kahnOrder(
  count: number,
  adjacency: readonly (readonly number[])[],
  compare: (a: number, b: number) => number,
): number[] | null {
  const remaining = new Array<number>(count).fill(0);
  const dependents = Array.from({ length: count }, (): number[] => []);
  for (let v = 0; v < count; v++) {
    const deps = new Set(adjacency[v] ?? []);
    remaining[v] = deps.size;
    for (const d of deps) dependents[d].push(v);
  }

  const frontier = new Frontier(compare);
  for (let v = 0; v < count; v++) {
    if (remaining[v] === 0) frontier.push(v);
  }

  const order: number[] = [];
  while (frontier.size > 0) {
    const next = frontier.pop();
    if (next === undefined) break;
    order.push(next);
    for (const dependent of dependents[next]) {
      remaining[dependent]--;
      if (remaining[dependent] === 0) frontier.push(dependent);
    }
  }

  return order.length === count ? order : null;
}
