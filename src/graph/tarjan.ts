/**
 * Strongly connected components over integer-indexed nodes (Tarjan).
 * Deterministic: nodes are visited in index order, adjacency in list order,
 * members of each component are sorted ascending.
 * Components are returned in completion order, which for "depends-on" edges
 * means every component comes after the components it depends on.
 */
export function stronglyConnectedComponents(
  count: number,
  adjacency: readonly (readonly number[])[],
): number[][] {
  let indexCounter = 0;
  const index = new Array<number>(count).fill(-1);
  const lowlink = new Array<number>(count).fill(-1);
  const onStack = new Array<boolean>(count).fill(false);
  const stack: number[] = [];
  const components: number[][] = [];

  // Iterative DFS: one frame per node on the current path.
  const frames: { v: number; next: number }[] = [];

  function enter(v: number): void {
    index[v] = indexCounter;
    lowlink[v] = indexCounter;
    indexCounter++;
    stack.push(v);
    onStack[v] = true;
    frames.push({ v, next: 0 });
  }

  function strongConnect(root: number): void {
    enter(root);
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const v = frame.v;
      const edges = adjacency[v] ?? [];
      if (frame.next < edges.length) {
        const w = edges[frame.next++];
        if (index[w] === -1) enter(w);
        else if (onStack[w]) lowlink[v] = Math.min(lowlink[v], index[w]);
        continue;
      }

      frames.pop();
      if (lowlink[v] === index[v]) {
        const component: number[] = [];
        let w: number | undefined;
        do {
          w = stack.pop();
          if (w === undefined) break;
          onStack[w] = false;
          component.push(w);
        } while (w !== v);
        component.sort((a, b) => a - b);
        components.push(component);
      }
      const caller = frames[frames.length - 1];
      if (caller !== undefined) lowlink[caller.v] = Math.min(lowlink[caller.v], lowlink[v]);
    }
  }

  for (let v = 0; v < count; v++) {
    if (index[v] === -1) strongConnect(v);
  }

  return components;
}
