type Graph = ReadonlyMap<string, ReadonlySet<string>>;

const EMPTY: ReadonlySet<string> = new Set();

/**
 * Whether a directed graph (adjacency sets keyed by node) contains a cycle,
 * self-loops included. Iterative depth-first search.
 */
export const hasCycle = (graph: Graph): boolean => {
  const neighbours = (node: string): Iterator<string> =>
    (graph.get(node) ?? EMPTY).values();

  const state = new Map<string, "active" | "done">();

  for (const start of graph.keys()) {
    if (state.has(start)) {
      continue;
    }
    state.set(start, "active");
    const stack = [{ node: start, next: neighbours(start) }];

    for (let frame = stack.at(-1); frame !== undefined; frame = stack.at(-1)) {
      const step = frame.next.next();
      if (step.done === true) {
        state.set(frame.node, "done");
        stack.pop();
        continue;
      }
      const child = step.value;
      const childState = state.get(child);
      if (childState === "active") {
        return true;
      }
      if (childState === undefined) {
        state.set(child, "active");
        stack.push({ node: child, next: neighbours(child) });
      }
    }
  }

  return false;
};
