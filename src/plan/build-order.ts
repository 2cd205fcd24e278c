import { PlanningError } from "../core/errors.js";
import { isOrderingEdge, type DependencyGraph } from "../graph/dependency-graph.js";

export type BuildOrder = {
  /** Linear order: the waves flattened. */
  order: string[];
  /** Parallel-safe groups; every member of a wave only needs earlier waves. */
  waves: string[][];
  /** node → ordering predecessors that must finish ok before it starts. */
  predecessors: ReadonlyMap<string, readonly string[]>;
};

/**
 * Extend a selection with everything it needs built first (transitively, over
 * ordering edges). Interface-only dependencies do not pull targets in.
 */
export function closeOverOrderingDependencies(graph: DependencyGraph, selected: Iterable<string>): Set<string> {
  const result = new Set<string>();
  const pending = [...selected];
  while (pending.length > 0) {
    const node = pending.pop();
    if (node === undefined || result.has(node)) continue;
    result.add(node);
    for (const edge of graph.dependenciesOf(node)) {
      if (isOrderingEdge(edge)) pending.push(edge.to);
    }
  }
  return result;
}

/**
 * Kahn's algorithm over the ordering relaxation of the dependency graph.
 * `wasm-rpc` edges are dropped, so mutually dependent or self-dependent
 * components plan fine; only cycles made of ordering edges are rejected.
 * Ties are broken by declaration order.
 */
export function planBuildOrder(graph: DependencyGraph, selected: Iterable<string> = graph.nodes): BuildOrder {
  const nodes = [...closeOverOrderingDependencies(graph, selected)].sort(
    (a, b) => graph.position(a) - graph.position(b),
  );
  const members = new Set(nodes);
  const edges = graph.orderingEdges().filter((e) => members.has(e.from) && members.has(e.to));

  const predecessors = new Map<string, string[]>(nodes.map((n) => [n, []]));
  const dependents = new Map<string, string[]>(nodes.map((n) => [n, []]));
  const remaining = new Map<string, number>(nodes.map((n) => [n, 0]));
  for (const edge of edges) {
    const preds = predecessors.get(edge.from);
    if (preds === undefined || preds.includes(edge.to)) continue;
    preds.push(edge.to);
    dependents.get(edge.to)?.push(edge.from);
    remaining.set(edge.from, (remaining.get(edge.from) ?? 0) + 1);
  }

  const waves: string[][] = [];
  let ready = nodes.filter((n) => remaining.get(n) === 0);
  let placed = 0;

  while (ready.length > 0) {
    waves.push(ready);
    placed += ready.length;

    const next: string[] = [];
    for (const node of ready) {
      for (const dependent of dependents.get(node) ?? []) {
        const left = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, left);
        if (left === 0) next.push(dependent);
      }
    }
    ready = next.sort((a, b) => graph.position(a) - graph.position(b));
  }

  if (placed < nodes.length) {
    const cycles = graph.cycles(edges);
    const described = cycles.map((c) => c.join(" -> ")).join("; ");
    throw new PlanningError(
      "ORDERING_CYCLE",
      `Static dependencies form a cycle, no build order exists: ${described}`,
      `/dependencies/${cycles[0]?.[0] ?? ""}`,
    );
  }

  for (const preds of predecessors.values()) preds.sort((a, b) => graph.position(a) - graph.position(b));

  return { order: waves.flat(), waves, predecessors };
}
