import { PlanningError } from "../core/errors.js";
import type { DependencyType, ResolvedComponent } from "../types/model.js";

export type DependencyEdge = {
  from: string;
  to: string;
  type: DependencyType;
};

/**
 * Whether the dependent needs the target's built binary. `wasm-rpc` needs only
 * the target's interface (WIT), which exists independent of the target's
 * build, so it never constrains build order.
 */
export function isOrderingEdge(edge: DependencyEdge): boolean {
  return edge.type === "wasm-rpc-static";
}

/**
 * Directed graph of inter-component dependencies. Nodes keep manifest
 * declaration order. Self-edges and cycles are accepted here; only the
 * ordering relaxation (`orderingEdges`) has to be acyclic, which the build
 * order planner checks.
 */
export class DependencyGraph {
  private readonly nodeIndex = new Map<string, number>();
  private readonly outgoing = new Map<string, DependencyEdge[]>();

  private constructor(
    readonly nodes: readonly string[],
    readonly edges: readonly DependencyEdge[],
  ) {
    nodes.forEach((n, i) => {
      this.nodeIndex.set(n, i);
      this.outgoing.set(n, []);
    });
    for (const edge of edges) {
      this.outgoing.get(edge.from)?.push(edge);
    }
  }

  /** Build the graph; a dependency target that names no component is fatal. */
  static build(components: readonly ResolvedComponent[]): DependencyGraph {
    const ordered = [...components].sort((a, b) => a.index - b.index);
    const names = new Set(ordered.map((c) => c.name));
    const edges: DependencyEdge[] = [];

    for (const component of ordered) {
      component.dependencies.forEach((dep, i) => {
        if (!names.has(dep.target)) {
          throw new PlanningError(
            "DANGLING_DEPENDENCY",
            `Component "${component.name}" depends on unknown component "${dep.target}" (${dep.type})`,
            `/dependencies/${component.name}/${i}`,
          );
        }
        edges.push({ from: component.name, to: dep.target, type: dep.type });
      });
    }

    return new DependencyGraph(
      ordered.map((c) => c.name),
      edges,
    );
  }

  /** Declaration position of a node; unknown nodes sort last. */
  position(node: string): number {
    return this.nodeIndex.get(node) ?? Number.MAX_SAFE_INTEGER;
  }

  dependenciesOf(node: string): readonly DependencyEdge[] {
    return this.outgoing.get(node) ?? [];
  }

  orderingEdges(): DependencyEdge[] {
    return this.edges.filter(isOrderingEdge);
  }

  /**
   * Strongly connected components (Tarjan) of the graph restricted to `edges`,
   * keeping only real cycles: two or more members, or one member with a
   * self-edge. Members and groups come out in declaration order.
   */
  cycles(edges: readonly DependencyEdge[] = this.edges): string[][] {
    const adjacency = new Map<string, string[]>(this.nodes.map((n) => [n, []]));
    for (const e of edges) adjacency.get(e.from)?.push(e.to);

    let counter = 0;
    const index = new Map<string, number>();
    const lowlink = new Map<string, number>();
    const onStack = new Set<string>();
    const stack: string[] = [];
    const groups: string[][] = [];

    const strongConnect = (v: string): void => {
      index.set(v, counter);
      lowlink.set(v, counter);
      counter++;
      stack.push(v);
      onStack.add(v);

      for (const w of adjacency.get(v) ?? []) {
        const wIndex = index.get(w);
        if (wIndex === undefined) {
          strongConnect(w);
          lowlink.set(v, Math.min(lowlink.get(v) ?? 0, lowlink.get(w) ?? 0));
        } else if (onStack.has(w)) {
          lowlink.set(v, Math.min(lowlink.get(v) ?? 0, wIndex));
        }
      }

      if (lowlink.get(v) === index.get(v)) {
        const group: string[] = [];
        let w: string | undefined;
        do {
          w = stack.pop();
          if (w === undefined) break;
          onStack.delete(w);
          group.push(w);
        } while (w !== v);
        groups.push(group);
      }
    };

    for (const node of this.nodes) {
      if (!index.has(node)) strongConnect(node);
    }

    const selfLoops = new Set(edges.filter((e) => e.from === e.to).map((e) => e.from));
    return groups
      .filter((g) => g.length > 1 || selfLoops.has(g[0]))
      .map((g) => g.sort((a, b) => this.position(a) - this.position(b)))
      .sort((a, b) => this.position(a[0]) - this.position(b[0]));
  }
}
