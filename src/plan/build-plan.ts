import path from "node:path";
import { ConfigurationError, diag, errorMessage, type Diagnostic } from "../core/errors.js";
import { evaluateStaleness, describeVerdict } from "../exec/staleness.js";
import { DependencyGraph, type DependencyEdge } from "../graph/dependency-graph.js";
import { selectComponents } from "../resolve/select.js";
import type { ExternalCommand, ResolvedComponent } from "../types/model.js";
import type { PreviewStep } from "../types/report.js";
import { planBuildOrder } from "./build-order.js";

export type PlanStep = {
  component: string;
  index: number;
  command: ExternalCommand;
  /** Absolute working directory of the step. */
  cwd: string;
};

export type ComponentPlan = {
  component: string;
  /** Components that must finish ok before this one starts. */
  predecessors: readonly string[];
  steps: readonly PlanStep[];
};

/** One dependency edge and where the target's interface is read from. */
export type InterfaceRequirement = DependencyEdge & { wit?: string };

export type BuildPlan = {
  /** In execution order. */
  components: readonly ComponentPlan[];
  waves: readonly (readonly string[])[];
  /** Dependency cycles tolerated because they are satisfied by interfaces alone. */
  cycles: readonly (readonly string[])[];
  interfaces: readonly InterfaceRequirement[];
  warnings: readonly Diagnostic[];
};

export type PlanInput = {
  /** Directory the manifest lives in; default working directory of every step. */
  manifestDir: string;
  components: readonly ResolvedComponent[];
  /** Component name patterns; empty selects everything. */
  patterns?: readonly string[];
};

export function planSteps(component: string, commands: readonly ExternalCommand[], manifestDir: string): PlanStep[] {
  return commands.map((command, index) => ({
    component,
    index,
    command,
    cwd: path.resolve(manifestDir, command.dir ?? "."),
  }));
}

function byName(components: readonly ResolvedComponent[]): Map<string, ResolvedComponent> {
  return new Map(components.map((c) => [c.name, c]));
}

/**
 * Plan the `build` sequences of the selected components: dependency graph,
 * build order (closed over static dependencies) and interface sources of
 * every edge. Raises ConfigurationError / PlanningError before anything runs.
 */
export function createBuildPlan(input: PlanInput): BuildPlan {
  const graph = DependencyGraph.build(input.components);
  const selected = selectComponents(input.components, input.patterns).map((c) => c.name);
  const order = planBuildOrder(graph, selected);
  const lookup = byName(input.components);

  const components: ComponentPlan[] = [];
  const interfaces: InterfaceRequirement[] = [];
  const warnings: Diagnostic[] = [];

  for (const name of order.order) {
    const component = lookup.get(name);
    if (component === undefined) continue;

    components.push({
      component: name,
      predecessors: order.predecessors.get(name) ?? [],
      steps: planSteps(name, component.properties.build, input.manifestDir),
    });

    for (const edge of graph.dependenciesOf(name)) {
      const target = lookup.get(edge.to)?.properties;
      const wit = target?.generatedWit ?? target?.sourceWit;
      interfaces.push({ ...edge, wit });
      if (wit === undefined) {
        warnings.push(
          diag("warn", "INTERFACE_UNKNOWN", `Component "${edge.to}" declares neither generatedWit nor sourceWit; "${name}" needs its interface`, {
            details: { from: edge.from, to: edge.to, type: edge.type },
          }),
        );
      }
    }
  }

  const planned = new Set(order.order);
  const cycles = graph.cycles().filter((cycle) => cycle.some((n) => planned.has(n)));

  return { components, waves: order.waves, cycles, interfaces, warnings };
}

/**
 * Plan `customCommands[name]` of every selected component that defines it.
 * Custom commands carry no ordering between components.
 */
export function createCustomCommandPlan(input: PlanInput & { name: string }): BuildPlan {
  const selected = selectComponents(input.components, input.patterns).flatMap((c) =>
    Object.hasOwn(c.properties.customCommands, input.name) ? [{ name: c.name, commands: c.properties.customCommands[input.name] }] : [],
  );
  if (selected.length === 0) {
    throw new ConfigurationError("UNKNOWN_CUSTOM_COMMAND", `No selected component defines custom command "${input.name}"`);
  }

  const components = selected.map((c) => ({
    component: c.name,
    predecessors: [],
    steps: planSteps(c.name, c.commands, input.manifestDir),
  }));

  return {
    components,
    waves: [components.map((c) => c.component)],
    cycles: [],
    interfaces: [],
    warnings: [],
  };
}

/**
 * Attach a preview staleness verdict to every step without running anything.
 * Later steps may see a different verdict at execution time, once earlier
 * steps have produced their outputs.
 */
export async function previewPlan(plan: BuildPlan): Promise<Map<string, PreviewStep[]>> {
  const result = new Map<string, PreviewStep[]>();
  for (const component of plan.components) {
    const steps: PreviewStep[] = [];
    for (const step of component.steps) {
      try {
        const verdict = await evaluateStaleness(step.command, step.cwd);
        steps.push({
          index: step.index,
          command: step.command,
          verdict: { status: verdict.status, reason: describeVerdict(verdict) },
        });
      } catch (e) {
        steps.push({ index: step.index, command: step.command, verdict: { status: "error", message: errorMessage(e) } });
      }
    }
    result.set(component.component, steps);
  }
  return result;
}
