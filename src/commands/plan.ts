import { describeCommand } from "../log/summary.js";
import { createBuildPlan, previewPlan, type BuildPlan } from "../plan/build-plan.js";
import type { PreviewStep } from "../types/report.js";
import { openWorkspace, toCommandError, type CommandError, type CommandOptions, type Workspace } from "./context.js";

export type PlanResult =
  | { ok: true; plan: BuildPlan; preview: Map<string, PreviewStep[]> }
  | { ok: false; error: CommandError };

/** Plan a build and evaluate staleness without running anything. */
export async function plan(opts: CommandOptions = {}): Promise<PlanResult> {
  let ws: Workspace;
  let built: BuildPlan;
  try {
    ws = openWorkspace(opts);
    built = createBuildPlan({ manifestDir: ws.source.dir, components: ws.components, patterns: opts.components });
  } catch (e) {
    return { ok: false, error: toCommandError(e) };
  }

  const preview = await previewPlan(built);

  built.waves.forEach((wave, i) => {
    ws.logger.log({ level: "info", code: "PLAN_WAVE", message: `Wave ${i + 1}: ${wave.join(", ")}`, details: { wave: i + 1 } });
  });
  for (const component of built.components) {
    for (const step of preview.get(component.component) ?? []) {
      const verdict = step.verdict.status === "error" ? `error: ${step.verdict.message}` : `${step.verdict.status} (${step.verdict.reason})`;
      ws.logger.log({
        level: step.verdict.status === "error" ? "warn" : "info",
        code: "PLAN_STEP",
        message: `${describeCommand(step.command)} -> ${verdict}`,
        component: component.component,
        step: step.index,
      });
    }
  }
  for (const warning of built.warnings) {
    ws.logger.log({ level: "warn", code: warning.code, message: warning.message, details: warning.details });
  }

  return { ok: true, plan: built, preview };
}
