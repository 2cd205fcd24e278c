import { PlanExecutor } from "../exec/executor.js";
import type { BuildLogger } from "../log/logger.js";
import { logReport } from "../log/summary.js";
import { createBuildPlan, createCustomCommandPlan, type BuildPlan } from "../plan/build-plan.js";
import type { BuildReport } from "../types/report.js";
import { openWorkspace, toCommandError, type CommandError, type CommandOptions, type Workspace } from "./context.js";

export type BuildResult =
  | { ok: true; plan: BuildPlan; report: BuildReport }
  | { ok: false; error: CommandError; plan?: BuildPlan; report?: BuildReport };

function logPlan(plan: BuildPlan, logger: BuildLogger): void {
  for (const warning of plan.warnings) {
    logger.log({ level: "warn", code: warning.code, message: warning.message, details: warning.details });
  }
  for (const cycle of plan.cycles) {
    logger.log({
      level: "info",
      code: "RPC_CYCLE",
      message: `Cyclic RPC dependencies ${cycle.join(", ")} are satisfied by interface stubs`,
    });
  }
  logger.log({
    level: "info",
    code: "PLAN",
    message: `Build order: ${plan.waves.map((w) => w.join(" | ")).join(" -> ") || "(nothing to build)"}`,
  });
}

async function execute(ws: Workspace, plan: BuildPlan, opts: CommandOptions): Promise<BuildResult> {
  logPlan(plan, ws.logger);

  const executor = new PlanExecutor({
    maxConcurrency: opts.maxConcurrency ?? ws.config.build.max_concurrency,
    failurePolicy: opts.failurePolicy ?? ws.config.build.failure_policy,
    logger: ws.logger,
    runner: opts.runner,
  });
  const report = await executor.execute(plan);
  logReport(report, ws.logger);

  if (!report.ok) {
    const failed = report.components.filter((c) => c.status !== "ok").map((c) => `${c.component} (${c.status})`);
    return {
      ok: false,
      plan,
      report,
      error: { kind: "execution", code: "BUILD_FAILED", message: `Not all components built: ${failed.join(", ")}` },
    };
  }
  return { ok: true, plan, report };
}

/**
 * Resolve, plan and run the `build` sequences of the selected components.
 * Configuration and planning errors are returned before anything runs.
 */
export async function build(opts: CommandOptions = {}): Promise<BuildResult> {
  let ws: Workspace;
  let plan: BuildPlan;
  try {
    ws = openWorkspace(opts);
    plan = createBuildPlan({ manifestDir: ws.source.dir, components: ws.components, patterns: opts.components });
  } catch (e) {
    return { ok: false, error: toCommandError(e) };
  }
  return execute(ws, plan, opts);
}

/** Run `customCommands[name]` of every selected component defining it. */
export async function runCustomCommand(name: string, opts: CommandOptions = {}): Promise<BuildResult> {
  let ws: Workspace;
  let plan: BuildPlan;
  try {
    ws = openWorkspace(opts);
    plan = createCustomCommandPlan({ manifestDir: ws.source.dir, components: ws.components, patterns: opts.components, name });
  } catch (e) {
    return { ok: false, error: toCommandError(e) };
  }
  return execute(ws, plan, opts);
}
