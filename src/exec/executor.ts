import pLimit from "p-limit";
import { FilesystemError, StalenessError, errorMessage } from "../core/errors.js";
import type { BuildLogger } from "../log/logger.js";
import type { BuildPlan, ComponentPlan, PlanStep } from "../plan/build-plan.js";
import type { FailurePolicy } from "../types/config.js";
import type { BuildReport, ComponentReport, StepReport } from "../types/report.js";
import { runShellCommand, type CommandResult, type CommandRunner } from "./command.js";
import { prepareDirectories } from "./fs-lifecycle.js";
import { describeVerdict, evaluateStaleness, type StalenessVerdict } from "./staleness.js";

export type ExecutorOptions = {
  /** Upper bound on components building at the same time. */
  maxConcurrency: number;
  /**
   * `stop-dispatch`: after the first failed component no further component is
   * started; running ones finish. `continue`: independent components keep going.
   */
  failurePolicy: FailurePolicy;
  logger: BuildLogger;
  runner?: CommandRunner;
};

function nowIso(): string {
  return new Date().toISOString();
}

function notRun(step: PlanStep): StepReport {
  return { index: step.index, command: step.command.command, status: "not-run" };
}

/**
 * A staleness error stays with its own component; a failed command or
 * filesystem error stops further dispatch under `stop-dispatch`.
 */
function haltsDispatch(report: ComponentReport): boolean {
  return report.steps.some((s) => s.status === "ran-failed" || (s.status === "error" && s.kind === "filesystem"));
}

/**
 * Executes a BuildPlan. Components run on a bounded pool once their ordering
 * predecessors finished ok; the steps of one component run strictly in order
 * and stop at the first failing step.
 */
export class PlanExecutor {
  private readonly runner: CommandRunner;

  constructor(private readonly opts: ExecutorOptions) {
    if (!Number.isInteger(opts.maxConcurrency) || opts.maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${opts.maxConcurrency}`);
    }
    this.runner = opts.runner ?? runShellCommand;
  }

  async execute(plan: BuildPlan): Promise<BuildReport> {
    const startedAt = nowIso();
    const limit = pLimit(this.opts.maxConcurrency);
    const tasks = new Map<string, Promise<ComponentReport>>();
    let halted = false;

    for (const component of plan.components) {
      const predecessors = component.predecessors.flatMap((p) => {
        const task = tasks.get(p);
        return task === undefined ? [] : [task];
      });

      const task = (async (): Promise<ComponentReport> => {
        const unfinished = (await Promise.all(predecessors)).filter((r) => r.status !== "ok").map((r) => r.component);
        if (unfinished.length > 0) {
          this.opts.logger.log({
            level: "warn",
            code: "COMPONENT_BLOCKED",
            message: `Skipped: required component(s) ${unfinished.join(", ")} did not build`,
            component: component.component,
          });
          return { component: component.component, status: "blocked", steps: component.steps.map(notRun), blockedBy: unfinished };
        }

        return limit(async () => {
          if (halted) {
            this.opts.logger.log({
              level: "warn",
              code: "COMPONENT_CANCELLED",
              message: "Not started: an earlier component failed",
              component: component.component,
            });
            return { component: component.component, status: "cancelled", steps: component.steps.map(notRun) };
          }
          const report = await this.runComponent(component);
          if (haltsDispatch(report) && this.opts.failurePolicy === "stop-dispatch") {
            halted = true;
          }
          return report;
        });
      })();

      tasks.set(component.component, task);
    }

    const components = await Promise.all([...tasks.values()]);

    return {
      ok: components.every((c) => c.status === "ok"),
      started_at: startedAt,
      finished_at: nowIso(),
      components,
    };
  }

  private async runComponent(component: ComponentPlan): Promise<ComponentReport> {
    const steps: StepReport[] = [];
    let failed = false;

    for (const step of component.steps) {
      if (failed) {
        steps.push(notRun(step));
        continue;
      }
      const report = await this.runStep(step);
      steps.push(report);
      failed = report.status === "ran-failed" || report.status === "error";
    }

    this.opts.logger.log(
      failed
        ? { level: "error", code: "COMPONENT_FAILED", message: "Build failed", component: component.component }
        : { level: "info", code: "COMPONENT_OK", message: "Done", component: component.component },
    );
    return { component: component.component, status: failed ? "failed" : "ok", steps };
  }

  private async runStep(step: PlanStep): Promise<StepReport> {
    const { logger } = this.opts;
    const command = step.command.command;
    const scope = { component: step.component, step: step.index };

    let verdict: StalenessVerdict;
    try {
      verdict = await evaluateStaleness(step.command, step.cwd);
    } catch (e) {
      const err = e instanceof StalenessError ? e : new StalenessError("STALENESS_CHECK_FAILED", errorMessage(e));
      logger.log({ level: "error", code: err.code, message: err.message, ...scope });
      return { index: step.index, command, status: "error", kind: "staleness", message: err.message };
    }

    if (verdict.status === "fresh") {
      const reason = describeVerdict(verdict);
      logger.log({ level: "info", code: "STEP_FRESH", message: `Skipping ${command}: ${reason}`, ...scope });
      return { index: step.index, command, status: "skipped-fresh", reason };
    }

    try {
      // rmdirs, mkdirs and the command form one unit; nothing else in this
      // component runs in between.
      await prepareDirectories(step.command.rmdirs, step.command.mkdirs, step.cwd);
    } catch (e) {
      const err = e instanceof FilesystemError ? e : new FilesystemError("FS_FAILED", errorMessage(e));
      logger.log({ level: "error", code: err.code, message: err.message, ...scope });
      return { index: step.index, command, status: "error", kind: "filesystem", message: err.message };
    }

    logger.log({
      level: "info",
      code: "STEP_RUN",
      message: `Running ${command} (${describeVerdict(verdict)})`,
      details: { cwd: step.cwd },
      ...scope,
    });

    const started = Date.now();
    let result: CommandResult;
    try {
      result = await this.runner(command, step.cwd, (line, stream) =>
        logger.log({ level: "debug", code: "STEP_OUTPUT", message: line, details: { stream }, ...scope }),
      );
    } catch (e) {
      const message = `Failed to start ${command}: ${errorMessage(e)}`;
      logger.log({ level: "error", code: "STEP_SPAWN_FAILED", message, ...scope });
      return {
        index: step.index,
        command,
        status: "ran-failed",
        duration_ms: Date.now() - started,
        exitCode: null,
        signal: null,
        output: message,
      };
    }
    const duration_ms = Date.now() - started;

    if (result.exitCode === 0) {
      return { index: step.index, command, status: "ran-ok", duration_ms, output: result.output };
    }

    logger.log({
      level: "error",
      code: "STEP_FAILED",
      message: `${command} exited with ${result.exitCode ?? `signal ${result.signal ?? "unknown"}`}`,
      ...scope,
    });
    return {
      index: step.index,
      command,
      status: "ran-failed",
      duration_ms,
      exitCode: result.exitCode,
      signal: result.signal,
      output: result.output,
    };
  }
}
