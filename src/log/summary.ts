import type { ExternalCommand } from "../types/model.js";
import type { BuildReport, ComponentReport, StepStatus } from "../types/report.js";
import type { BuildLogger } from "./logger.js";

export function describeCommand(command: ExternalCommand): string {
  const dir = command.dir === undefined ? "" : ` in ${command.dir}`;
  return command.kind === "incremental" ? `${command.command}${dir} [incremental]` : `${command.command}${dir}`;
}

export function countSteps(component: ComponentReport): Record<StepStatus, number> {
  const counts: Record<StepStatus, number> = { "skipped-fresh": 0, "ran-ok": 0, "ran-failed": 0, error: 0, "not-run": 0 };
  for (const step of component.steps) counts[step.status]++;
  return counts;
}

function describe(component: ComponentReport): string {
  const c = countSteps(component);
  const parts = [`${c["ran-ok"]} ran`, `${c["skipped-fresh"]} up to date`];
  if (c["ran-failed"] + c.error > 0) parts.push(`${c["ran-failed"] + c.error} failed`);
  if (c["not-run"] > 0) parts.push(`${c["not-run"]} not run`);
  const blocked = component.blockedBy ? ` by ${component.blockedBy.join(", ")}` : "";
  return `${component.status}${blocked}: ${parts.join(", ")}`;
}

/** One line per component plus an overall line. */
export function logReport(report: BuildReport, logger: BuildLogger): void {
  for (const component of report.components) {
    logger.log({
      level: component.status === "ok" ? "info" : "error",
      code: "COMPONENT_SUMMARY",
      message: describe(component),
      component: component.component,
      details: { status: component.status, steps: countSteps(component) },
    });
  }

  const failed = report.components.filter((c) => c.status !== "ok").length;
  logger.log(
    report.ok
      ? { level: "info", code: "BUILD_OK", message: `${report.components.length} component(s) up to date` }
      : { level: "error", code: "BUILD_FAILED", message: `${failed} of ${report.components.length} component(s) did not build` },
  );
}
