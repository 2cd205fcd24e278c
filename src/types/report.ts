import type { ExternalCommand } from "./model.js";

export type StepStatus = "skipped-fresh" | "ran-ok" | "ran-failed" | "error" | "not-run";

export type StepReport =
  | { index: number; command: string; status: "skipped-fresh"; reason: string }
  | { index: number; command: string; status: "ran-ok"; duration_ms: number; output: string }
  | {
      index: number;
      command: string;
      status: "ran-failed";
      duration_ms: number;
      exitCode: number | null;
      signal: string | null;
      output: string;
    }
  | { index: number; command: string; status: "error"; kind: "staleness" | "filesystem"; message: string }
  | { index: number; command: string; status: "not-run" };

export type ComponentStatus = "ok" | "failed" | "cancelled" | "blocked";

export type ComponentReport = {
  component: string;
  status: ComponentStatus;
  steps: StepReport[];
  /** Set for `blocked` components: the ordering predecessors that did not finish ok. */
  blockedBy?: string[];
};

export type BuildReport = {
  ok: boolean;
  started_at: string;
  finished_at: string;
  components: ComponentReport[];
};

/** Preview verdict attached to a plan step without running it. */
export type PreviewVerdict =
  | { status: "stale"; reason: string }
  | { status: "fresh"; reason: string }
  | { status: "error"; message: string };

export type PreviewStep = {
  index: number;
  command: ExternalCommand;
  verdict: PreviewVerdict;
};
