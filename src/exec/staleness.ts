import fs from "node:fs/promises";
import path from "node:path";
import { StalenessError } from "../core/errors.js";
import type { ExternalCommand, IncrementalCommand } from "../types/model.js";
import { expandPatterns } from "./glob.js";

export type StalenessVerdict =
  | { status: "stale"; reason: "unconditional" }
  | { status: "stale"; reason: "no-targets" }
  | { status: "stale"; reason: "missing-target"; target: string }
  | { status: "stale"; reason: "outdated"; newestSource: string; oldestTarget: string }
  | { status: "fresh"; newestSource?: string; oldestTarget: string };

type Timestamped = { path: string; mtimeMs: number };

async function statAll(paths: readonly string[]): Promise<Timestamped[]> {
  return Promise.all(paths.map(async (p) => ({ path: p, mtimeMs: (await fs.stat(p)).mtimeMs })));
}

function extreme(entries: readonly Timestamped[], pick: (a: number, b: number) => boolean): Timestamped | undefined {
  let best: Timestamped | undefined;
  for (const e of entries) {
    if (best === undefined || pick(e.mtimeMs, best.mtimeMs)) best = e;
  }
  return best;
}

async function evaluateIncremental(command: IncrementalCommand, cwd: string): Promise<StalenessVerdict> {
  const sources = await expandPatterns(command.sources, cwd);
  const missingSource = sources.find((s) => s.paths.length === 0);
  if (missingSource !== undefined) {
    throw new StalenessError(
      "SOURCE_NOT_FOUND",
      `Source "${missingSource.pattern}" matches nothing in ${cwd}`,
      path.resolve(cwd, missingSource.pattern),
    );
  }

  const targets = await expandPatterns(command.targets, cwd);
  const missingTarget = targets.find((t) => t.paths.length === 0);
  if (missingTarget !== undefined) {
    return { status: "stale", reason: "missing-target", target: missingTarget.pattern };
  }

  const oldest = extreme(await statAll(targets.flatMap((t) => t.paths)), (a, b) => a < b);
  if (oldest === undefined) {
    return { status: "stale", reason: "no-targets" };
  }
  const newest = extreme(await statAll(sources.flatMap((s) => s.paths)), (a, b) => a > b);
  if (newest === undefined) {
    return { status: "fresh", oldestTarget: oldest.path };
  }

  if (newest.mtimeMs > oldest.mtimeMs) {
    return { status: "stale", reason: "outdated", newestSource: newest.path, oldestTarget: oldest.path };
  }
  return { status: "fresh", newestSource: newest.path, oldestTarget: oldest.path };
}

/**
 * Decide whether a step has to run. Unconditional commands are always stale.
 * For incremental commands a source pattern matching nothing raises
 * StalenessError; otherwise the step is stale when a target is missing or the
 * newest source is newer than the oldest target.
 */
export async function evaluateStaleness(command: ExternalCommand, cwd: string): Promise<StalenessVerdict> {
  switch (command.kind) {
    case "unconditional":
      return { status: "stale", reason: "unconditional" };
    case "incremental":
      return evaluateIncremental(command, cwd);
  }
}

export function describeVerdict(verdict: StalenessVerdict): string {
  if (verdict.status === "fresh") {
    return verdict.newestSource === undefined
      ? "up to date"
      : `up to date (${verdict.oldestTarget} is not older than ${verdict.newestSource})`;
  }
  switch (verdict.reason) {
    case "unconditional":
      return "unconditional";
    case "no-targets":
      return "no targets declared";
    case "missing-target":
      return `target ${verdict.target} is missing`;
    case "outdated":
      return `${verdict.newestSource} is newer than ${verdict.oldestTarget}`;
  }
}
