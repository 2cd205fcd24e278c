import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ComponentDependency, ExternalCommand, ResolvedComponent, ResolvedProperties } from "../src/types/model.js";

export function makeTempDir(prefix = "wab-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Write files relative to `root`, creating parent directories. */
export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const file = path.join(root, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }
}

/** Set both atime and mtime to `seconds` since the epoch. */
export function setMtime(file: string, seconds: number): void {
  fs.utimesSync(file, seconds, seconds);
}

export function run(command: string, dir?: string): ExternalCommand {
  return { kind: "unconditional", command, dir, rmdirs: [], mkdirs: [] };
}

export function incremental(command: string, sources: string[], targets: string[]): ExternalCommand {
  return { kind: "incremental", command, rmdirs: [], mkdirs: [], sources, targets };
}

export function component(
  name: string,
  index: number,
  opts: { properties?: Partial<ResolvedProperties>; dependencies?: ComponentDependency[] } = {},
): ResolvedComponent {
  return {
    name,
    index,
    properties: { build: [], customCommands: {}, clean: [], ...opts.properties },
    dependencies: opts.dependencies ?? [],
  };
}
