import path from "node:path";
import type { BuildLogger } from "../log/logger.js";
import type { ResolvedComponent } from "../types/model.js";
import { removePaths } from "./fs-lifecycle.js";
import { expandPatterns } from "./glob.js";

/**
 * Everything `clean` removes for one component: generated interface, both
 * wasm artifacts, the extra `clean` entries and whatever the targets of its
 * incremental build steps currently match. Absolute, de-duplicated, in that
 * order.
 */
export async function cleanTargets(component: ResolvedComponent, manifestDir: string): Promise<string[]> {
  const { properties } = component;
  const paths = [properties.generatedWit, properties.componentWasm, properties.linkedWasm, ...properties.clean]
    .filter((p): p is string => p !== undefined)
    .map((p) => path.resolve(manifestDir, p));

  for (const command of properties.build) {
    if (command.kind !== "incremental") continue;
    const cwd = path.resolve(manifestDir, command.dir ?? ".");
    for (const match of await expandPatterns(command.targets, cwd)) {
      paths.push(...match.paths);
    }
  }

  return [...new Set(paths)];
}

/** Remove the clean targets of every component, then the temp dir. */
export async function cleanComponents(opts: {
  components: readonly ResolvedComponent[];
  manifestDir: string;
  tempDir: string;
  logger: BuildLogger;
}): Promise<string[]> {
  const removed: string[] = [];
  for (const component of opts.components) {
    const targets = await cleanTargets(component, opts.manifestDir);
    for (const target of await removePaths(targets, opts.manifestDir)) {
      opts.logger.log({ level: "info", code: "CLEAN_REMOVED", message: `Removed ${target}`, component: component.name });
      removed.push(target);
    }
  }

  const [tempDir] = await removePaths([opts.tempDir], opts.manifestDir);
  opts.logger.log({ level: "info", code: "CLEAN_REMOVED", message: `Removed ${tempDir}` });
  removed.push(tempDir);

  return removed;
}
