import { errorMessage } from "../core/errors.js";
import { cleanComponents } from "../exec/clean.js";
import { selectComponents } from "../resolve/select.js";
import type { ResolvedComponent } from "../types/model.js";
import { openWorkspace, toCommandError, type CommandError, type CommandOptions, type Workspace } from "./context.js";

export type CleanResult = { ok: true; removed: string[] } | { ok: false; error: CommandError };

/** Remove generated and built artifacts of the selected components, then the temp dir. */
export async function clean(opts: CommandOptions = {}): Promise<CleanResult> {
  let ws: Workspace;
  let selected: ResolvedComponent[];
  try {
    ws = openWorkspace(opts);
    selected = selectComponents(ws.components, opts.components);
  } catch (e) {
    return { ok: false, error: toCommandError(e) };
  }

  try {
    const removed = await cleanComponents({
      components: selected,
      manifestDir: ws.source.dir,
      tempDir: ws.source.manifest.tempDir,
      logger: ws.logger,
    });
    return { ok: true, removed };
  } catch (e) {
    return { ok: false, error: { kind: "filesystem", code: "CLEAN_FAILED", message: errorMessage(e) } };
  }
}
