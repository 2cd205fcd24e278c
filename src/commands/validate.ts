import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { loadConfigTree } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { BuildError, ConfigurationError, diag, errorMessage, type Diagnostic } from "../core/errors.js";
import { DEFAULT_MANIFEST_FILE } from "../manifest/loader.js";
import { convertManifest } from "../manifest/convert.js";
import { createBuildPlan } from "../plan/build-plan.js";
import { resolveComponents } from "../resolve/resolver.js";
import { createRegistry } from "../schema/registry.js";
import type { CommandOptions } from "./context.js";

export type ValidateResult = { ok: true; warnings: Diagnostic[] } | { ok: false; errors: Diagnostic[]; warnings: Diagnostic[] };

function fromError(e: unknown, file: string): Diagnostic[] {
  if (e instanceof ConfigurationError && e.diagnostics.length > 0) {
    return e.diagnostics.map((d) => ({ ...d, details: { ...d.details, file } }));
  }
  if (e instanceof BuildError) {
    return [{ ...e.toDiagnostic(), details: { file, kind: e.kind } }];
  }
  throw e;
}

/**
 * Validate settings and manifest without running anything: schema, shape
 * conversion, template/profile resolution and the dependency graph. Collects
 * diagnostics instead of stopping at the first configuration problem where
 * the stages are independent.
 */
export function validateAll(opts: CommandOptions = {}): ValidateResult {
  const errors: Diagnostic[] = [];
  const warnings: Diagnostic[] = [];

  const registry = createRegistry(opts.schemaDir);

  let profile = opts.profile;
  try {
    const res = validateConfig(loadConfigTree({ envName: opts.envName, configDir: opts.configDir, env: opts.env }), registry);
    if (res.valid) {
      profile = profile ?? res.config.build.profile;
    } else {
      errors.push(...res.diagnostics.map((d) => ({ ...d, code: "CONFIG_INVALID" })));
    }
  } catch (e) {
    errors.push(...fromError(e, opts.configDir ?? "config"));
  }

  const manifestPath = path.resolve(opts.manifestPath ?? DEFAULT_MANIFEST_FILE);
  if (!fs.existsSync(manifestPath)) {
    errors.push(diag("error", "MANIFEST_MISSING", `Manifest not found: ${manifestPath}`, { path: manifestPath }));
    return { ok: false, errors, warnings };
  }

  let doc: unknown;
  try {
    doc = YAML.parse(fs.readFileSync(manifestPath, "utf8")) ?? {};
  } catch (e) {
    errors.push(diag("error", "MANIFEST_PARSE_FAILED", `Failed to parse manifest: ${errorMessage(e)}`, { path: manifestPath }));
    return { ok: false, errors, warnings };
  }

  const schema = registry.validate("manifest", doc);
  if (!schema.valid) {
    errors.push(...schema.diagnostics.map((d) => ({ ...d, details: { ...d.details, file: manifestPath } })));
    return { ok: false, errors, warnings };
  }

  try {
    const components = resolveComponents(convertManifest(doc), { profile });
    const plan = createBuildPlan({ manifestDir: path.dirname(manifestPath), components, patterns: opts.components });
    warnings.push(...plan.warnings);
  } catch (e) {
    errors.push(...fromError(e, manifestPath));
  }

  return errors.length > 0 ? { ok: false, errors, warnings } : { ok: true, warnings };
}
