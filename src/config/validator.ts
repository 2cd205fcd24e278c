import { ConfigurationError, type Diagnostic } from "../core/errors.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { BuilderConfig } from "../types/config.js";
import { loadConfigTree } from "./loader.js";

export type ConfigValidationResult =
  | { valid: true; config: BuilderConfig }
  | { valid: false; diagnostics: Diagnostic[] };

/** Validate a loaded config tree against `config.schema.json`. */
export function validateConfig(tree: unknown, registry: SchemaRegistry = createRegistry()): ConfigValidationResult {
  const validate = registry.compile<BuilderConfig>("config");
  if (validate(tree)) {
    return { valid: true, config: tree };
  }
  const { diagnostics } = registry.validate("config", tree);
  return { valid: false, diagnostics };
}

/** Load the layered config and validate it; throws ConfigurationError when invalid. */
export function loadConfig(
  opts: { envName?: string; configDir?: string; env?: NodeJS.ProcessEnv; registry?: SchemaRegistry } = {},
): BuilderConfig {
  const res = validateConfig(loadConfigTree(opts), opts.registry);
  if (!res.valid) {
    throw new ConfigurationError(
      "CONFIG_INVALID",
      `Config invalid: ${res.diagnostics.map((d) => d.message).join("; ")}`,
      undefined,
      res.diagnostics,
    );
  }
  return res.config;
}
