import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigurationError } from "../core/errors.js";

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "WAB_";

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two config trees. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isTree(val) && isTree(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed tree, or an empty tree if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isTree(parsed)) {
    throw new ConfigurationError("CONFIG_NOT_A_MAPPING", `Config file is not a mapping: ${filePath}`, filePath);
  }
  return parsed;
}

/**
 * Apply WAB_ prefixed environment overrides. `__` separates nesting levels and
 * values are read as YAML scalars: WAB_BUILD__MAX_CONCURRENCY=8 → build.max_concurrency = 8.
 */
export function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let override: ConfigTree = {};
    const leaf: unknown = YAML.parse(value);
    override[segments[segments.length - 1]] = leaf;
    for (let i = segments.length - 2; i >= 0; i--) {
      override = { [segments[i]]: override };
    }
    result = deepMerge(result, override);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← <envName>.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateConfig`.
 */
export function loadConfigTree(opts: { envName?: string; configDir?: string; env?: NodeJS.ProcessEnv } = {}): ConfigTree {
  const dir = opts.configDir ?? DEFAULT_CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));

  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }

  return applyEnvOverrides(merged, opts.env);
}
