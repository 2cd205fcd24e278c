import { afterEach, beforeEach, describe, expect, it } from "vitest";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigurationError } from "../src/core/errors.js";
import { applyEnvOverrides, deepMerge, loadConfigTree } from "../src/config/loader.js";
import { loadConfig, validateConfig } from "../src/config/validator.js";
import { makeTempDir, removeDir, writeFiles } from "./helpers.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../config");

describe("config loader", () => {
  it("loads base config with all required fields", () => {
    const config = loadConfig({ configDir: CONFIG_DIR, env: {} });
    expect(config).toEqual({
      schema_version: "1.0.0",
      build: { max_concurrency: 4, failure_policy: "stop-dispatch" },
      output: { format: "human", verbose: false },
    });
  });

  it("merges env-specific config over base", () => {
    const config = loadConfig({ envName: "ci", configDir: CONFIG_DIR, env: {} });
    expect(config.build).toEqual({ max_concurrency: 2, failure_policy: "continue" });
    expect(config.output).toEqual({ format: "jsonl", verbose: true });
    expect(config.schema_version).toBe("1.0.0");
  });

  it("applies environment variable overrides as YAML scalars", () => {
    const config = loadConfig({
      configDir: CONFIG_DIR,
      env: { WAB_BUILD__MAX_CONCURRENCY: "8", WAB_OUTPUT__VERBOSE: "true", WAB_BUILD__PROFILE: "release" },
    });
    expect(config.build.max_concurrency).toBe(8);
    expect(config.build.profile).toBe("release");
    expect(config.output.verbose).toBe(true);
  });

  it("env vars override env-specific yaml", () => {
    const config = loadConfig({ envName: "ci", configDir: CONFIG_DIR, env: { WAB_BUILD__MAX_CONCURRENCY: "16" } });
    expect(config.build.max_concurrency).toBe(16);
  });

  it("returns base config when env yaml does not exist", () => {
    const config = loadConfig({ envName: "nonexistent-env", configDir: CONFIG_DIR, env: {} });
    expect(config.build.max_concurrency).toBe(4);
  });

  it("ignores variables without the prefix", () => {
    expect(applyEnvOverrides({ a: 1 }, { BUILD__MAX_CONCURRENCY: "3", WAB_: "x" })).toEqual({ a: 1 });
  });

  it("replaces arrays instead of merging them", () => {
    expect(deepMerge({ a: [1, 2], b: { c: 1, d: 2 } }, { a: [3], b: { d: 4 } })).toEqual({ a: [3], b: { c: 1, d: 4 } });
  });
});

describe("config validator", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir("wab-config-");
  });

  afterEach(() => {
    removeDir(tmpDir);
  });

  it("rejects an unknown failure policy", () => {
    const res = validateConfig({
      schema_version: "1.0.0",
      build: { max_concurrency: 1, failure_policy: "abort" },
      output: { format: "human", verbose: false },
    });
    expect(res.valid).toBe(false);
    if (!res.valid) expect(res.diagnostics.map((d) => d.path)).toEqual(["/build/failure_policy"]);
  });

  it("throws CONFIG_INVALID from loadConfig", () => {
    writeFiles(tmpDir, { "base.yaml": "schema_version: '1.0.0'\n" });
    try {
      loadConfig({ configDir: tmpDir, env: {} });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError);
      if (e instanceof ConfigurationError) {
        expect(e.code).toBe("CONFIG_INVALID");
        expect(e.diagnostics).toHaveLength(2);
      }
    }
  });

  it("rejects a config file that is not a mapping", () => {
    writeFiles(tmpDir, { "base.yaml": "- 1\n- 2\n" });
    expect(() => loadConfigTree({ configDir: tmpDir, env: {} })).toThrow("Config file is not a mapping");
  });
});
