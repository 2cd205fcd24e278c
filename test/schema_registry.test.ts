import { describe, expect, it, beforeAll } from "vitest";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { SchemaRegistry, createRegistry } from "../src/schema/registry.js";

const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../schemas");

describe("schema registry", () => {
  let registry: SchemaRegistry;

  beforeAll(() => {
    registry = createRegistry(SCHEMA_DIR);
  });

  it("discovers all schema files", () => {
    expect(typeof registry.compile("config")).toBe("function");
    expect(typeof registry.compile("manifest")).toBe("function");
  });

  it("fails on a missing schema directory", () => {
    expect(() => createRegistry(path.join(SCHEMA_DIR, "missing"))).toThrow("Schema directory not found");
  });

  it("fails on an unknown schema name", () => {
    expect(() => registry.compile("freeze")).toThrow("Schema not found: freeze");
  });

  describe("manifest schema", () => {
    it("accepts every component shape", () => {
      const { valid } = registry.validate("manifest", {
        includes: ["components/*/wab.yaml"],
        witDeps: ["wit/deps"],
        templates: {
          rust: {
            profiles: {
              debug: { build: [{ command: "cargo build" }] },
              release: { build: [{ command: "cargo build --release" }] },
            },
            defaultProfile: "debug",
          },
          alias: { template: "rust" },
        },
        components: {
          a: { template: "alias" },
          b: { template: "rust", linkedWasm: "out/b.wasm" },
          c: { profiles: { only: { clean: ["tmp"] } }, defaultProfile: "only" },
        },
        dependencies: { a: [{ type: "wasm-rpc", target: "b" }] },
      });
      expect(valid).toBe(true);
    });

    it("rejects a component mixing properties and profiles", () => {
      const { valid } = registry.validate("manifest", {
        components: { a: { sourceWit: "wit", profiles: { x: {} }, defaultProfile: "x" } },
      });
      expect(valid).toBe(false);
    });

    it("rejects a profiles node without defaultProfile", () => {
      const { valid, diagnostics } = registry.validate("manifest", {
        templates: { t: { profiles: { x: {} } } },
      });
      expect(valid).toBe(false);
      expect(diagnostics.every((d) => d.code === "SCHEMA_VIOLATION")).toBe(true);
    });

    it("rejects unknown dependency types", () => {
      const { valid, diagnostics } = registry.validate("manifest", {
        dependencies: { a: [{ type: "http", target: "b" }] },
      });
      expect(valid).toBe(false);
      expect(diagnostics.map((d) => d.path)).toEqual(["/dependencies/a/0/type"]);
    });
  });

  describe("config schema", () => {
    it("rejects a zero concurrency bound", () => {
      const { valid, diagnostics } = registry.validate("config", {
        schema_version: "1.0.0",
        build: { max_concurrency: 0, failure_policy: "continue" },
        output: { format: "human", verbose: false },
      });
      expect(valid).toBe(false);
      expect(diagnostics[0].message).toBe("config /build/max_concurrency must be >= 1");
    });
  });
});
