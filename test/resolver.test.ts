import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/core/errors.js";
import { convertManifest } from "../src/manifest/convert.js";
import { mergeProperties } from "../src/resolve/merge.js";
import { renderString } from "../src/resolve/render.js";
import { resolveComponent, resolveComponents } from "../src/resolve/resolver.js";
import { selectComponents } from "../src/resolve/select.js";
import { component, run } from "./helpers.js";

function failure(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigurationError) return e;
    throw e;
  }
  throw new Error("expected a ConfigurationError");
}

const profiled = convertManifest({
  templates: {
    rust: {
      profiles: {
        debug: {
          componentWasm: "target/debug/{{ componentName }}.wasm",
          build: [{ command: "cargo build -p {{componentName}}" }],
        },
        release: {
          componentWasm: "target/release/{{ componentName }}.wasm",
          build: [{ command: "cargo build --release -p {{componentName}}" }],
        },
      },
      defaultProfile: "debug",
    },
  },
  components: {
    api: { template: "rust" },
    worker: { template: "rust", componentWasm: "custom.wasm" },
  },
});

describe("template resolution", () => {
  it("reproduces the template exactly when the component overrides nothing", () => {
    const manifest = convertManifest({
      templates: {
        plain: {
          sourceWit: "wit",
          generatedWit: "wit-generated",
          build: [{ command: "make", sources: ["src"], targets: ["out.wasm"] }],
          customCommands: { fmt: [{ command: "fmt" }] },
          clean: ["out"],
        },
      },
      components: { a: { template: "plain" } },
    });
    const template = manifest.templates.get("plain");
    const resolved = resolveComponent(manifest, "a");

    expect(template?.kind).toBe("properties");
    if (template?.kind === "properties") {
      expect(resolved.properties).toEqual(template.properties);
    }
    expect(resolved.template).toBe("plain");
    expect(resolved.profile).toBeUndefined();
  });

  it("lets component fields win and takes sequences wholesale", () => {
    const manifest = convertManifest({
      templates: { base: { sourceWit: "wit", linkedWasm: "base.wasm", build: [{ command: "one" }, { command: "two" }] } },
      components: { a: { template: "base", linkedWasm: "a.wasm", build: [{ command: "three" }] } },
    });
    const { properties } = resolveComponent(manifest, "a");
    expect(properties.sourceWit).toBe("wit");
    expect(properties.linkedWasm).toBe("a.wasm");
    expect(properties.build.map((c) => c.command)).toEqual(["three"]);
  });

  it("follows template reference chains", () => {
    const manifest = convertManifest({
      templates: { a: { template: "b" }, b: { template: "c" }, c: { sourceWit: "wit" } },
      components: { x: { template: "a" } },
    });
    const resolved = resolveComponent(manifest, "x");
    expect(resolved.template).toBe("c");
    expect(resolved.properties.sourceWit).toBe("wit");
  });

  it("names the missing template", () => {
    const manifest = convertManifest({ components: { x: { template: "nope" } } });
    const err = failure(() => resolveComponent(manifest, "x"));
    expect(err.code).toBe("UNKNOWN_TEMPLATE");
    expect(err.message).toBe('Component "x" references unknown template "nope"');
  });

  it("rejects reference cycles", () => {
    const manifest = convertManifest({
      templates: { a: { template: "b" }, b: { template: "a" } },
      components: { x: { template: "a" } },
    });
    const err = failure(() => resolveComponent(manifest, "x"));
    expect(err.code).toBe("TEMPLATE_CYCLE");
    expect(err.message).toBe("Template reference cycle: a -> b -> a");
  });

  it("rejects an unknown component name", () => {
    expect(failure(() => resolveComponent(profiled, "nope")).code).toBe("UNKNOWN_COMPONENT");
  });
});

describe("profile selection", () => {
  it("uses defaultProfile when none is requested", () => {
    const resolved = resolveComponent(profiled, "api");
    expect(resolved.profile).toBe("debug");
    expect(resolved.properties.componentWasm).toBe("target/debug/api.wasm");
    expect(resolved.properties.build.map((c) => c.command)).toEqual(["cargo build -p api"]);
  });

  it("uses an explicitly requested profile", () => {
    const resolved = resolveComponent(profiled, "api", { profile: "release" });
    expect(resolved.profile).toBe("release");
    expect(resolved.properties.componentWasm).toBe("target/release/api.wasm");
  });

  it("keeps component overrides across profiles", () => {
    expect(resolveComponent(profiled, "worker", { profile: "release" }).properties.componentWasm).toBe("custom.wasm");
  });

  it("rejects an unknown profile", () => {
    const err = failure(() => resolveComponent(profiled, "api", { profile: "bench" }));
    expect(err.code).toBe("UNKNOWN_PROFILE");
    expect(err.message).toBe('Component "api": profile "bench" is not defined in template "rust" (available: debug, release)');
  });

  it("resolves a profiled component without a template", () => {
    const manifest = convertManifest({
      components: { a: { profiles: { x: { linkedWasm: "x.wasm" }, y: { linkedWasm: "y.wasm" } }, defaultProfile: "y" } },
    });
    expect(resolveComponent(manifest, "a").properties.linkedWasm).toBe("y.wasm");
  });

  it("prefers the component's defaultProfile over the template's", () => {
    const manifest = convertManifest({
      templates: {
        t: { profiles: { debug: { sourceWit: "d" }, release: { sourceWit: "r" } }, defaultProfile: "debug" },
      },
      components: {
        a: { template: "t", profiles: { debug: {}, release: { linkedWasm: "a.wasm" } }, defaultProfile: "release" },
      },
    });
    const resolved = resolveComponent(manifest, "a");
    expect(resolved.profile).toBe("release");
    expect(resolved.properties).toEqual({
      sourceWit: "r",
      linkedWasm: "a.wasm",
      build: [],
      customCommands: {},
      clean: [],
    });
  });
});

describe("resolveComponents", () => {
  it("resolves in declaration order", () => {
    expect(resolveComponents(profiled).map((c) => [c.name, c.index])).toEqual([
      ["api", 0],
      ["worker", 1],
    ]);
  });

  it("rejects dependencies declared for an unknown component", () => {
    const manifest = convertManifest({ components: { a: {} }, dependencies: { b: [{ type: "wasm-rpc", target: "a" }] } });
    expect(failure(() => resolveComponents(manifest)).code).toBe("UNKNOWN_DEPENDENCY_OWNER");
  });
});

describe("mergeProperties", () => {
  it("merges customCommands by name, override first", () => {
    const merged = mergeProperties(
      { customCommands: { fmt: [run("fmt")], lint: [run("lint")] } },
      { customCommands: { fmt: [run("fmt --check")] } },
    );
    expect(merged.customCommands?.fmt?.map((c) => c.command)).toEqual(["fmt --check"]);
    expect(merged.customCommands?.lint?.map((c) => c.command)).toEqual(["lint"]);
  });

  it("is the identity with an empty override", () => {
    const base = { sourceWit: "wit", clean: ["out"] };
    expect(mergeProperties(base, {})).toEqual(base);
  });
});

describe("renderString", () => {
  it("substitutes known placeholders", () => {
    expect(renderString("{{ componentName }}-{{profile}}", { componentName: "api", profile: "debug" }, "t")).toBe(
      "api-debug",
    );
  });

  it("rejects unknown placeholders", () => {
    const err = failure(() => renderString("{{ version }}", { componentName: "api" }, "t"));
    expect(err.code).toBe("UNKNOWN_PLACEHOLDER");
  });
});

describe("selectComponents", () => {
  const all = [component("api-gateway", 0), component("api-users", 1), component("worker", 2)];

  it("selects everything without patterns", () => {
    expect(selectComponents(all).map((c) => c.name)).toEqual(["api-gateway", "api-users", "worker"]);
  });

  it("matches glob patterns and keeps declaration order", () => {
    expect(selectComponents(all, ["worker", "api-*"]).map((c) => c.name)).toEqual([
      "api-gateway",
      "api-users",
      "worker",
    ]);
  });

  it("rejects a pattern matching nothing", () => {
    expect(failure(() => selectComponents(all, ["db"])).code).toBe("NO_COMPONENT_MATCHES");
  });
});
