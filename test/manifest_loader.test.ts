import { afterEach, beforeEach, describe, expect, it } from "vitest";
import path from "node:path";
import { ConfigurationError } from "../src/core/errors.js";
import { loadManifestFile, parseManifestText } from "../src/manifest/loader.js";
import { createRegistry } from "../src/schema/registry.js";
import { makeTempDir, removeDir, writeFiles } from "./helpers.js";

const registry = createRegistry();

function failure(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigurationError) return e;
    throw e;
  }
  throw new Error("expected a ConfigurationError");
}

describe("manifest loader", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir("wab-manifest-");
  });

  afterEach(() => {
    removeDir(tmpDir);
  });

  it("loads a manifest and anchors it to its directory", () => {
    writeFiles(tmpDir, {
      "wab.yaml": [
        "tempDir: build-temp",
        "components:",
        "  api:",
        "    build:",
        "      - command: make",
        "        sources: [src]",
        "        targets: [out/api.wasm]",
        "",
      ].join("\n"),
    });

    const source = loadManifestFile(path.join(tmpDir, "wab.yaml"), registry);
    expect(source.dir).toBe(tmpDir);
    expect(source.path).toBe(path.join(tmpDir, "wab.yaml"));
    expect(source.manifest.tempDir).toBe("build-temp");
    const api = source.manifest.components.get("api");
    expect(api?.kind).toBe("properties");
  });

  it("treats an empty document as an empty application", () => {
    const source = parseManifestText("", path.join(tmpDir, "wab.yaml"), registry);
    expect(source.manifest.components.size).toBe(0);
    expect(source.manifest.tempDir).toBe("golem-temp");
  });

  it("reports a missing file", () => {
    expect(failure(() => loadManifestFile(path.join(tmpDir, "nope.yaml"), registry)).code).toBe("MANIFEST_MISSING");
  });

  it("reports YAML syntax errors", () => {
    expect(failure(() => parseManifestText("components: [", "wab.yaml", registry)).code).toBe("MANIFEST_PARSE_FAILED");
  });

  it("reports schema violations with pointers", () => {
    const err = failure(() => parseManifestText("components: {}\nunknown: 1\n", "wab.yaml", registry));
    expect(err.code).toBe("MANIFEST_SCHEMA_INVALID");
    expect(err.diagnostics[0]).toMatchObject({ code: "SCHEMA_VIOLATION", path: "/" });
    expect(err.diagnostics[0].details).toMatchObject({ keyword: "additionalProperties" });
  });

  it("rejects a command with sources but no targets at schema level", () => {
    const text = ["components:", "  a:", "    build:", "      - command: x", "        sources: [s]", ""].join("\n");
    expect(failure(() => parseManifestText(text, "wab.yaml", registry)).code).toBe("MANIFEST_SCHEMA_INVALID");
  });
});
