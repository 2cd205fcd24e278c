import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { ManifestSource } from "../types/model.js";
import { convertManifest } from "./convert.js";

export const DEFAULT_MANIFEST_FILE = "wab.yaml";

/** Parse manifest text, validate it against `manifest.schema.json` and convert it. */
export function parseManifestText(text: string, filePath: string, registry: SchemaRegistry = createRegistry()): ManifestSource {
  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (e) {
    throw new ConfigurationError("MANIFEST_PARSE_FAILED", `Failed to parse manifest (${filePath}): ${errorMessage(e)}`, filePath);
  }

  // An empty document is an empty application.
  const raw = doc ?? {};
  const { valid, diagnostics } = registry.validate("manifest", raw);
  if (!valid) {
    throw new ConfigurationError(
      "MANIFEST_SCHEMA_INVALID",
      `Manifest invalid (${filePath}): ${diagnostics.map((d) => d.message).join("; ")}`,
      filePath,
      diagnostics,
    );
  }

  const resolvedPath = path.resolve(filePath);
  return { manifest: convertManifest(raw), dir: path.dirname(resolvedPath), path: resolvedPath };
}

/** Read a manifest file from disk. */
export function loadManifestFile(filePath: string, registry?: SchemaRegistry): ManifestSource {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError("MANIFEST_MISSING", `Manifest not found: ${filePath}`, filePath);
  }
  return parseManifestText(fs.readFileSync(filePath, "utf8"), filePath, registry);
}
