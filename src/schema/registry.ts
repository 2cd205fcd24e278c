import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { diag, type Diagnostic } from "../core/errors.js";
import type { SchemaObject } from "ajv";
import { loadAjv, type AjvError, type AjvInstance, type AjvValidateFn } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  filePath: string;
  schema: SchemaObject;
};

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Schema registry. Discovers the *.schema.json files of a directory and
 * compiles validators on demand.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private readonly ajv: AjvInstance = loadAjv();

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  load(): void {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs
      .readdirSync(this.schemaDir)
      .filter((f) => f.endsWith(".schema.json"))
      .sort();

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      if (!isSchemaObject(parsed)) {
        throw new Error(`Schema is not an object: ${filePath}`);
      }

      // "manifest.schema.json" → "manifest"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, filePath, schema: parsed });
    }
  }

  /**
   * Compile a validator for the given schema name. Ajv caches compiled schemas
   * per schema object, so repeated calls are cheap.
   */
  compile<T = unknown>(name: string): AjvValidateFn<T> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }
    return this.ajv.compile<T>(entry.schema);
  }

  /**
   * Validate data against a named schema. One diagnostic per Ajv error, located
   * by JSON pointer.
   */
  validate(name: string, data: unknown): { valid: boolean; diagnostics: Diagnostic[] } {
    const validate = this.compile(name);
    if (validate(data)) {
      return { valid: true, diagnostics: [] };
    }
    return { valid: false, diagnostics: (validate.errors ?? []).map((e) => toDiagnostic(name, e)) };
  }
}

function toDiagnostic(schemaName: string, error: AjvError): Diagnostic {
  const pointer = error.instancePath === "" ? "/" : error.instancePath;
  return diag("error", "SCHEMA_VIOLATION", `${schemaName} ${pointer} ${error.message ?? "is invalid"}`, {
    path: pointer,
    details: { keyword: error.keyword, params: error.params },
  });
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Create and load a registry from the default schemas directory. */
export function createRegistry(schemaDir?: string): SchemaRegistry {
  const registry = new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR);
  registry.load();
  return registry;
}
