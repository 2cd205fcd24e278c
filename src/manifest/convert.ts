import { ConfigurationError } from "../core/errors.js";
import {
  DEFAULT_TEMP_DIR,
  type ComponentDefinition,
  type ComponentDependency,
  type ComponentProperties,
  type ExternalCommand,
  type Manifest,
  type ProfilesShape,
  type PropertiesShape,
  type TemplateShape,
} from "../types/model.js";

/*
 * Conversion of an already-parsed manifest document into the typed model.
 * Shape discrimination happens here, independent of schema validation, so a
 * document that is ambiguous between template shapes is rejected at
 * construction time.
 */

type Node = Record<string, unknown>;

const PROPERTY_FIELDS: readonly string[] = [
  "sourceWit",
  "generatedWit",
  "componentWasm",
  "linkedWasm",
  "build",
  "customCommands",
  "clean",
];
const PROFILE_FIELDS: readonly string[] = ["profiles", "defaultProfile"];
const COMMAND_FIELDS: readonly string[] = ["command", "dir", "rmdirs", "mkdirs", "sources", "targets"];
const ROOT_FIELDS: readonly string[] = ["includes", "tempDir", "witDeps", "templates", "components", "dependencies"];
const DEPENDENCY_TYPES: readonly string[] = ["wasm-rpc", "wasm-rpc-static"];

function isNode(value: unknown): value is Node {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pointer(base: string, key: string | number): string {
  const escaped = String(key).replace(/~/g, "~0").replace(/\//g, "~1");
  return `${base}/${escaped}`;
}

function invalid(path: string, message: string): ConfigurationError {
  return new ConfigurationError("MANIFEST_INVALID", `${path || "/"}: ${message}`, path || "/");
}

function expectNode(value: unknown, path: string): Node {
  if (!isNode(value)) throw invalid(path, "expected a mapping");
  return value;
}

function rejectUnknown(node: Node, allowed: readonly string[], path: string): void {
  for (const key of Object.keys(node)) {
    if (!allowed.includes(key)) {
      throw invalid(pointer(path, key), `unknown field "${key}"`);
    }
  }
}

function readString(node: Node, key: string, path: string): string | undefined {
  const value = node[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value.length === 0) {
    throw invalid(pointer(path, key), "expected a non-empty string");
  }
  return value;
}

function readStringList(node: Node, key: string, path: string): string[] | undefined {
  const value = node[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) throw invalid(pointer(path, key), "expected a sequence of strings");
  return value.map((item, i) => {
    if (typeof item !== "string" || item.length === 0) {
      throw invalid(pointer(pointer(path, key), i), "expected a non-empty string");
    }
    return item;
  });
}

function readMapping(node: Node, key: string, path: string): [string, unknown][] {
  const value = node[key];
  if (value === undefined) return [];
  return Object.entries(expectNode(value, pointer(path, key)));
}

export function convertCommand(value: unknown, path: string): ExternalCommand {
  const node = expectNode(value, path);
  rejectUnknown(node, COMMAND_FIELDS, path);

  const command = readString(node, "command", path);
  if (command === undefined) throw invalid(pointer(path, "command"), "missing required field");

  const base = {
    command,
    dir: readString(node, "dir", path),
    rmdirs: readStringList(node, "rmdirs", path) ?? [],
    mkdirs: readStringList(node, "mkdirs", path) ?? [],
  };

  const sources = readStringList(node, "sources", path);
  const targets = readStringList(node, "targets", path);
  if (sources === undefined && targets === undefined) {
    return { kind: "unconditional", ...base };
  }
  if (sources === undefined || targets === undefined) {
    throw invalid(path, "incremental commands need both \"sources\" and \"targets\"");
  }
  return { kind: "incremental", ...base, sources, targets };
}

function convertCommandList(node: Node, key: string, path: string): ExternalCommand[] | undefined {
  const value = node[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) throw invalid(pointer(path, key), "expected a sequence of commands");
  return value.map((item, i) => convertCommand(item, pointer(pointer(path, key), i)));
}

function convertProperties(node: Node, path: string): ComponentProperties {
  const properties: ComponentProperties = {};

  for (const key of ["sourceWit", "generatedWit", "componentWasm", "linkedWasm"] as const) {
    const value = readString(node, key, path);
    if (value !== undefined) properties[key] = value;
  }

  const build = convertCommandList(node, "build", path);
  if (build !== undefined) properties.build = build;

  if (node.customCommands !== undefined) {
    const customPath = pointer(path, "customCommands");
    const custom: Record<string, ExternalCommand[]> = {};
    for (const [name, commands] of readMapping(node, "customCommands", path)) {
      if (!Array.isArray(commands)) throw invalid(pointer(customPath, name), "expected a sequence of commands");
      custom[name] = commands.map((c, i) => convertCommand(c, pointer(pointer(customPath, name), i)));
    }
    properties.customCommands = custom;
  }

  const clean = readStringList(node, "clean", path);
  if (clean !== undefined) properties.clean = clean;

  return properties;
}

function convertProfiles(node: Node, path: string): ProfilesShape {
  const profiles = new Map<string, ComponentProperties>();
  const profilesPath = pointer(path, "profiles");
  for (const [name, value] of readMapping(node, "profiles", path)) {
    const profilePath = pointer(profilesPath, name);
    const profileNode = expectNode(value, profilePath);
    rejectUnknown(profileNode, PROPERTY_FIELDS, profilePath);
    profiles.set(name, convertProperties(profileNode, profilePath));
  }
  if (profiles.size === 0) {
    throw invalid(profilesPath, "at least one profile is required");
  }

  const defaultProfile = readString(node, "defaultProfile", path);
  if (defaultProfile === undefined) {
    throw new ConfigurationError(
      "DEFAULT_PROFILE_MISSING",
      `${path}: profiles are declared without "defaultProfile"`,
      pointer(path, "defaultProfile"),
    );
  }
  if (!profiles.has(defaultProfile)) {
    throw new ConfigurationError(
      "DEFAULT_PROFILE_UNKNOWN",
      `${path}: defaultProfile "${defaultProfile}" is not one of the declared profiles (${[...profiles.keys()].join(", ")})`,
      pointer(path, "defaultProfile"),
    );
  }

  return { kind: "profiles", profiles, defaultProfile };
}

type ShapeFields = { template: boolean; properties: string[]; profiles: string[] };

function shapeFields(node: Node): ShapeFields {
  const keys = Object.keys(node);
  return {
    template: keys.includes("template"),
    properties: keys.filter((k) => PROPERTY_FIELDS.includes(k)),
    profiles: keys.filter((k) => PROFILE_FIELDS.includes(k)),
  };
}

function ambiguous(path: string, fields: ShapeFields): ConfigurationError {
  return new ConfigurationError(
    "AMBIGUOUS_SHAPE",
    `${path}: ambiguous shape, both property fields (${fields.properties.join(", ")}) and profile fields (${fields.profiles.join(", ")}) are present`,
    path,
  );
}

function convertBody(node: Node, fields: ShapeFields, path: string): PropertiesShape | ProfilesShape {
  if (fields.profiles.length > 0) {
    return convertProfiles(node, path);
  }
  return { kind: "properties", properties: convertProperties(node, path) };
}

/** TemplateRef, ComponentProperties or ComponentProfiles; exactly one. */
export function convertTemplate(value: unknown, path: string): TemplateShape {
  const node = expectNode(value, path);
  rejectUnknown(node, [...PROPERTY_FIELDS, ...PROFILE_FIELDS, "template"], path);

  const fields = shapeFields(node);
  if (fields.properties.length > 0 && fields.profiles.length > 0) throw ambiguous(path, fields);

  if (fields.template) {
    if (fields.properties.length > 0 || fields.profiles.length > 0) {
      throw new ConfigurationError(
        "AMBIGUOUS_SHAPE",
        `${path}: a template reference cannot be combined with ${[...fields.properties, ...fields.profiles].join(", ")}`,
        path,
      );
    }
    const template = readString(node, "template", path);
    if (template === undefined) throw invalid(pointer(path, "template"), "expected a template name");
    return { kind: "ref", template };
  }

  return convertBody(node, fields, path);
}

/** Same shapes as a template, plus an optional `template` to inherit from. */
export function convertComponent(value: unknown, path: string): ComponentDefinition {
  const node = expectNode(value, path);
  rejectUnknown(node, [...PROPERTY_FIELDS, ...PROFILE_FIELDS, "template"], path);

  const fields = shapeFields(node);
  if (fields.properties.length > 0 && fields.profiles.length > 0) throw ambiguous(path, fields);

  const template = readString(node, "template", path);
  if (template !== undefined && fields.properties.length === 0 && fields.profiles.length === 0) {
    return { kind: "ref", template };
  }

  const body = convertBody(node, fields, path);
  return template === undefined ? body : { ...body, template };
}

export function convertDependency(value: unknown, path: string): ComponentDependency {
  const node = expectNode(value, path);
  rejectUnknown(node, ["type", "target"], path);

  const type = readString(node, "type", path);
  if (type === undefined || !DEPENDENCY_TYPES.includes(type)) {
    throw invalid(pointer(path, "type"), `expected one of ${DEPENDENCY_TYPES.join(", ")}`);
  }
  const target = readString(node, "target", path);
  if (target === undefined) throw invalid(pointer(path, "target"), "missing required field");

  return { type: type === "wasm-rpc-static" ? "wasm-rpc-static" : "wasm-rpc", target };
}

/**
 * Convert a parsed manifest document into the typed model. Mapping order is
 * preserved; it is the declaration order used for deterministic planning.
 */
export function convertManifest(value: unknown): Manifest {
  const root = expectNode(value, "");
  rejectUnknown(root, ROOT_FIELDS, "");

  const templates = new Map<string, TemplateShape>();
  for (const [name, template] of readMapping(root, "templates", "")) {
    templates.set(name, convertTemplate(template, pointer("/templates", name)));
  }

  const components = new Map<string, ComponentDefinition>();
  for (const [name, component] of readMapping(root, "components", "")) {
    components.set(name, convertComponent(component, pointer("/components", name)));
  }

  const dependencies = new Map<string, ComponentDependency[]>();
  for (const [name, deps] of readMapping(root, "dependencies", "")) {
    const depsPath = pointer("/dependencies", name);
    if (!Array.isArray(deps)) throw invalid(depsPath, "expected a sequence of dependencies");
    dependencies.set(
      name,
      deps.map((d, i) => convertDependency(d, pointer(depsPath, i))),
    );
  }

  return {
    includes: readStringList(root, "includes", "") ?? [],
    tempDir: readString(root, "tempDir", "") ?? DEFAULT_TEMP_DIR,
    witDeps: readStringList(root, "witDeps", "") ?? [],
    templates,
    components,
    dependencies,
  };
}
