/**
 * Typed application model. Every polymorphic document node is a tagged union,
 * so consumers match on `kind` / `type` instead of probing fields.
 */

export const DEFAULT_TEMP_DIR = "golem-temp";

type CommandBase = {
  command: string;
  dir?: string;
  rmdirs: readonly string[];
  mkdirs: readonly string[];
};

/** Always runs. */
export type UnconditionalCommand = CommandBase & { kind: "unconditional" };

/** Runs only when its targets are missing or older than its sources. */
export type IncrementalCommand = CommandBase & {
  kind: "incremental";
  sources: readonly string[];
  targets: readonly string[];
};

export type ExternalCommand = UnconditionalCommand | IncrementalCommand;

export type ComponentProperties = {
  sourceWit?: string;
  generatedWit?: string;
  componentWasm?: string;
  linkedWasm?: string;
  build?: readonly ExternalCommand[];
  customCommands?: Readonly<Record<string, readonly ExternalCommand[]>>;
  clean?: readonly string[];
};

export type TemplateRef = { kind: "ref"; template: string };
export type PropertiesShape = { kind: "properties"; properties: ComponentProperties };
export type ProfilesShape = {
  kind: "profiles";
  profiles: ReadonlyMap<string, ComponentProperties>;
  defaultProfile: string;
};

export type TemplateShape = TemplateRef | PropertiesShape | ProfilesShape;

/**
 * A component is one of the template shapes; properties and profiles shapes may
 * additionally name a template to inherit from. A ref-shaped component is a bare
 * `{ template }` document.
 */
export type ComponentDefinition =
  | TemplateRef
  | ((PropertiesShape | ProfilesShape) & { template?: string });

/**
 * `wasm-rpc` needs only the target's interface; `wasm-rpc-static` links the
 * target's built component and therefore orders the build.
 */
export type DependencyType = "wasm-rpc" | "wasm-rpc-static";

export type ComponentDependency = { type: DependencyType; target: string };

export type Manifest = {
  includes: readonly string[];
  tempDir: string;
  witDeps: readonly string[];
  templates: ReadonlyMap<string, TemplateShape>;
  components: ReadonlyMap<string, ComponentDefinition>;
  dependencies: ReadonlyMap<string, readonly ComponentDependency[]>;
};

/** A manifest plus the directory every relative path in it is anchored to. */
export type ManifestSource = {
  manifest: Manifest;
  dir: string;
  path?: string;
};

/** Fully merged build configuration of one component. */
export type ResolvedProperties = {
  sourceWit?: string;
  generatedWit?: string;
  componentWasm?: string;
  linkedWasm?: string;
  build: readonly ExternalCommand[];
  customCommands: Readonly<Record<string, readonly ExternalCommand[]>>;
  clean: readonly string[];
};

export type ResolvedComponent = {
  name: string;
  /** Position in the manifest's `components` mapping; used for tie-breaking. */
  index: number;
  template?: string;
  profile?: string;
  properties: ResolvedProperties;
  dependencies: readonly ComponentDependency[];
};
