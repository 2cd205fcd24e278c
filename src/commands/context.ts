import path from "node:path";
import { loadConfig } from "../config/validator.js";
import { BuildError, ConfigurationError, type Diagnostic, type ErrorKind } from "../core/errors.js";
import type { CommandRunner } from "../exec/command.js";
import { createLogger, type BuildLogger } from "../log/logger.js";
import { DEFAULT_MANIFEST_FILE, loadManifestFile } from "../manifest/loader.js";
import { resolveComponents } from "../resolve/resolver.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { BuilderConfig, FailurePolicy, OutputFormat } from "../types/config.js";
import type { ManifestSource, ResolvedComponent } from "../types/model.js";

/** Options shared by every command. CLI flags win over configuration. */
export type CommandOptions = {
  manifestPath?: string;
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  profile?: string;
  components?: string[];
  format?: OutputFormat;
  verbose?: boolean;
  maxConcurrency?: number;
  failurePolicy?: FailurePolicy;
  logger?: BuildLogger;
  runner?: CommandRunner;
  schemaDir?: string;
};

export type CommandError = {
  kind: ErrorKind;
  code: string;
  message: string;
  diagnostics?: Diagnostic[];
};

export type Workspace = {
  config: BuilderConfig;
  source: ManifestSource;
  components: ResolvedComponent[];
  logger: BuildLogger;
  registry: SchemaRegistry;
};

/**
 * Load settings and manifest and resolve every component. Everything here is
 * side-effect free; errors are ConfigurationError.
 */
export function openWorkspace(opts: CommandOptions): Workspace {
  const registry = createRegistry(opts.schemaDir);
  const config = loadConfig({ envName: opts.envName, configDir: opts.configDir, env: opts.env, registry });

  const logger =
    opts.logger ??
    createLogger({ format: opts.format ?? config.output.format, verbose: opts.verbose ?? config.output.verbose });

  const manifestPath = path.resolve(opts.manifestPath ?? DEFAULT_MANIFEST_FILE);
  const source = loadManifestFile(manifestPath, registry);
  const components = resolveComponents(source.manifest, { profile: opts.profile ?? config.build.profile });

  return { config, source, components, logger, registry };
}

/** Map a deliberate BuildError to a command failure; anything else propagates. */
export function toCommandError(e: unknown): CommandError {
  if (!(e instanceof BuildError)) throw e;
  if (e instanceof ConfigurationError && e.diagnostics.length > 0) {
    return { kind: e.kind, code: e.code, message: e.message, diagnostics: e.diagnostics };
  }
  return { kind: e.kind, code: e.code, message: e.message };
}
