export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">
): Diagnostic {
  return { level, code, message, ...extra };
}

export type ErrorKind = "configuration" | "planning" | "staleness" | "execution" | "filesystem";

/**
 * Base class of every error the builder raises on purpose. `code` is stable and
 * machine-readable; `path` is a manifest pointer or a filesystem path.
 */
export class BuildError extends Error {
  readonly kind: ErrorKind;
  readonly code: string;
  readonly path?: string;

  constructor(kind: ErrorKind, code: string, message: string, path?: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
    this.path = path;
  }

  toDiagnostic(): Diagnostic {
    return diag("error", this.code, this.message, this.path === undefined ? undefined : { path: this.path });
  }
}

/** Invalid manifest or settings; raised before any side effect. */
export class ConfigurationError extends BuildError {
  readonly diagnostics: Diagnostic[];

  constructor(code: string, message: string, path?: string, diagnostics?: Diagnostic[]) {
    super("configuration", code, message, path);
    this.diagnostics = diagnostics ?? [];
  }
}

/** Dependency graph cannot be turned into a plan; raised before any side effect. */
export class PlanningError extends BuildError {
  constructor(code: string, message: string, path?: string) {
    super("planning", code, message, path);
  }
}

/** Staleness of a single step cannot be decided. */
export class StalenessError extends BuildError {
  constructor(code: string, message: string, path?: string) {
    super("staleness", code, message, path);
  }
}

/** rmdirs / mkdirs failure of a single step. */
export class FilesystemError extends BuildError {
  constructor(code: string, message: string, path?: string) {
    super("filesystem", code, message, path);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
