import { ConfigurationError } from "../core/errors.js";
import type { ComponentProperties, ExternalCommand } from "../types/model.js";

export type PlaceholderValues = {
  componentName: string;
  profile?: string;
};

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

/** Substitute `{{ componentName }}` / `{{ profile }}` in one template-provided string. */
export function renderString(value: string, values: PlaceholderValues, source: string): string {
  return value.replace(PLACEHOLDER, (_match, name: string) => {
    if (name === "componentName") return values.componentName;
    if (name === "profile") return values.profile ?? "";
    throw new ConfigurationError(
      "UNKNOWN_PLACEHOLDER",
      `Template "${source}" uses unknown placeholder "{{ ${name} }}" (component ${values.componentName})`,
      source,
    );
  });
}

function renderList(values: readonly string[], ctx: PlaceholderValues, source: string): string[] {
  return values.map((v) => renderString(v, ctx, source));
}

function renderCommand(command: ExternalCommand, ctx: PlaceholderValues, source: string): ExternalCommand {
  const base = {
    command: renderString(command.command, ctx, source),
    dir: command.dir === undefined ? undefined : renderString(command.dir, ctx, source),
    rmdirs: renderList(command.rmdirs, ctx, source),
    mkdirs: renderList(command.mkdirs, ctx, source),
  };
  switch (command.kind) {
    case "unconditional":
      return { kind: "unconditional", ...base };
    case "incremental":
      return {
        kind: "incremental",
        ...base,
        sources: renderList(command.sources, ctx, source),
        targets: renderList(command.targets, ctx, source),
      };
  }
}

/** Render every string a template layer contributes to a component. */
export function renderProperties(
  properties: ComponentProperties,
  ctx: PlaceholderValues,
  source: string,
): ComponentProperties {
  const rendered: ComponentProperties = {};
  for (const key of ["sourceWit", "generatedWit", "componentWasm", "linkedWasm"] as const) {
    const value = properties[key];
    if (value !== undefined) rendered[key] = renderString(value, ctx, source);
  }
  if (properties.build !== undefined) {
    rendered.build = properties.build.map((c) => renderCommand(c, ctx, source));
  }
  if (properties.customCommands !== undefined) {
    rendered.customCommands = Object.fromEntries(
      Object.entries(properties.customCommands).map(([name, commands]) => [
        name,
        commands.map((c) => renderCommand(c, ctx, source)),
      ]),
    );
  }
  if (properties.clean !== undefined) {
    rendered.clean = renderList(properties.clean, ctx, source);
  }
  return rendered;
}
