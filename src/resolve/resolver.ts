import { ConfigurationError } from "../core/errors.js";
import type {
  ComponentProperties,
  Manifest,
  ProfilesShape,
  PropertiesShape,
  ResolvedComponent,
} from "../types/model.js";
import { finalizeProperties, mergeProperties } from "./merge.js";
import { renderProperties } from "./render.js";

export type ResolveOptions = {
  /** Requested profile; when absent each component falls back to its defaultProfile. */
  profile?: string;
};

type ConcreteShape = PropertiesShape | ProfilesShape;

type TemplateLayer = { name: string; shape: ConcreteShape };

/**
 * Follow a chain of template references until a concrete template is reached.
 * Unknown names and reference cycles are configuration errors.
 */
export function resolveTemplateChain(manifest: Manifest, start: string, referrer: string): TemplateLayer {
  const chain: string[] = [];
  let current = start;

  for (;;) {
    if (chain.includes(current)) {
      throw new ConfigurationError(
        "TEMPLATE_CYCLE",
        `Template reference cycle: ${[...chain, current].join(" -> ")}`,
        `/templates/${current}`,
      );
    }
    chain.push(current);

    const shape = manifest.templates.get(current);
    if (shape === undefined) {
      const via = chain.length > 1 ? ` (via ${chain.slice(0, -1).join(" -> ")})` : "";
      throw new ConfigurationError(
        "UNKNOWN_TEMPLATE",
        `${referrer} references unknown template "${current}"${via}`,
        `/templates/${current}`,
      );
    }
    if (shape.kind !== "ref") {
      return { name: current, shape };
    }
    current = shape.template;
  }
}

function selectProfile(
  shape: ConcreteShape,
  profile: string | undefined,
  where: string,
  component: string,
): ComponentProperties {
  switch (shape.kind) {
    case "properties":
      return shape.properties;
    case "profiles": {
      const name = profile ?? shape.defaultProfile;
      const selected = shape.profiles.get(name);
      if (selected === undefined) {
        throw new ConfigurationError(
          "UNKNOWN_PROFILE",
          `Component "${component}": profile "${name}" is not defined in ${where} (available: ${[...shape.profiles.keys()].join(", ")})`,
          `/components/${component}`,
        );
      }
      return selected;
    }
  }
}

/** Resolve one component into its fully merged build configuration. */
export function resolveComponent(manifest: Manifest, name: string, opts: ResolveOptions = {}): ResolvedComponent {
  const definition = manifest.components.get(name);
  if (definition === undefined) {
    throw new ConfigurationError("UNKNOWN_COMPONENT", `Unknown component "${name}"`, `/components/${name}`);
  }
  const index = [...manifest.components.keys()].indexOf(name);

  const own: ConcreteShape =
    definition.kind === "ref" ? { kind: "properties", properties: {} } : definition;
  const templateName = definition.template;
  const template =
    templateName === undefined ? undefined : resolveTemplateChain(manifest, templateName, `Component "${name}"`);

  let profile = opts.profile;
  if (profile === undefined && own.kind === "profiles") profile = own.defaultProfile;
  if (profile === undefined && template?.shape.kind === "profiles") profile = template.shape.defaultProfile;
  const profiled = own.kind === "profiles" || template?.shape.kind === "profiles";

  const ownLayer = selectProfile(own, profile, `component "${name}"`, name);

  let properties = ownLayer;
  if (template !== undefined) {
    const templateLayer = renderProperties(
      selectProfile(template.shape, profile, `template "${template.name}"`, name),
      { componentName: name, profile: profiled ? profile : undefined },
      template.name,
    );
    properties = mergeProperties(templateLayer, ownLayer);
  }

  return {
    name,
    index,
    template: template?.name,
    profile: profiled ? profile : undefined,
    properties: finalizeProperties(properties),
    dependencies: manifest.dependencies.get(name) ?? [],
  };
}

/**
 * Resolve every component of the manifest, in declaration order. Pure: no
 * filesystem access.
 */
export function resolveComponents(manifest: Manifest, opts: ResolveOptions = {}): ResolvedComponent[] {
  for (const owner of manifest.dependencies.keys()) {
    if (!manifest.components.has(owner)) {
      throw new ConfigurationError(
        "UNKNOWN_DEPENDENCY_OWNER",
        `Dependencies declared for unknown component "${owner}"`,
        `/dependencies/${owner}`,
      );
    }
  }

  return [...manifest.components.keys()].map((name) => resolveComponent(manifest, name, opts));
}
