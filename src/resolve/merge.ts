import type { ComponentProperties, ResolvedProperties } from "../types/model.js";

/**
 * Layer `override` on top of `base`, field by field. Scalars: override wins when
 * set. Sequences (`build`, `clean`) are taken wholesale from whichever side set
 * them. `customCommands` is keyed: each entry is taken wholesale from the side
 * that set it, override first.
 */
export function mergeProperties(base: ComponentProperties, override: ComponentProperties): ComponentProperties {
  const merged: ComponentProperties = {
    sourceWit: override.sourceWit ?? base.sourceWit,
    generatedWit: override.generatedWit ?? base.generatedWit,
    componentWasm: override.componentWasm ?? base.componentWasm,
    linkedWasm: override.linkedWasm ?? base.linkedWasm,
    build: override.build ?? base.build,
    clean: override.clean ?? base.clean,
  };

  if (base.customCommands !== undefined || override.customCommands !== undefined) {
    merged.customCommands = { ...base.customCommands, ...override.customCommands };
  }

  return dropUnset(merged);
}

function dropUnset(properties: ComponentProperties): ComponentProperties {
  const result: ComponentProperties = {};
  if (properties.sourceWit !== undefined) result.sourceWit = properties.sourceWit;
  if (properties.generatedWit !== undefined) result.generatedWit = properties.generatedWit;
  if (properties.componentWasm !== undefined) result.componentWasm = properties.componentWasm;
  if (properties.linkedWasm !== undefined) result.linkedWasm = properties.linkedWasm;
  if (properties.build !== undefined) result.build = properties.build;
  if (properties.customCommands !== undefined) result.customCommands = properties.customCommands;
  if (properties.clean !== undefined) result.clean = properties.clean;
  return result;
}

/** Fill sequence and mapping defaults; scalar paths stay optional. */
export function finalizeProperties(properties: ComponentProperties): ResolvedProperties {
  return {
    ...properties,
    build: properties.build ?? [],
    customCommands: properties.customCommands ?? {},
    clean: properties.clean ?? [],
  };
}
