import { minimatch } from "minimatch";
import { ConfigurationError } from "../core/errors.js";
import type { ResolvedComponent } from "../types/model.js";

/**
 * Filter components by name patterns (minimatch globs). No pattern selects
 * everything; a pattern that matches no component is a configuration error.
 * Declaration order is kept.
 */
export function selectComponents(components: readonly ResolvedComponent[], patterns: readonly string[] = []): ResolvedComponent[] {
  if (patterns.length === 0) return [...components];

  const selected = new Set<string>();
  for (const pattern of patterns) {
    const matches = components.filter((c) => minimatch(c.name, pattern));
    if (matches.length === 0) {
      throw new ConfigurationError(
        "NO_COMPONENT_MATCHES",
        `No component matches "${pattern}" (known: ${components.map((c) => c.name).join(", ")})`,
      );
    }
    for (const c of matches) selected.add(c.name);
  }

  return components.filter((c) => selected.has(c.name));
}
