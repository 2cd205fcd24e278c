import path from "node:path";
import { glob } from "glob";

export type PatternMatches = {
  pattern: string;
  /** Absolute paths, sorted. */
  paths: string[];
};

/**
 * Expand path/glob patterns relative to `cwd`. A literal path expands to
 * itself when it exists and to nothing otherwise. Results are sorted so that
 * reports are stable.
 */
export async function expandPatterns(patterns: readonly string[], cwd: string): Promise<PatternMatches[]> {
  const result: PatternMatches[] = [];
  for (const pattern of patterns) {
    const matches = await glob(toPosix(pattern), { cwd, absolute: true, dot: true });
    result.push({ pattern, paths: matches.map((p) => path.normalize(p)).sort() });
  }
  return result;
}

// glob patterns always use forward slashes
function toPosix(pattern: string): string {
  return pattern.split(path.sep).join("/");
}
