import { extractIncludes, normalizeLine } from "./patterns.js";

const LOCAL_INCLUDE_RE = /#\s*include\s+"/;
const SYSTEM_INCLUDE_RE = /#\s*include\s+</;

function byTrimmedText(a: string, b: string): number {
  const ka = a.trim().toLowerCase();
  const kb = b.trim().toLowerCase();
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

/**
 * Union of the #include lines of both sides.
 *
 * Duplicates are detected on whitespace-stripped text and the first spelling
 * wins. Quoted includes come first, then angle-bracket includes, each group
 * sorted case-insensitively. Blank lines are dropped. Applying the merge to
 * its own output returns the same lines.
 */
export function mergeIncludes(ours: readonly string[], theirs: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const line of [...extractIncludes(ours), ...extractIncludes(theirs)]) {
    const key = normalizeLine(line);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(line);
  }

  const local = unique.filter((l) => LOCAL_INCLUDE_RE.test(l)).sort(byTrimmedText);
  const system = unique.filter((l) => !LOCAL_INCLUDE_RE.test(l) && SYSTEM_INCLUDE_RE.test(l)).sort(byTrimmedText);
  const other = unique.filter((l) => !LOCAL_INCLUDE_RE.test(l) && !SYSTEM_INCLUDE_RE.test(l));

  return [...local, ...system, ...other];
}
