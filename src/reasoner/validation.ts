const CALL_RE = /\b([a-zA-Z_]\w*)\s*\(/g;

const CALL_LIKE_KEYWORDS = new Set([
  "if", "for", "while", "switch", "return", "sizeof", "typeof", "defined", "else", "case", "do",
]);

/** Library calls a merged hunk may use even when neither side does. */
export const SAFE_CALLS: ReadonlySet<string> = new Set([
  "printf", "fprintf", "snprintf", "strcmp", "strncmp", "strlen",
  "malloc", "calloc", "realloc", "free", "memset", "memcpy",
  "close", "fclose", "open", "fopen", "NULL",
]);

const BRACKET_PAIRS: [string, string][] = [["{", "}"], ["(", ")"], ["[", "]"]];

export type ValidationResult = { valid: true } | { valid: false; reason: string };

/** Drop Markdown code fences, split into lines, drop trailing blank lines. */
export function cleanCandidate(content: string): string[] {
  const unfenced = content
    .replace(/^```[a-zA-Z0-9_+-]*[ \t]*\r?\n/gm, "")
    .replace(/\r?\n```\s*$/gm, "")
    .replace(/^```\s*$/gm, "");
  if (unfenced.trim().length === 0) return [];
  const lines = unfenced.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1].trim().length === 0) lines.pop();
  return lines;
}

function count(text: string, ch: string): number {
  let n = 0;
  for (const c of text) if (c === ch) n++;
  return n;
}

export function checkBalance(lines: readonly string[]): string | null {
  const code = lines.join("\n");
  for (const [open, close] of BRACKET_PAIRS) {
    if (count(code, open) !== count(code, close)) return `unbalanced ${open}${close}`;
  }
  return null;
}

/** Call-like identifiers, ignoring preprocessor lines, comment lines and keywords. */
export function extractCalls(lines: readonly string[]): Set<string> {
  const calls = new Set<string>();
  for (const line of lines) {
    const stripped = line.trim();
    if (stripped.startsWith("#") || stripped.startsWith("//") || stripped.startsWith("/*")) continue;
    for (const match of line.matchAll(CALL_RE)) {
      if (!CALL_LIKE_KEYWORDS.has(match[1])) calls.add(match[1]);
    }
  }
  return calls;
}

export function inventedCalls(
  candidate: readonly string[],
  ours: readonly string[],
  theirs: readonly string[],
): string[] {
  const known = new Set([...extractCalls(ours), ...extractCalls(theirs)]);
  return [...extractCalls(candidate)].filter((c) => !known.has(c) && !SAFE_CALLS.has(c)).sort();
}

export function growthLimit(ours: readonly string[], theirs: readonly string[]): number {
  return 2 * Math.max(ours.length, theirs.length) + 5;
}

/** Checks run in order; the first failure is reported. */
export function validateCandidate(
  candidate: readonly string[],
  ours: readonly string[],
  theirs: readonly string[],
): ValidationResult {
  if (candidate.every((l) => l.trim().length === 0)) {
    return { valid: false, reason: "empty candidate" };
  }
  const imbalance = checkBalance(candidate);
  if (imbalance) return { valid: false, reason: imbalance };

  const invented = inventedCalls(candidate, ours, theirs);
  if (invented.length > 0) {
    return { valid: false, reason: `introduces calls not present on either side: ${invented.join(", ")}` };
  }

  const limit = growthLimit(ours, theirs);
  if (candidate.length > limit) {
    return { valid: false, reason: `candidate has ${candidate.length} lines, limit is ${limit}` };
  }
  return { valid: true };
}
