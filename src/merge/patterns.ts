/**
 * Structural matchers over C-family source lines.
 *
 * Every predicate is pure and total: it never throws and looks only at the
 * lines it is given.
 */

export const INCLUDE_RE = /^\s*#\s*include\s+[<"].*[>"]/;

// A bare `*` continuation needs a following space so `*ptr = x;` stays code.
const CONTINUATION_RE = /^\s*\*(\s|\/|$)/;

const NULL_CHECK_PATTERNS: RegExp[] = [
  /if\s*\(\s*!?\s*\w+\s*(==|!=)\s*NULL\s*\)/i,
  /if\s*\(\s*NULL\s*(==|!=)\s*\w+\s*\)/i,
  /if\s*\(\s*!\s*\w+\s*\)/i,
  /if\s*\(\s*\w+\s*\)/i,
];

const ERROR_HANDLING_PATTERNS: RegExp[] = [
  /return\s+ANSC_STATUS_FAILURE/i,
  /return\s+(-1|NULL|false)/i,
  /exit\s*\(\s*1\s*\)/i,
  /CcspTraceError|CcspTraceWarning/i,
  /ERR_CHK/i,
  /goto\s+\w*error\w*/i,
  /goto\s+\w*fail\w*/i,
];

/** Defensive shapes: null guards, bounded copies, resource release. */
const SAFETY_PATTERNS: RegExp[] = [
  /if\s*\(\s*!\s*\w+\s*\)/i,
  /if\s*\(\s*\w+\s*==\s*NULL/i,
  /if\s*\(\s*NULL\s*==/i,
  /snprintf\s*\(/i,
  /close\s*\(\s*\w+\s*\)/i,
  /free\s*\(\s*\w+\s*\)/i,
  /exit\s*\(\s*1\s*\)/i,
  /va_end\s*\(/i,
  /fclose\s*\(/i,
];

function anyLineMatches(lines: readonly string[], patterns: RegExp[]): boolean {
  return lines.some((line) => patterns.some((re) => re.test(line)));
}

function nonBlank(lines: readonly string[]): string[] {
  return lines.filter((l) => l.trim().length > 0);
}

/** Remove every whitespace character. */
export function normalizeLine(line: string): string {
  return line.replace(/\s+/g, "");
}

/** Whitespace-stripped lines, with lines that become empty dropped. */
export function normalizeLines(lines: readonly string[]): string[] {
  return lines.map(normalizeLine).filter((l) => l.length > 0);
}

export function normalizedEquivalent(a: readonly string[], b: readonly string[]): boolean {
  const na = normalizeLines(a);
  const nb = normalizeLines(b);
  return na.length === nb.length && na.every((line, i) => line === nb[i]);
}

export function isIncludeBlock(lines: readonly string[]): boolean {
  const body = nonBlank(lines);
  return body.length > 0 && body.every((l) => INCLUDE_RE.test(l));
}

/**
 * Text of `line` outside comments, starting inside a block comment when
 * `inBlock` is set. Returns the block state at the end of the line.
 */
function codeOutsideComments(line: string, inBlock: boolean): { code: string; inBlock: boolean } {
  let code = "";
  let i = 0;
  let open = inBlock;
  while (i < line.length) {
    if (open) {
      const end = line.indexOf("*/", i);
      if (end < 0) return { code, inBlock: true };
      i = end + 2;
      open = false;
      continue;
    }
    const block = line.indexOf("/*", i);
    const slashes = line.indexOf("//", i);
    if (slashes >= 0 && (block < 0 || slashes < block)) {
      return { code: code + line.slice(i, slashes), inBlock: false };
    }
    if (block < 0) return { code: code + line.slice(i), inBlock: false };
    code += line.slice(i, block);
    i = block + 2;
    open = true;
  }
  return { code, inBlock: open };
}

/** Every non-blank line lies inside a `//` or block comment. */
export function isCommentBlock(lines: readonly string[]): boolean {
  const body = nonBlank(lines);
  if (body.length === 0) return false;

  let inBlock = false;
  for (const line of body) {
    // continuation of a block opened before the hunk
    if (!inBlock && CONTINUATION_RE.test(line)) {
      if (codeOutsideComments(line, true).code.trim() !== "") return false;
      continue;
    }
    const scanned = codeOutsideComments(line, inBlock);
    if (scanned.code.trim() !== "") return false;
    inBlock = scanned.inBlock;
  }
  return true;
}

export function hasNullCheck(lines: readonly string[]): boolean {
  return anyLineMatches(lines, NULL_CHECK_PATTERNS);
}

export function hasErrorHandling(lines: readonly string[]): boolean {
  return anyLineMatches(lines, ERROR_HANDLING_PATTERNS);
}

/** Secondary signal used by the strategy engine; never a classifier on its own. */
export function looksSafer(lines: readonly string[]): boolean {
  return anyLineMatches(lines, SAFETY_PATTERNS);
}

/** Normalized lines with every `{` and `}` removed; lines left empty are dropped. */
export function stripBraces(lines: readonly string[]): string[] {
  return normalizeLines(lines)
    .map((l) => l.replace(/[{}]/g, ""))
    .filter((l) => l.length > 0);
}

export function extractIncludes(lines: readonly string[]): string[] {
  return lines.filter((l) => INCLUDE_RE.test(l)).map((l) => l.replace(/\s+$/, ""));
}
