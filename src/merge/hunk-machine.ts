import type { ConflictHunk } from "../types/merge.js";

export type ParserState = "scanning" | "parsing_ours" | "parsing_base" | "parsing_theirs";

export type Segment =
  | { kind: "text"; lines: string[] }
  | { kind: "hunk"; hunk: ConflictHunk };

export type ParsedConflicts =
  | { ok: true; segments: Segment[]; hunks: ConflictHunk[]; trailingNewline: boolean }
  | { ok: false; error: string; line: number };

type Marker = "open" | "base" | "separator" | "close";

const MARKERS: [Marker, RegExp][] = [
  ["open", /^<{7}(?:\s|$)/],
  ["base", /^\|{7}(?:\s|$)/],
  ["separator", /^={7}\s*$/],
  ["close", /^>{7}(?:\s|$)/],
];

function markerOf(line: string): Marker | null {
  for (const [marker, re] of MARKERS) {
    if (re.test(line)) return marker;
  }
  return null;
}

function labelOf(line: string): string {
  return line.slice(7).trim();
}

/** Split file content into lines, remembering whether it ended with a newline. */
export function splitContent(content: string): { lines: string[]; trailingNewline: boolean } {
  if (content.length === 0) return { lines: [], trailingNewline: false };
  const lines = content.split("\n");
  const trailingNewline = content.endsWith("\n");
  if (trailingNewline) lines.pop();
  return { lines, trailingNewline };
}

/**
 * Scan conflict markers.
 *
 * Outside a hunk only `<<<<<<<` is significant; the other marker shapes pass
 * through as text. Inside a hunk every marker must appear in order
 * (ours, optional base, separator, theirs, close), otherwise the file is
 * malformed and nothing is returned.
 */
export function parseConflicts(content: string): ParsedConflicts {
  const { lines, trailingNewline } = splitContent(content);
  const segments: Segment[] = [];
  const hunks: ConflictHunk[] = [];

  let state: ParserState = "scanning";
  let text: string[] = [];
  let ours: string[] = [];
  let base: string[] | undefined;
  let theirs: string[] = [];
  let start = 0;
  let oursLabel = "";

  const malformed = (i: number, what: string): ParsedConflicts => ({
    ok: false,
    error: `malformed conflict markers at line ${i + 1}: ${what}`,
    line: i + 1,
  });

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const marker = markerOf(line);

    switch (state) {
      case "scanning":
        if (marker === "open") {
          if (text.length > 0) segments.push({ kind: "text", lines: text });
          text = [];
          ours = [];
          base = undefined;
          theirs = [];
          start = i;
          oursLabel = labelOf(line);
          state = "parsing_ours";
        } else {
          text.push(line);
        }
        break;

      case "parsing_ours":
        if (marker === null) ours.push(line);
        else if (marker === "base") {
          base = [];
          state = "parsing_base";
        } else if (marker === "separator") state = "parsing_theirs";
        else return malformed(i, `unexpected ${marker} marker in ours section`);
        break;

      case "parsing_base":
        if (marker === null) base?.push(line);
        else if (marker === "separator") state = "parsing_theirs";
        else return malformed(i, `unexpected ${marker} marker in base section`);
        break;

      case "parsing_theirs":
        if (marker === null) theirs.push(line);
        else if (marker === "close") {
          const hunk: ConflictHunk = {
            index: hunks.length + 1,
            ours_lines: ours,
            theirs_lines: theirs,
            ...(base !== undefined ? { base_lines: base } : {}),
            start_offset: start,
            end_offset: i,
            ours_label: oursLabel,
            theirs_label: labelOf(line),
          };
          hunks.push(hunk);
          segments.push({ kind: "hunk", hunk });
          state = "scanning";
        } else return malformed(i, `unexpected ${marker} marker in theirs section`);
        break;
    }
  }

  if (state !== "scanning") {
    return malformed(lines.length - 1, `unterminated conflict opened at line ${start + 1}`);
  }
  if (text.length > 0) segments.push({ kind: "text", lines: text });

  return { ok: true, segments, hunks, trailingNewline };
}

/**
 * Up to `limit` lines of plain text on each side of every hunk. Text between
 * two hunks is shared by both, so context never reaches into a neighbour.
 */
export function hunkContexts(
  segments: readonly Segment[],
  limit: number,
): Map<number, { before: string[]; after: string[] }> {
  const contexts = new Map<number, { before: string[]; after: string[] }>();
  const take = Math.max(0, limit);

  segments.forEach((segment, i) => {
    if (segment.kind !== "hunk") return;
    const prev = segments[i - 1];
    const next = segments[i + 1];
    const before = prev?.kind === "text" && take > 0 ? prev.lines.slice(-take) : [];
    const after = next?.kind === "text" ? next.lines.slice(0, take) : [];
    contexts.set(segment.hunk.index, { before, after });
  });
  return contexts;
}

/** Replace every hunk with its resolution, keeping all other text verbatim. */
export function reassemble(
  segments: readonly Segment[],
  resolved: ReadonlyMap<number, readonly string[]>,
  trailingNewline: boolean,
): string {
  const out: string[] = [];
  for (const segment of segments) {
    if (segment.kind === "text") {
      out.push(...segment.lines);
      continue;
    }
    const lines = resolved.get(segment.hunk.index);
    if (lines === undefined) {
      throw new Error(`no resolution for hunk #${segment.hunk.index}`);
    }
    out.push(...lines);
  }
  if (out.length === 0) return "";
  return out.join("\n") + (trailingNewline ? "\n" : "");
}
