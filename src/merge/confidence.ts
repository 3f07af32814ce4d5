import type { Confidence } from "../types/merge.js";

export const CONFIDENCE_ORDER: Record<Confidence, number> = { low: 0, review: 1, medium: 2, high: 3 };

const LEVELS: readonly Confidence[] = ["low", "review", "medium", "high"];

export function compareConfidence(a: Confidence, b: Confidence): number {
  return CONFIDENCE_ORDER[a] - CONFIDENCE_ORDER[b];
}

export function meetsMinimum(level: Confidence, minimum: Confidence): boolean {
  return CONFIDENCE_ORDER[level] >= CONFIDENCE_ORDER[minimum];
}

export function lowestConfidence(levels: readonly Confidence[]): Confidence | null {
  let lowest: Confidence | null = null;
  for (const level of levels) {
    if (lowest === null || CONFIDENCE_ORDER[level] < CONFIDENCE_ORDER[lowest]) lowest = level;
  }
  return lowest;
}

export function isConfidence(value: string): value is Confidence {
  return LEVELS.some((level) => level === value);
}

/** Parse a user-supplied level (CLI flag), case-insensitive. */
export function parseConfidence(value: string): Confidence | null {
  const lowered = value.trim().toLowerCase();
  return isConfidence(lowered) ? lowered : null;
}
