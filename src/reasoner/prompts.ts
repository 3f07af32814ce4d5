import path from "node:path";
import type { Mode } from "../types/merge.js";
import type { ReasonerRequest } from "../types/reasoner.js";

export const RESOLVE_SYSTEM_PROMPT = `You are an expert C/C++ developer resolving a git merge conflict.
Produce the correct merged code for the conflicting region.

Rules:
1. Output only the resolved code, without Markdown or commentary.
2. The output must be syntactically valid and balanced.
3. Do not introduce function calls, variables or logic absent from both sides.
4. Keep every safety improvement (NULL checks, bounds checks, error handling).
5. Keep the functional intent of the side the operation favours.
6. Follow the surrounding code style.
7. When both sides add independent features, keep both.`;

export const DEPENDENCY_SYSTEM_PROMPT =
  "You are a senior C developer. Decide precisely whether one code diff functionally depends on another.";

const MODE_EXPLANATIONS: Record<Mode, string> = {
  "cherry-pick":
    "A pull request is being cherry-picked into the release branch. THEIRS is the incoming change to include.",
  revert: "A pull request is being reverted from the release branch. THEIRS is the change whose effect must be undone.",
};

const NO_CONTEXT = "// (no context available)";

function block(lines: readonly string[], fallback = ""): string {
  return lines.length > 0 ? lines.join("\n") : fallback;
}

export function buildResolvePrompt(request: ReasonerRequest): string {
  const sections = [
    `## Conflict in \`${path.basename(request.filepath)}\``,
    `### Operation: ${request.mode.toUpperCase()}\n${MODE_EXPLANATIONS[request.mode]}`,
  ];
  if (request.prContext) sections.push(request.prContext);
  sections.push(
    "### Code before the conflict:\n```c\n" + block(request.contextBefore, NO_CONTEXT) + "\n```",
    "### OURS (current branch):\n```c\n" + block(request.ours) + "\n```",
    "### THEIRS (incoming change):\n```c\n" + block(request.theirs) + "\n```",
    "### Code after the conflict:\n```c\n" + block(request.contextAfter, NO_CONTEXT) + "\n```",
    "Produce the merged code for this conflict hunk. Output only the resolved lines.",
  );
  return sections.join("\n\n");
}

export function buildDependencyPrompt(newerDiff: string, olderDiff: string): string {
  return [
    "Determine whether there is a functional, syntactic or logical dependency between two git diffs.",
    "Diff B was merged before Diff A.",
    "Diff B (older PR):\n```diff\n" + olderDiff + "\n```",
    "Diff A (newer PR):\n```diff\n" + newerDiff + "\n```",
    "Does Diff A depend on changes introduced by Diff B, such as a variable, function, struct or macro it uses, " +
      "or a mechanism it relies on? If they touch independent lines or features, reply NO.",
    "If there is a dependency, it is CRITICAL when Diff A fails to compile or run without Diff B, " +
      "and OPTIONAL when Diff A applies without it, perhaps with minor conflicts.",
    "Reply with exactly one of: YES_CRITICAL, YES_OPTIONAL, NO.",
  ].join("\n\n");
}
