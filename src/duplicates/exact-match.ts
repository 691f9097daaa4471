import { normalizeTitle } from "./normalize.ts";
import type { IssueText } from "./types.ts";

/**
 * Return the first candidate whose normalized title equals the target's.
 *
 * O(n) pre-check, independent of either similarity backend. Missing titles
 * normalize to "" and compare like any other title. Never throws.
 */
export function findExactDuplicate<T extends IssueText & { id: number }>(
  target: IssueText & { id: number },
  candidates: readonly T[],
): T | null {
  const targetTitle = normalizeTitle(target.title);

  for (const candidate of candidates) {
    if (candidate.id === target.id) continue;
    if (normalizeTitle(candidate.title) === targetTitle) return candidate;
  }
  return null;
}
