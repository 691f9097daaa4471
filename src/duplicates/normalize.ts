/**
 * Deterministic cleanup of issue text before comparison.
 *
 * Order matters: code fences and URLs are removed before the character
 * filter, otherwise code symbols and URL fragments leak into tokens.
 */

const CODE_FENCE_PATTERN = /```[\s\S]*?```/g;
const URL_PATTERN = /https?:\/\/\S+/g;
const NON_ALPHANUMERIC_PATTERN = /[^a-z0-9\s]/g;
const WHITESPACE_PATTERN = /\s+/g;

export function normalizeIssueText(text: string | null | undefined): string {
  if (!text) return "";

  return text
    .toLowerCase()
    .replace(CODE_FENCE_PATTERN, " ")
    .replace(URL_PATTERN, " ")
    .replace(NON_ALPHANUMERIC_PATTERN, " ")
    .replace(WHITESPACE_PATTERN, " ")
    .trim();
}

/**
 * Combine title and body for comparison. The title appears twice so its
 * tokens carry double weight in frequency-based scoring.
 */
export function combineIssueText(
  title: string | null | undefined,
  body: string | null | undefined,
): string {
  const t = title ?? "";
  return normalizeIssueText(`${t} ${t} ${body ?? ""}`);
}

export function normalizeTitle(title: string | null | undefined): string {
  return normalizeIssueText(title);
}
