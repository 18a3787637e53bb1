/**
 * Foundation-name cleanup for backlog records.
 *
 * The CRM sort field prefixes names with "~" so they float to the top of the
 * board; search queries also work better without legal suffixes and filler.
 */

const NOISE_TOKENS = new Set([
  "inc",
  "c/o",
  "the",
  "llc",
  "ltd",
  "foundation",
  "trust",
  "corp",
]);

/** Strip the leading "~" sort marker and surrounding whitespace. */
export function normalizeFoundationName(raw: string): string {
  return raw.replace(/^[~\s]+/, "").trim();
}

/**
 * Drop noise tokens (compared case-insensitively, trailing punctuation
 * ignored). Kept tokens stay as written, so a name without noise comes back
 * unchanged. Falls back to the input when nothing meaningful is left.
 */
export function cleanSearchName(name: string): string {
  const tokens = name.split(/\s+/).filter(Boolean);
  const kept = tokens.filter(
    (token) => !NOISE_TOKENS.has(token.replace(/[.,;]+$/, "").toLowerCase()),
  );
  let result = kept.join(" ");
  // "Acme Fund, Inc." leaves a dangling separator once the suffix is gone
  if (kept.length < tokens.length) result = result.replace(/[,;]+$/, "");
  return result || name.trim();
}

/** Name tokens long enough to prove a search hit is about this funder. */
export function relevanceTokens(searchName: string): string[] {
  return searchName
    .toLowerCase()
    .split(/\s+/)
    .filter((w) => w.length > 3);
}
