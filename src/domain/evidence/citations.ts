import type { Citation } from "../screening/types.js";

export const MAX_CITATIONS = 5;

// Grounding redirects and search-result pages are not citable sources.
export const REDIRECT_DENYLIST = [
  "vertexaisearch.cloud.google.com",
  "google.com/search",
];

export function isDeniedUrl(url: string): boolean {
  return REDIRECT_DENYLIST.some((pattern) => url.includes(pattern));
}

/** "https://www.candid.org/profile/123" -> "www.candid.org" */
export function domainLabel(url: string): string {
  return url.replace(/^https?:\/\//i, "").split("/")[0];
}

export function citationFromUrl(url: string): Citation {
  return { label: domainLabel(url), url };
}

/**
 * Drop empty, denylisted and repeated URLs, keeping first-seen order.
 * `exclude` holds URLs already taken elsewhere.
 */
export function dedupeCitations(
  citations: readonly Citation[],
  exclude: ReadonlySet<string> = new Set(),
): Citation[] {
  const seen = new Set(exclude);
  const result: Citation[] = [];
  for (const citation of citations) {
    const url = citation.url.trim();
    if (!url || isDeniedUrl(url) || seen.has(url)) continue;
    seen.add(url);
    result.push({ label: citation.label || domainLabel(url), url });
  }
  return result;
}

/**
 * Merge evidence citations with citations the reasoning service grounded on.
 *
 * Evidence keeps its priority order. When the reasoning side contributes at
 * least one new URL, one slot is held for it even if evidence alone would
 * fill the list.
 */
export function mergeSources(
  evidence: readonly Citation[],
  reasoning: readonly Citation[],
  max: number = MAX_CITATIONS,
): Citation[] {
  const fromEvidence = dedupeCitations(evidence);
  const taken = new Set(fromEvidence.map((c) => c.url));
  const fromReasoning = dedupeCitations(reasoning, taken);

  const reserved = fromReasoning.length > 0 ? 1 : 0;
  const evidencePart = fromEvidence.slice(0, Math.max(0, max - reserved));
  const reasoningPart = fromReasoning.slice(0, max - evidencePart.length);
  return [...evidencePart, ...reasoningPart];
}
