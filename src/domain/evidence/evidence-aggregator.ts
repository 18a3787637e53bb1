import type {
  EvidenceBundle,
  EvidenceSnippet,
  EvidenceSource,
  SearchHit,
} from "../screening/types.js";
import { relevanceTokens } from "../screening/name-normalizer.js";
import {
  MAX_CITATIONS,
  citationFromUrl,
  dedupeCitations,
  domainLabel,
} from "./citations.js";
import { logDebug, logWarn, getErrorMessage } from "../../core/logging.js";

/**
 * Free-text search collaborator. Implementations throw on transport errors;
 * the aggregator turns a failed query into zero hits for that source.
 */
export interface SearchProvider {
  search(query: string, num: number): Promise<SearchHit[]>;
}

export const PRIORITY_SOURCES: readonly EvidenceSource[] = [
  { name: "ProPublica", tier: 1, siteFilter: "site:projects.propublica.org/nonprofits" },
  { name: "Granted", tier: 1, siteFilter: "site:grantedai.com" },
  { name: "Candid", tier: 1, siteFilter: "site:candid.org" },
  { name: "CauseIQ", tier: 1, siteFilter: "site:causeiq.com" },
];

export const GENERAL_SOURCE: EvidenceSource = {
  name: "General",
  tier: 2,
  siteFilter: "",
};

export const HITS_PER_QUERY = 5;
const MAX_PRIORITY_HITS = 1;
const MAX_GENERAL_HITS = 2;
export const MAX_DIGEST_CHARS = 6000;
export const EMPTY_DIGEST = "No results found.";

export interface EvidenceAggregatorOptions {
  /** Extra terms for the general-web fallback query. */
  fallbackKeywords?: string[];
  prioritySources?: readonly EvidenceSource[];
}

export function isRelevantHit(hit: SearchHit, tokens: string[]): boolean {
  if (tokens.length === 0) return true;
  const text = `${hit.title} ${hit.snippet}`.toLowerCase();
  return tokens.some((token) => text.includes(token));
}

export function buildFallbackQuery(
  searchName: string,
  website: string | null | undefined,
  keywords: string[],
): string {
  let query = [`"${searchName}"`, ...keywords].join(" ").trim();
  if (website) {
    query += ` OR site:${domainLabel(website)}`;
  }
  return query;
}

function renderDigest(snippets: EvidenceSnippet[]): string {
  let digest = "";
  for (const s of snippets) {
    if (!s.text) continue;
    const block = `[${s.source_name.toUpperCase()}] ${s.title}\n${s.text}\nURL: ${s.url}`;
    const next = digest ? `${digest}\n\n${block}` : block;
    if (next.length > MAX_DIGEST_CHARS) {
      if (!digest) digest = block.slice(0, MAX_DIGEST_CHARS);
      break;
    }
    digest = next;
  }
  return digest || EMPTY_DIGEST;
}

/**
 * Build the bundle from retained hits. `sourceOrder` fixes priority: tier 1
 * sources in declaration order, then the general fallback.
 */
export function assembleBundle(
  sourceOrder: readonly EvidenceSource[],
  hits: Record<string, SearchHit[]>,
): EvidenceBundle {
  const ordered = [...sourceOrder].sort((a, b) => a.tier - b.tier);
  const snippets: EvidenceSnippet[] = [];

  for (const source of ordered) {
    for (const hit of hits[source.name] ?? []) {
      snippets.push({
        source_name: source.name,
        title: hit.title,
        url: hit.link,
        text: hit.snippet,
      });
    }
  }

  const citations = dedupeCitations(
    snippets.filter((s) => s.url).map((s) => citationFromUrl(s.url)),
  ).slice(0, MAX_CITATIONS);

  return { snippets, digest: renderDigest(snippets), citations, hits };
}

/**
 * Collects evidence about one funder from prioritized sources.
 *
 * Each priority source contributes at most one relevant hit. Only when every
 * priority source comes back empty does a general-web query run.
 */
export class EvidenceAggregator {
  private provider: SearchProvider;
  private fallbackKeywords: string[];
  private prioritySources: readonly EvidenceSource[];

  constructor(provider: SearchProvider, options: EvidenceAggregatorOptions = {}) {
    this.provider = provider;
    this.fallbackKeywords = options.fallbackKeywords ?? ["foundation", "grants"];
    this.prioritySources = options.prioritySources ?? PRIORITY_SOURCES;
  }

  async gather(
    searchName: string,
    website?: string | null,
  ): Promise<EvidenceBundle> {
    const tokens = relevanceTokens(searchName);
    const hits: Record<string, SearchHit[]> = {};

    for (const source of this.prioritySources) {
      const found = await this.runQuery(
        `${searchName} ${source.siteFilter}`,
        source.name,
      );
      hits[source.name] = found
        .filter((h) => isRelevantHit(h, tokens))
        .slice(0, MAX_PRIORITY_HITS);
      logDebug(
        `[${source.name}] ${hits[source.name].length > 0 ? "1 relevant result" : "no relevant results"}`,
      );
    }

    const sources: EvidenceSource[] = [...this.prioritySources];
    const anyPriorityHit = this.prioritySources.some(
      (s) => hits[s.name].length > 0,
    );

    if (!anyPriorityHit) {
      const query = buildFallbackQuery(searchName, website, this.fallbackKeywords);
      const found = await this.runQuery(query, GENERAL_SOURCE.name);
      hits[GENERAL_SOURCE.name] = found
        .filter((h) => isRelevantHit(h, tokens))
        .slice(0, MAX_GENERAL_HITS);
      sources.push(GENERAL_SOURCE);
      logDebug(`[${GENERAL_SOURCE.name}] ${hits[GENERAL_SOURCE.name].length} result(s)`);
    }

    return assembleBundle(sources, hits);
  }

  private async runQuery(query: string, label: string): Promise<SearchHit[]> {
    try {
      return await this.provider.search(query, HITS_PER_QUERY);
    } catch (err) {
      logWarn(`[${label}] query failed for "${query}": ${getErrorMessage(err)}`);
      return [];
    }
  }
}
