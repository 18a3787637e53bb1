import { vi } from "vitest";
import type {
  Candidate,
  Citation,
  Decision,
  DecisionResolution,
  EvidenceBundle,
  RuleConfiguration,
  SearchHit,
} from "../src/domain/screening/types.js";
import { buildDefaultRuleConfiguration } from "../src/domain/screening/rule-config.js";
import { buildDecision } from "../src/domain/screening/decision-builder.js";
import type {
  EvidenceGatherer,
  GenerateOptions,
  ReasoningResponse,
  ReasoningService,
  ResultSink,
} from "../src/domain/screening/screening-pipeline.js";
import type { SearchConfig, ReasoningConfig } from "../src/core/config.js";

export const SCREENED_AT = new Date("2026-03-01T12:00:00.000Z");

export function makeCandidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    id: "006A000001",
    name: "Acme Family Foundation - 2026 LOI",
    foundation_name: "Acme Family Foundation",
    search_name: "Acme Family",
    amount: 10000,
    website: "https://acmefamily.org/grants",
    focus_area: "STEM education",
    stage: "LOI Backlog",
    ...overrides,
  };
}

/** Built-in rule set (threshold 4 of 8 green, no grant-size rule). */
export function makeRules(
  overrides: Partial<RuleConfiguration> = {},
): RuleConfiguration {
  return { ...buildDefaultRuleConfiguration(), ...overrides };
}

export function makeHit(overrides: Partial<SearchHit> = {}): SearchHit {
  return {
    title: "Acme Family Foundation - Nonprofit Explorer",
    snippet: "Acme Family Foundation gave $250,000 in grants in 2025.",
    link: "https://projects.propublica.org/nonprofits/organizations/221234567",
    ...overrides,
  };
}

export function makeCitations(count: number, prefix = "evidence"): Citation[] {
  return Array.from({ length: count }, (_, i) => ({
    label: `${prefix}${i + 1}.org`,
    url: `https://${prefix}${i + 1}.org/profile`,
  }));
}

export function makeBundle(overrides: Partial<EvidenceBundle> = {}): EvidenceBundle {
  return {
    snippets: [],
    digest: "[PROPUBLICA] Acme Family Foundation\nGave $250,000 in 2025.\nURL: https://projects.propublica.org/nonprofits/organizations/221234567",
    citations: [
      {
        label: "projects.propublica.org",
        url: "https://projects.propublica.org/nonprofits/organizations/221234567",
      },
    ],
    hits: {},
    ...overrides,
  };
}

export function makeResolution(
  overrides: Partial<DecisionResolution> = {},
): DecisionResolution {
  return {
    classification: "ACCEPT",
    rationale:
      "Red flags: None. Green flags: 5/8 (G1✓ G2✓ G3✓ G5✓ G6✓). Funds STEM in Newark.",
    confidence: 0.85,
    next_action_date: "2026-09-15",
    sources: [
      {
        label: "projects.propublica.org",
        url: "https://projects.propublica.org/nonprofits/organizations/221234567",
      },
    ],
    upstream_classification: "ACCEPT",
    ...overrides,
  };
}

export function makeDecision(
  resolution: Partial<DecisionResolution> = {},
  candidate: Partial<Candidate> = {},
  screenedAt: Date = SCREENED_AT,
): Decision {
  return buildDecision(makeCandidate(candidate), makeResolution(resolution), screenedAt);
}

/** Structured answer text the way the reasoning service returns it. */
export function answerText(fields: Record<string, unknown>): string {
  return "```json\n" + JSON.stringify(fields, null, 2) + "\n```";
}

export function makeReasoner(
  respond: (prompt: string) => ReasoningResponse | Promise<ReasoningResponse>,
) {
  const generate = vi.fn(
    async (prompt: string, _options?: GenerateOptions) => respond(prompt),
  );
  const reasoner: ReasoningService = { generate };
  return { reasoner, generate };
}

export function makeGatherer(bundle: EvidenceBundle = makeBundle()) {
  const gather = vi.fn(async (_searchName: string, _website?: string | null) => bundle);
  const evidence: EvidenceGatherer = { gather };
  return { evidence, gather };
}

/** In-memory result sink. Names listed in failFor make append() throw. */
export class MemorySink implements ResultSink {
  names: Set<string>;
  appended: Decision[] = [];
  failFor = new Set<string>();

  constructor(initialNames: string[] = []) {
    this.names = new Set(initialNames);
  }

  async getProcessedNames(): Promise<Set<string>> {
    return new Set(this.names);
  }

  async append(decision: Decision): Promise<void> {
    const name = decision.candidate.foundation_name;
    if (this.failFor.has(name)) throw new Error("disk full");
    this.appended.push(decision);
    this.names.add(name);
  }
}

export function makeSearchConfig(overrides: Partial<SearchConfig> = {}): SearchConfig {
  return {
    serpApiKey: "test-serpapi-key",
    rateLimitMs: 0,
    timeoutMs: 30000,
    maxRetries: 0,
    retryBackoffMs: 100,
    fallbackKeywords: ["foundation", "grants"],
    ...overrides,
  };
}

export function makeReasoningConfig(
  overrides: Partial<ReasoningConfig> = {},
): ReasoningConfig {
  return {
    geminiApiKey: "test-gemini-key",
    model: "gemini-2.5-flash",
    searchGrounding: true,
    timeoutMs: 120000,
    ...overrides,
  };
}
