import type { Candidate, Decision, DecisionResolution } from "./types.js";

/**
 * Assemble the immutable Decision handed to the result sink.
 * Pure: no I/O, and the inputs are copied rather than shared.
 */
export function buildDecision(
  candidate: Candidate,
  resolution: DecisionResolution,
  screenedAt: Date = new Date(),
): Decision {
  const sources = Object.freeze(resolution.sources.map((s) => Object.freeze({ ...s })));

  return Object.freeze({
    candidate: Object.freeze({ ...candidate }),
    classification: resolution.classification,
    rationale: resolution.rationale,
    confidence: resolution.confidence,
    next_action_date: resolution.next_action_date,
    sources,
    upstream_classification: resolution.upstream_classification,
    screened_at: screenedAt.toISOString(),
  });
}
