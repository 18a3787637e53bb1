import type {
  Classification,
  Decision,
  RuleConfiguration,
} from "../domain/screening/types.js";
import type { DecisionRecord } from "../data-sources/decision-store.js";
import type { BacklogRunSummary } from "../domain/screening/screening-pipeline.js";
import { effectiveRedFlags } from "../domain/screening/rule-config.js";
import { displayRationale } from "../domain/screening/rationale.js";

/**
 * Compact decision output: just the fields a reviewer acts on.
 */
export interface CompactDecision {
  foundation_name: string;
  grant_name: string;
  classification: Classification;
  confidence: number;
  rationale: string;
  summary: string;
  next_action_date: string | null;
  sources: string[];
  upstream_classification: Classification | null;
  screened_at: string;
}

export interface CompactRuleConfig {
  organization: RuleConfiguration["organization"];
  grant_size: RuleConfiguration["grantSizeBounds"];
  green_threshold: number;
  red_flags: string[];
  green_flags: string[];
  custom_context: string;
}

export function compactDecision(decision: Decision): CompactDecision {
  return {
    foundation_name: decision.candidate.foundation_name,
    grant_name: decision.candidate.name,
    classification: decision.classification,
    confidence: decision.confidence,
    rationale: decision.rationale,
    summary: displayRationale(decision.rationale),
    next_action_date: decision.next_action_date,
    sources: decision.sources.map((s) => s.url),
    upstream_classification: decision.upstream_classification,
    screened_at: decision.screened_at,
  };
}

export function compactRecord(record: DecisionRecord): CompactDecision {
  return {
    foundation_name: record.foundation_name,
    grant_name: record.grant_name,
    classification: record.classification,
    confidence: record.confidence,
    rationale: record.rationale,
    summary: record.display_rationale,
    next_action_date: record.next_action_date,
    sources: record.sources.map((s) => s.url),
    upstream_classification: record.upstream_classification,
    screened_at: record.screened_at,
  };
}

export function compactRunSummary(summary: BacklogRunSummary) {
  return {
    screened: summary.decisions.length,
    skipped: summary.skipped.length,
    persisted: summary.persisted,
    counts: summary.counts,
    write_failures: summary.write_failures,
    decisions: summary.decisions.map(compactDecision),
  };
}

/** Rule set as shown to users, with the grant-size rule spelled out. */
export function compactRuleConfig(rules: RuleConfiguration): CompactRuleConfig {
  return {
    organization: rules.organization,
    grant_size: rules.grantSizeBounds,
    green_threshold: rules.greenThreshold,
    red_flags: effectiveRedFlags(rules).map((f) => `${f.label}. ${f.text}`),
    green_flags: rules.greenFlags.map((f) => `${f.label}. ${f.text}`),
    custom_context: rules.customContext,
  };
}
