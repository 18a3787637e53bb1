import type {
  Citation,
  Classification,
  DecisionResolution,
  RuleConfiguration,
} from "./types.js";
import { classify, policyInputsFrom } from "./decision-policy.js";
import { formatRationale, parseRationale } from "./rationale.js";
import { effectiveRedFlags } from "./rule-config.js";
import { mergeSources } from "../evidence/citations.js";
import { logDebug, logInfo, logWarn } from "../../core/logging.js";

export const MAX_FALLBACK_RATIONALE_CHARS = 500;

const CLASSIFICATION_ALIASES: Record<string, Classification> = {
  ACCEPT: "ACCEPT",
  REVIEW: "REVIEW",
  REJECT: "REJECT",
  GREEN: "ACCEPT",
  YELLOW: "REVIEW",
  RED: "REJECT",
};

export interface ResolveInput {
  rawText: string;
  rules: RuleConfiguration;
  evidenceCitations: readonly Citation[];
  reasoningCitations?: readonly Citation[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse the text between the first "{" and the last "}". Surrounding prose
 * and code fences are ignored. Returns null when there is no usable object.
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;

  try {
    const parsed: unknown = JSON.parse(text.slice(start, end + 1));
    return isRecord(parsed) ? parsed : null;
  } catch (err) {
    logDebug(`Structured answer is not valid JSON: ${String(err)}`);
    return null;
  }
}

export function parseClassification(value: unknown): Classification | null {
  if (typeof value !== "string") return null;
  return CLASSIFICATION_ALIASES[value.trim().toUpperCase()] ?? null;
}

export function parseConfidence(value: unknown): number {
  const n =
    typeof value === "number"
      ? value
      : typeof value === "string"
        ? Number(value)
        : NaN;
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

/** Keep a YYYY-MM-DD calendar date; anything else becomes null. */
export function parseActionDate(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const match = /^(\d{4}-\d{2}-\d{2})/.exec(value.trim());
  if (!match) return null;
  const date = new Date(`${match[1]}T00:00:00Z`);
  if (Number.isNaN(date.getTime())) return null;
  return date.toISOString().slice(0, 10) === match[1] ? match[1] : null;
}

/** Degraded-but-safe result when the answer cannot be used at all. */
export function fallbackResolution(
  rationale: string,
  sources: Citation[],
): DecisionResolution {
  return {
    classification: "REVIEW",
    rationale: rationale.slice(0, MAX_FALLBACK_RATIONALE_CHARS),
    confidence: 0,
    next_action_date: null,
    sources,
    upstream_classification: null,
  };
}

/**
 * Resolve a raw reasoning response into the final classification.
 *
 * The upstream `classification` field is never taken at face value: the flag
 * results in the rationale are read back and the policy is applied here.
 * When the rationale cannot be read, an unverifiable ACCEPT is held at
 * REVIEW.
 */
export function resolveDecision(input: ResolveInput): DecisionResolution {
  const { rawText, rules } = input;
  const sources = mergeSources(
    input.evidenceCitations,
    input.reasoningCitations ?? [],
  );

  const answer = extractJsonObject(rawText);
  const upstream = answer ? parseClassification(answer.classification) : null;
  if (!answer || !upstream) {
    logWarn(
      `Unusable structured answer, defaulting to REVIEW. Raw: ${rawText.slice(0, 120)}`,
    );
    return fallbackResolution(
      rawText.trim() || "Empty response from reasoning service.",
      sources,
    );
  }

  const upstreamRationale =
    typeof answer.rationale === "string" && answer.rationale.trim()
      ? answer.rationale.trim()
      : "No rationale provided.";
  const evaluation = parseRationale(upstreamRationale, rules);
  const inputs = policyInputsFrom(evaluation, effectiveRedFlags(rules));

  let classification: Classification;
  let rationale = upstreamRationale;

  if (evaluation.redReadable && evaluation.greenReadable) {
    classification = classify(inputs, rules.greenThreshold);
    rationale = formatRationale(evaluation);
  } else if (evaluation.redReadable && inputs.hardRed) {
    classification = "REJECT";
  } else {
    classification = upstream === "ACCEPT" ? "REVIEW" : upstream;
    logWarn("Rationale lacks flag structure; upstream classification not verifiable");
  }

  if (classification !== upstream) {
    logInfo(`Policy override: upstream ${upstream} -> ${classification}`);
  }

  return {
    classification,
    rationale,
    confidence: parseConfidence(answer.confidence),
    next_action_date: parseActionDate(answer.next_application_date),
    sources,
    upstream_classification: upstream,
  };
}
