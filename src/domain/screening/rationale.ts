import type { FlagEvaluation, RuleConfiguration } from "./types.js";
import { effectiveRedFlags } from "./rule-config.js";

// ============================================================================
// Rationale parsing
//
// The reasoning service reports its flag checks only inside the rationale:
//   "Red flags: R1b. Green flags: 3/8 (G1✓ G3✓ G5✓). Funds STEM in Newark."
// These helpers read that structure back so the policy can be re-applied.
// ============================================================================

const RED_HEADER = /red\s+flags?(?:\s+triggered)?\s*:/i;
const GREEN_HEADER = /green\s+flags?\s*:/i;
const GREEN_COUNT = /green\s+flags?\s*:\s*(\d+)\s*\/\s*(\d+)/i;
const NONE_DECLARED = /^\s*(?:none|no\s+(?:red\s+)?flags?|n\/a)\b/i;
const NEGATION =
  /^\s*(?:[:=\u2013\u2014\u2192-]\s*)?(?:(?:no|unclear|n\/a)\b|\(\s*(?:no|unclear|n\/a)\s*\)|not\s+(?:triggered|fired|met|present|applicable)\b|does(?:\s+not|n['\u2019]t)\s+apply\b|[\u2717\u2718\u00d7\u274c])/i;
const RANGE_AFTER = /^\s*(?:[\u2013\u2014]|to\b|through\b)\s*[A-Za-z]+[\w-]*\d/i;
const RANGE_BEFORE = /[A-Za-z]+[\w-]*\d\w*\s*(?:[\u2013\u2014]|\bto|\bthrough)\s*$/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * True when `label` appears in `text` at least once as a flag that holds:
 * not followed by NO/UNCLEAR/✗/"does not apply" and not an endpoint of a
 * range such as "R1a–R8".
 */
function mentionsAffirmatively(text: string, label: string): boolean {
  const pattern = new RegExp(`(?<![\\w-])${escapeRegExp(label)}(?![\\w-])`, "gi");
  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    const before = text.slice(0, start);
    const after = text.slice(start + match[0].length);
    if (RANGE_AFTER.test(after) || RANGE_BEFORE.test(before)) continue;
    if (!NEGATION.test(after)) return true;
  }
  return false;
}

/** Body of a leading "( ... )" group, nested parentheses included. */
function leadingGroup(text: string): { body: string; end: number } | null {
  const open = /^\s*\(/.exec(text);
  if (!open) return null;
  let depth = 1;
  for (let i = open[0].length; i < text.length; i++) {
    if (text[i] === "(") depth++;
    else if (text[i] === ")" && --depth === 0) {
      return { body: text.slice(open[0].length, i), end: i + 1 };
    }
  }
  return null;
}

export function parseRationale(
  rationale: string,
  rules: RuleConfiguration,
): FlagEvaluation {
  const redLabels = effectiveRedFlags(rules).map((f) => f.label);
  const greenLabels = rules.greenFlags.map((f) => f.label);
  const greenTotal = greenLabels.length;

  const evaluation: FlagEvaluation = {
    redFlagsFired: [],
    greenFlagsMet: [],
    greenCount: 0,
    greenTotal,
    context: "",
    redReadable: false,
    greenReadable: false,
  };

  const red = RED_HEADER.exec(rationale);
  if (red) {
    const start = red.index + red[0].length;
    const greenHeader = GREEN_HEADER.exec(rationale.slice(start));
    const segment = greenHeader
      ? rationale.slice(start, start + greenHeader.index)
      : rationale.slice(start);
    evaluation.redReadable = true;
    evaluation.redFlagsFired = NONE_DECLARED.test(segment)
      ? []
      : redLabels.filter((label) => mentionsAffirmatively(segment, label));
  }

  const green = GREEN_COUNT.exec(rationale);
  if (!green) {
    evaluation.context = red ? "" : rationale.trim();
    return evaluation;
  }

  evaluation.greenReadable = true;
  let rest = rationale.slice(green.index + green[0].length);
  const listed = leadingGroup(rest);
  if (listed) {
    evaluation.greenFlagsMet = greenLabels.filter((label) =>
      mentionsAffirmatively(listed.body, label),
    );
    rest = rest.slice(listed.end);
  }

  // The declared X of "X/N" is authoritative; the listed labels are kept for display.
  evaluation.greenCount = Math.min(Number(green[1]), greenTotal);
  evaluation.context = rest.replace(/^[\s.;:-]+/, "").trim();
  return evaluation;
}

/** Canonical rationale text for a (possibly repaired) evaluation. */
export function formatRationale(evaluation: FlagEvaluation): string {
  const red =
    evaluation.redFlagsFired.length > 0
      ? evaluation.redFlagsFired.join(", ")
      : "None";
  const met =
    evaluation.greenFlagsMet.length > 0
      ? ` (${evaluation.greenFlagsMet.map((l) => `${l}✓`).join(" ")})`
      : "";
  const base = `Red flags: ${red}. Green flags: ${evaluation.greenCount}/${evaluation.greenTotal}${met}.`;
  return evaluation.context ? `${base} ${evaluation.context}` : base;
}

const STRUCTURED_PREFIX =
  /^\s*Red flags:[\s\S]*?Green flags:\s*\d+\s*\/\s*\d+\s*(?:\((?:[^()]|\([^()]*\))*\))?\.\s*/i;

/**
 * Display form for the results table: the flag bookkeeping is dropped and
 * only the context sentence remains. Returns the input when nothing is left.
 */
export function displayRationale(rationale: string): string {
  const cleaned = rationale.replace(STRUCTURED_PREFIX, "").trim();
  return cleaned || rationale;
}
