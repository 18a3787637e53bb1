import type { Candidate, RuleConfiguration } from "./types.js";
import {
  GRANT_SIZE_LABEL,
  HARD_REJECT_LABEL,
  INVITATION_ONLY_LABEL,
} from "./types.js";
import { effectiveRedFlags } from "./rule-config.js";
import { EMPTY_DIGEST } from "../evidence/evidence-aggregator.js";

// ============================================================================
// Evaluation request
//
// The decision policy written here must stay word-for-word consistent with
// decision-policy.ts: the resolver re-applies it to whatever comes back.
// ============================================================================

const RULE = "=".repeat(48);

function section(title: string): string {
  return `${RULE}\n${title}\n${RULE}`;
}

function evidenceSection(digest: string): string {
  if (!digest || digest === EMPTY_DIGEST) {
    return "No priority-source results found. Use your search tool to research this funder.";
  }
  return [
    "PRE-FETCHED SEARCH RESULTS (highest-priority sources):",
    "---",
    digest,
    "---",
    "Use the results above as your PRIMARY evidence. Supplement with your own",
    "search ONLY if they are insufficient.",
  ].join("\n");
}

function formatAmount(amount: number | null): string {
  return amount === null ? "N/A" : `$${amount.toLocaleString("en-US")}`;
}

export function renderEvaluationPrompt(
  rules: RuleConfiguration,
  candidate: Candidate,
  digest: string,
): string {
  const { organization, greenThreshold, customContext } = rules;
  const redFlags = effectiveRedFlags(rules);
  const nGreen = rules.greenFlags.length;
  const hasSizeRule = redFlags.some((f) => f.label === GRANT_SIZE_LABEL);

  const redList = redFlags.map((f) => `${f.label}. ${f.text}`).join("\n");
  const greenList = rules.greenFlags.map((f) => `${f.label}. ${f.text}`).join("\n");

  const lines: string[] = [
    `You are an expert grant screener for ${organization.name}, a nonprofit ${organization.mission}.`,
    `Region: ${organization.region || "N/A"}. Target localities: ${organization.targetLocalities || "N/A"}.`,
  ];
  if (customContext) lines.push(`Additional context: ${customContext}`);

  lines.push(
    "",
    section("GRANT TO SCREEN"),
    `Foundation : ${candidate.foundation_name}`,
    `Org Name   : ${candidate.name}`,
    `Website    : ${candidate.website ?? "N/A"}`,
    `Amount     : ${formatAmount(candidate.amount)}`,
    `Focus Area : ${candidate.focus_area ?? "N/A"}`,
    "",
    evidenceSection(digest),
    "",
    section("STEP 1 - CHECK RED FLAGS"),
    "Go through each flag in order. Mark YES if found, NO if not:",
    redList,
    "",
    "Rules:",
    `-> ${HARD_REJECT_LABEL} triggered -> REJECT (hard, no workaround)`,
    `-> ${INVITATION_ONLY_LABEL} triggered (invitation only) + any green flags -> REVIEW (inquiry required)`,
    `-> ${INVITATION_ONLY_LABEL} triggered + zero green flags -> REJECT`,
    "-> Any other red flag -> REJECT",
  );
  if (hasSizeRule) {
    lines.push(`-> ${GRANT_SIZE_LABEL} counts as a red flag like any other.`);
  }

  lines.push(
    "",
    section("STEP 2 - COUNT GREEN FLAGS"),
    "Evaluate each with YES / NO / UNCLEAR and cite evidence:",
    greenList,
    "",
    "Count YES only. UNCLEAR = NO.",
    "",
    section("STEP 3 - CLASSIFY"),
    "Decision rule (strict, first match wins):",
    `- REJECT -> any hard red flag (${HARD_REJECT_LABEL} or any red flag other than ${INVITATION_ONLY_LABEL})`,
    `- REJECT -> ${INVITATION_ONLY_LABEL} + green_count = 0`,
    `- REVIEW -> ${INVITATION_ONLY_LABEL} + green_count >= 1`,
    `- ACCEPT -> 0 red flags AND green_count >= ${greenThreshold}`,
    `- REVIEW -> 0 red flags AND green_count < ${greenThreshold}`,
    "",
    "Rationale must include:",
    '- Which red flags triggered (or "None")',
    `- Green flag count: "Green flags: X/${nGreen} (G1✓ G2✓ ...)" listing only the YES flags`,
    "- One plain-English sentence of context",
    "",
    section("OUTPUT - ONLY this JSON object, no other keys"),
    "{",
    '  "classification": "ACCEPT" | "REVIEW" | "REJECT",',
    `  "rationale": "Red flags: <labels or None>. Green flags: <X>/${nGreen} (<labels>). <sentence>",`,
    '  "confidence": 0.0 to 1.0,',
    '  "next_application_date": "YYYY-MM-DD" or null',
    "}",
  );

  return lines.join("\n");
}
