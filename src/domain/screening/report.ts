import type { Decision } from "./types.js";
import { CLASSIFICATIONS } from "./types.js";
import { displayRationale } from "./rationale.js";
import type { BacklogRunSummary } from "./screening-pipeline.js";

// Plain-text report for the console runner. Decisions are grouped by
// classification in ACCEPT, REVIEW, REJECT order.

export function formatDecisionLine(decision: Decision): string {
  const confidence = decision.confidence.toFixed(2);
  const lines = [
    `${decision.classification.padEnd(6)} | ${confidence} | ${decision.candidate.foundation_name}`,
    `    ${displayRationale(decision.rationale)}`,
  ];
  if (decision.next_action_date) {
    lines.push(`    Next application: ${decision.next_action_date}`);
  }
  if (decision.sources.length > 0) {
    lines.push(`    Sources: ${decision.sources.map((s) => s.label).join(", ")}`);
  }
  return lines.join("\n");
}

export function formatScreeningReport(summary: BacklogRunSummary): string {
  const out: string[] = [];

  for (const classification of CLASSIFICATIONS) {
    const group = summary.decisions.filter(
      (d) => d.classification === classification,
    );
    if (group.length === 0) continue;
    out.push(`== ${classification} (${group.length}) ==`);
    for (const decision of group) out.push(formatDecisionLine(decision));
    out.push("");
  }

  const total = summary.decisions.length;
  out.push("Summary");
  out.push(`  Screened  : ${total}`);
  out.push(`  Skipped   : ${summary.skipped.length}`);
  out.push(`  Persisted : ${summary.persisted}`);
  for (const classification of CLASSIFICATIONS) {
    const count = summary.counts[classification];
    const pct = total > 0 ? Math.round((count / total) * 100) : 0;
    out.push(`  ${classification.padEnd(9)} : ${count} (${pct}%)`);
  }

  if (summary.write_failures.length > 0) {
    out.push("Write failures:");
    for (const failure of summary.write_failures) {
      out.push(`  - ${failure.foundation_name}: ${failure.error}`);
    }
  }

  return out.join("\n");
}
