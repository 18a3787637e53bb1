import { describe, it, expect } from "vitest";
import {
  formatDecisionLine,
  formatScreeningReport,
} from "../src/domain/screening/report.js";
import type { BacklogRunSummary } from "../src/domain/screening/screening-pipeline.js";
import { makeDecision } from "./fixtures.js";

describe("formatDecisionLine", () => {
  it("shows classification, confidence, context, date and sources", () => {
    expect(formatDecisionLine(makeDecision())).toBe(
      [
        "ACCEPT | 0.85 | Acme Family Foundation",
        "    Funds STEM in Newark.",
        "    Next application: 2026-09-15",
        "    Sources: projects.propublica.org",
      ].join("\n"),
    );
  });

  it("omits the date and sources lines when empty", () => {
    const decision = makeDecision({
      classification: "REVIEW",
      rationale: "Error during screening: quota exceeded",
      confidence: 0,
      next_action_date: null,
      sources: [],
    });
    expect(formatDecisionLine(decision)).toBe(
      "REVIEW | 0.00 | Acme Family Foundation\n    Error during screening: quota exceeded",
    );
  });
});

describe("formatScreeningReport", () => {
  const accept = makeDecision();
  const reject = makeDecision(
    {
      classification: "REJECT",
      rationale: "Red flags: R1a. Green flags: 0/8. Closed.",
      confidence: 0.9,
      next_action_date: null,
      sources: [],
    },
    { foundation_name: "Beta Fund" },
  );

  const summary: BacklogRunSummary = {
    decisions: [reject, accept],
    skipped: ["Gamma Trust"],
    persisted: 1,
    write_failures: [{ foundation_name: "Beta Fund", error: "disk full" }],
    counts: { ACCEPT: 1, REVIEW: 0, REJECT: 1 },
  };

  it("groups decisions in ACCEPT, REVIEW, REJECT order", () => {
    const lines = formatScreeningReport(summary).split("\n");
    expect(lines[0]).toBe("== ACCEPT (1) ==");
    expect(lines).toContain("== REJECT (1) ==");
    expect(lines).not.toContain("== REVIEW (0) ==");
    expect(lines.indexOf("== REJECT (1) ==")).toBeGreaterThan(lines.indexOf("== ACCEPT (1) =="));
  });

  it("ends with totals and write failures", () => {
    const report = formatScreeningReport(summary);
    const tail = report.slice(report.indexOf("Summary")).split("\n");
    expect(tail).toEqual([
      "Summary",
      "  Screened  : 2",
      "  Skipped   : 1",
      "  Persisted : 1",
      "  ACCEPT    : 1 (50%)",
      "  REVIEW    : 0 (0%)",
      "  REJECT    : 1 (50%)",
      "Write failures:",
      "  - Beta Fund: disk full",
    ]);
  });

  it("reports zero percentages for an empty run", () => {
    const report = formatScreeningReport({
      decisions: [],
      skipped: [],
      persisted: 0,
      write_failures: [],
      counts: { ACCEPT: 0, REVIEW: 0, REJECT: 0 },
    });
    expect(report.split("\n")[0]).toBe("Summary");
    expect(report).toContain("  ACCEPT    : 0 (0%)");
  });
});
