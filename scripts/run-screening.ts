#!/usr/bin/env npx tsx
/**
 * Screen the grant backlog and print a report.
 *
 * Reads opportunities in the configured stage (DB_STAGE_FILTER), skips
 * funders already in the decision store, and saves each decision as it is
 * made, so an interrupted run can simply be started again.
 *
 * Usage:
 *   npx tsx scripts/run-screening.ts [--limit N] [--stage "LOI Backlog"]
 *
 * Required env vars:
 *   SERPAPI_KEY     - SerpAPI key for evidence search
 *   GEMINI_API_KEY  - Gemini API key
 */

import { parseArgs } from "util";
import { loadConfig, loadRuleConfiguration } from "../src/core/config.js";
import { ensureSqlJs } from "../src/data-sources/sqlite-adapter.js";
import { DecisionStore } from "../src/data-sources/decision-store.js";
import {
  createBacklogSource,
  createScreeningPipeline,
} from "../src/server/context.js";
import {
  formatDecisionLine,
  formatScreeningReport,
} from "../src/domain/screening/report.js";
import { getErrorMessage } from "../src/core/logging.js";

async function main() {
  const { values } = parseArgs({
    options: {
      limit: { type: "string" },
      stage: { type: "string" },
    },
  });

  const config = loadConfig();
  const rules = loadRuleConfiguration(config.rulesPath, config.organization);
  const stage = values.stage ?? config.backlog.stageFilter;
  const limit = values.limit ? Number.parseInt(values.limit, 10) : config.backlog.limit;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new Error(`--limit must be a positive integer, got "${values.limit}"`);
  }

  await ensureSqlJs();
  const store = new DecisionStore(config.dataDir);
  store.initialize();
  const backlog = await createBacklogSource(config.backlog);

  try {
    const pipeline = createScreeningPipeline(config, rules, store);

    console.log(`=== Grant Screening: ${rules.organization.name} ===`);
    console.log(`Stage: ${stage}${limit ? ` (limit ${limit})` : ""}\n`);

    const candidates = await backlog.fetchCandidates({ stage, limit });
    console.log(`Fetched ${candidates.length} opportunit${candidates.length === 1 ? "y" : "ies"}\n`);

    const summary = await pipeline.runBacklog(candidates, {
      onDecision: (decision, progress) => {
        console.log(`[${progress.index + 1}/${progress.total}] ${formatDecisionLine(decision)}`);
        if (!progress.persisted) console.log("    (not saved)");
      },
    });

    console.log(`\n${formatScreeningReport(summary)}`);
  } finally {
    store.close();
    backlog.close?.();
  }
}

main().catch((err) => {
  console.error(`Screening failed: ${getErrorMessage(err)}`);
  process.exit(1);
});
