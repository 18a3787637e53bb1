#!/usr/bin/env npx tsx
/**
 * Print how many backlog opportunities sit in each CRM stage.
 *
 * Usage:
 *   npx tsx scripts/count-backlog.ts
 */

import { loadConfig } from "../src/core/config.js";
import { createBacklogSource } from "../src/server/context.js";
import { getErrorMessage } from "../src/core/logging.js";

async function main() {
  const config = loadConfig();
  const backlog = await createBacklogSource(config.backlog);

  try {
    const stages = await backlog.countByStage();
    const total = stages.reduce((sum, s) => sum + s.count, 0);
    const width = Math.max(5, ...stages.map((s) => s.stage.length));

    console.log(`Backlog table: ${config.backlog.table} (${config.backlog.source})\n`);
    for (const { stage, count } of stages) {
      const marker = stage === config.backlog.stageFilter ? "  <- screened" : "";
      console.log(`  ${(stage || "(none)").padEnd(width)}  ${String(count).padStart(6)}${marker}`);
    }
    console.log(`  ${"Total".padEnd(width)}  ${String(total).padStart(6)}`);
  } finally {
    backlog.close?.();
  }
}

main().catch((err) => {
  console.error(`Count failed: ${getErrorMessage(err)}`);
  process.exit(1);
});
