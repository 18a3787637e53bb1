#!/usr/bin/env npx tsx
/**
 * Delete all saved decisions so the next run screens every funder again.
 *
 * Usage:
 *   npx tsx scripts/clear-decisions.ts --yes
 */

import { parseArgs } from "util";
import { loadConfig } from "../src/core/config.js";
import { ensureSqlJs } from "../src/data-sources/sqlite-adapter.js";
import { DecisionStore } from "../src/data-sources/decision-store.js";
import { getErrorMessage } from "../src/core/logging.js";

async function main() {
  const { values } = parseArgs({ options: { yes: { type: "boolean" } } });
  if (!values.yes) {
    console.error("Refusing to clear decisions without --yes");
    process.exit(1);
  }

  const config = loadConfig();
  await ensureSqlJs();
  const store = new DecisionStore(config.dataDir);
  store.initialize();
  try {
    const removed = store.clearResults();
    console.log(`Cleared ${removed} decision(s) from ${config.dataDir}`);
  } finally {
    store.close();
  }
}

main().catch((err) => {
  console.error(`Clear failed: ${getErrorMessage(err)}`);
  process.exit(1);
});
