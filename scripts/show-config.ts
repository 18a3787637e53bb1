#!/usr/bin/env npx tsx
/**
 * Validate the rule document and print the rule set in force.
 * Exits non-zero when the document is invalid.
 *
 * Usage:
 *   npx tsx scripts/show-config.ts
 */

import { loadConfig, loadRuleConfiguration } from "../src/core/config.js";
import { effectiveRedFlags } from "../src/domain/screening/rule-config.js";
import { getErrorMessage } from "../src/core/logging.js";

function main() {
  const config = loadConfig();
  const rules = loadRuleConfiguration(config.rulesPath, config.organization);
  const { organization } = rules;

  console.log(`Rule document: ${config.rulesPath}`);
  console.log(`Organization : ${organization.name}, ${organization.mission}`);
  console.log(`Region       : ${organization.region} (${organization.targetLocalities})`);
  if (rules.customContext) console.log(`Context      : ${rules.customContext}`);

  console.log("\nRed flags:");
  for (const flag of effectiveRedFlags(rules)) console.log(`  ${flag.label}. ${flag.text}`);

  console.log("\nGreen flags:");
  for (const flag of rules.greenFlags) console.log(`  ${flag.label}. ${flag.text}`);

  console.log(`\nACCEPT needs ${rules.greenThreshold}/${rules.greenFlags.length} green flags and no red flag.`);
}

try {
  main();
} catch (err) {
  console.error(getErrorMessage(err));
  process.exit(1);
}
