import { loadConfig, loadRuleConfiguration, type AppConfig, type BacklogConfig } from "../core/config.js";
import type { RuleConfiguration } from "../domain/screening/types.js";
import type { BacklogSource } from "../domain/screening/backlog.js";
import { EvidenceAggregator } from "../domain/evidence/evidence-aggregator.js";
import {
  ScreeningPipeline,
  type ResultSink,
} from "../domain/screening/screening-pipeline.js";
import { SerpApiClient } from "../data-sources/serpapi-client.js";
import { GeminiClient } from "../data-sources/gemini-client.js";
import { DecisionStore } from "../data-sources/decision-store.js";
import { SqliteBacklogStore } from "../data-sources/backlog-store.js";
import { SupabaseBacklogSource } from "../data-sources/supabase-backlog-source.js";
import { ensureSqlJs } from "../data-sources/sqlite-adapter.js";
import { ConfigurationError } from "../core/errors.js";
import { logInfo, logError, getErrorMessage } from "../core/logging.js";

export interface ServerContext {
  config: AppConfig;
  rules: RuleConfiguration;
  decisionStore: DecisionStore | undefined;
  backlog: BacklogSource | undefined;
  /** Undefined when search or reasoning credentials are missing. */
  pipeline: ScreeningPipeline | undefined;
  /** Why the pipeline is unavailable, for tool error messages. */
  pipelineError?: string;
}

export async function createBacklogSource(
  config: BacklogConfig,
): Promise<BacklogSource> {
  if (config.source === "supabase") {
    if (!config.supabaseUrl || !config.supabaseKey) {
      throw new ConfigurationError(
        "SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase backlog",
      );
    }
    return SupabaseBacklogSource.fromConfig({
      url: config.supabaseUrl,
      serviceRoleKey: config.supabaseKey,
      table: config.table,
    });
  }

  await ensureSqlJs();
  const store = new SqliteBacklogStore(config.dbPath, config.table);
  store.initialize();
  return store;
}

/**
 * Wire the search and reasoning adapters into a pipeline.
 * Throws ConfigurationError when a credential is missing.
 */
export function createScreeningPipeline(
  config: AppConfig,
  rules: RuleConfiguration,
  sink?: ResultSink,
): ScreeningPipeline {
  const search = new SerpApiClient(config.search);
  const reasoner = new GeminiClient(config.reasoning);
  const evidence = new EvidenceAggregator(search, {
    fallbackKeywords: config.search.fallbackKeywords,
  });
  return new ScreeningPipeline({ rules, evidence, reasoner, sink });
}

/**
 * Create and initialize the full server context.
 * All instantiation + async init happens here (not at module import time).
 * An invalid rule document is fatal; missing API keys only disable screening.
 */
export async function createServerContext(
  config: AppConfig = loadConfig(),
): Promise<ServerContext> {
  // sql.js WASM must load before any SQLite operations
  await ensureSqlJs();

  const rules = loadRuleConfiguration(config.rulesPath, config.organization);
  logInfo(
    `Rules loaded for ${rules.organization.name}: ${rules.redFlags.length} red, ${rules.greenFlags.length} green, threshold ${rules.greenThreshold}`,
  );

  let decisionStore: DecisionStore | undefined;
  try {
    const store = new DecisionStore(config.dataDir);
    store.initialize();
    decisionStore = store;
  } catch (err) {
    logError(
      "DecisionStore initialization failed (persistence disabled):",
      getErrorMessage(err),
    );
  }

  let backlog: BacklogSource | undefined;
  try {
    backlog = await createBacklogSource(config.backlog);
  } catch (err) {
    logError("Backlog source unavailable:", getErrorMessage(err));
  }

  let pipeline: ScreeningPipeline | undefined;
  let pipelineError: string | undefined;
  try {
    pipeline = createScreeningPipeline(config, rules, decisionStore);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    pipelineError = err.message;
    logError("Screening disabled:", err.message);
  }

  return { config, rules, decisionStore, backlog, pipeline, pipelineError };
}

export function closeServerContext(ctx: ServerContext): void {
  ctx.decisionStore?.close();
  ctx.backlog?.close?.();
}
