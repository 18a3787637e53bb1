import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import type {
  OrganizationProfile,
  RuleConfiguration,
} from "../domain/screening/types.js";
import {
  DEFAULT_ORGANIZATION,
  buildDefaultRuleConfiguration,
  parseRuleDocument,
} from "../domain/screening/rule-config.js";
import { TABLE_NAME_PATTERN } from "../domain/screening/backlog.js";
import { ConfigurationError } from "./errors.js";
import { getErrorMessage, logInfo } from "./logging.js";

// Load environment variables
dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = path.resolve(__dirname, "../..");

export interface SearchConfig {
  serpApiKey?: string;
  rateLimitMs: number;
  timeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  fallbackKeywords: string[];
}

export interface ReasoningConfig {
  geminiApiKey?: string;
  model: string;
  searchGrounding: boolean;
  timeoutMs: number;
}

export type BacklogSourceKind = "sqlite" | "supabase";

export interface BacklogConfig {
  source: BacklogSourceKind;
  dbPath: string;
  table: string;
  stageFilter: string;
  limit?: number;
  supabaseUrl?: string;
  supabaseKey?: string;
}

export interface AppConfig {
  search: SearchConfig;
  reasoning: ReasoningConfig;
  backlog: BacklogConfig;
  organization: OrganizationProfile;
  dataDir: string;
  rulesPath: string;
}

function envNum(
  key: string,
  fallback: number,
  validate: (n: number) => boolean,
): number {
  const val = process.env[key];
  if (val === undefined || val.trim() === "") return fallback;
  const parsed = Number(val);
  return validate(parsed) ? parsed : fallback;
}

function envInt(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isInteger);
}

function envString(key: string): string | undefined {
  const val = process.env[key]?.trim();
  return val ? val : undefined;
}

function envFlag(key: string, fallback: boolean): boolean {
  const val = (process.env[key] ?? "").trim().toLowerCase();
  if (val === "") return fallback;
  return !["false", "0", "no", "off"].includes(val);
}

function envList(key: string): string[] | undefined {
  const raw = envString(key);
  if (!raw) return undefined;
  const items = raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
}

const DEFAULT_FALLBACK_KEYWORDS = ["foundation", "grants"];
const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

export function loadSearchConfig(): SearchConfig {
  return {
    serpApiKey: envString("SERPAPI_KEY"),
    rateLimitMs: Math.max(0, envInt("SERPAPI_RATE_LIMIT_MS", 1000)),
    timeoutMs: Math.max(1000, envInt("REQUEST_TIMEOUT_MS", 30_000)),
    maxRetries: Math.max(0, Math.min(5, envInt("SERPAPI_MAX_RETRIES", 2))),
    retryBackoffMs: Math.max(100, envInt("SERPAPI_RETRY_BACKOFF_MS", 1000)),
    fallbackKeywords:
      envList("SEARCH_FALLBACK_KEYWORDS") ?? DEFAULT_FALLBACK_KEYWORDS,
  };
}

export function loadReasoningConfig(): ReasoningConfig {
  return {
    geminiApiKey: envString("GEMINI_API_KEY"),
    model: envString("GEMINI_MODEL") ?? DEFAULT_GEMINI_MODEL,
    searchGrounding: envFlag("GEMINI_SEARCH_GROUNDING", true),
    // Grounded generation routinely takes longer than a search call
    timeoutMs: Math.max(1000, envInt("REQUEST_TIMEOUT_MS", 120_000)),
  };
}

export function loadBacklogConfig(dataDir: string): BacklogConfig {
  const rawSource = (envString("BACKLOG_SOURCE") ?? "sqlite").toLowerCase();
  const limit = envInt("BACKLOG_LIMIT", 0);
  const config: BacklogConfig = {
    source: rawSource === "supabase" ? "supabase" : "sqlite",
    dbPath: envString("BACKLOG_DB_PATH") ?? path.join(dataDir, "backlog.db"),
    table: envString("DB_TABLE") ?? "opportunities",
    stageFilter: envString("DB_STAGE_FILTER") ?? "LOI Backlog",
    limit: limit > 0 ? limit : undefined,
    supabaseUrl: envString("SUPABASE_URL"),
    supabaseKey: envString("SUPABASE_SERVICE_ROLE_KEY"),
  };
  validateBacklogConfig(config, rawSource);
  return config;
}

/**
 * Validate backlog settings at startup. Every problem is reported at once.
 */
export function validateBacklogConfig(
  config: BacklogConfig,
  rawSource: string = config.source,
): void {
  const errors: string[] = [];

  if (rawSource !== "sqlite" && rawSource !== "supabase") {
    errors.push(`BACKLOG_SOURCE must be "sqlite" or "supabase", got "${rawSource}"`);
  }
  if (!TABLE_NAME_PATTERN.test(config.table)) {
    errors.push(`DB_TABLE must be a plain identifier, got "${config.table}"`);
  }
  if (!config.stageFilter) {
    errors.push("DB_STAGE_FILTER must not be empty");
  }
  if (config.source === "supabase") {
    if (!config.supabaseUrl) errors.push("SUPABASE_URL is required for the supabase backlog");
    else if (!config.supabaseUrl.startsWith("https://"))
      errors.push("SUPABASE_URL must start with https://");
    if (!config.supabaseKey)
      errors.push("SUPABASE_SERVICE_ROLE_KEY is required for the supabase backlog");
  }

  if (errors.length > 0) {
    throw new ConfigurationError("Invalid backlog config", errors);
  }
}

export function loadOrganizationProfile(): OrganizationProfile {
  return {
    name: envString("ORG_NAME") ?? DEFAULT_ORGANIZATION.name,
    mission: envString("ORG_MISSION") ?? DEFAULT_ORGANIZATION.mission,
    region: envString("ORG_STATE") ?? DEFAULT_ORGANIZATION.region,
    targetLocalities:
      envString("ORG_TARGET_CITIES") ?? DEFAULT_ORGANIZATION.targetLocalities,
  };
}

/**
 * Read the rule document at `filePath`. Without one, the built-in rule set
 * is used with the given organization profile.
 */
export function loadRuleConfiguration(
  filePath: string,
  organization: OrganizationProfile = DEFAULT_ORGANIZATION,
): RuleConfiguration {
  if (!fs.existsSync(filePath)) {
    logInfo(`No rule document at ${filePath}; using built-in rules`);
    return buildDefaultRuleConfiguration(organization);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read rule document ${filePath}`, [
      getErrorMessage(err),
    ]);
  }
  return parseRuleDocument(raw);
}

/**
 * Loads full application config
 */
export function loadConfig(): AppConfig {
  const dataDir = path.resolve(
    envString("DATA_DIR") ?? path.join(PROJECT_ROOT, "data"),
  );
  return {
    search: loadSearchConfig(),
    reasoning: loadReasoningConfig(),
    backlog: loadBacklogConfig(dataDir),
    organization: loadOrganizationProfile(),
    dataDir,
    rulesPath: path.resolve(
      envString("SCREENER_CONFIG") ?? path.join(PROJECT_ROOT, "screener_config.json"),
    ),
  };
}
