import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import {
  loadBacklogConfig,
  loadOrganizationProfile,
  loadReasoningConfig,
  loadRuleConfiguration,
  loadSearchConfig,
  validateBacklogConfig,
  type BacklogConfig,
} from "../src/core/config.js";
import { ConfigurationError } from "../src/core/errors.js";

const ENV_KEYS = [
  "SERPAPI_KEY",
  "SERPAPI_RATE_LIMIT_MS",
  "SERPAPI_MAX_RETRIES",
  "SERPAPI_RETRY_BACKOFF_MS",
  "SEARCH_FALLBACK_KEYWORDS",
  "REQUEST_TIMEOUT_MS",
  "GEMINI_API_KEY",
  "GEMINI_MODEL",
  "GEMINI_SEARCH_GROUNDING",
  "BACKLOG_SOURCE",
  "BACKLOG_DB_PATH",
  "BACKLOG_LIMIT",
  "DB_TABLE",
  "DB_STAGE_FILTER",
  "SUPABASE_URL",
  "SUPABASE_SERVICE_ROLE_KEY",
  "ORG_NAME",
  "ORG_MISSION",
  "ORG_STATE",
  "ORG_TARGET_CITIES",
];

function sqliteBacklog(overrides: Partial<BacklogConfig> = {}): BacklogConfig {
  return {
    source: "sqlite",
    dbPath: "/tmp/backlog.db",
    table: "opportunities",
    stageFilter: "LOI Backlog",
    ...overrides,
  };
}

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err.problems;
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

beforeEach(() => {
  for (const key of ENV_KEYS) vi.stubEnv(key, "");
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("loadSearchConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadSearchConfig()).toEqual({
      serpApiKey: undefined,
      rateLimitMs: 1000,
      timeoutMs: 30000,
      maxRetries: 2,
      retryBackoffMs: 1000,
      fallbackKeywords: ["foundation", "grants"],
    });
  });

  it("clamps retries and ignores non-numeric values", () => {
    vi.stubEnv("SERPAPI_MAX_RETRIES", "9");
    vi.stubEnv("SERPAPI_RETRY_BACKOFF_MS", "abc");
    const config = loadSearchConfig();
    expect(config.maxRetries).toBe(5);
    expect(config.retryBackoffMs).toBe(1000);
  });

  it("splits fallback keywords", () => {
    vi.stubEnv("SEARCH_FALLBACK_KEYWORDS", "grants, funding ,,");
    expect(loadSearchConfig().fallbackKeywords).toEqual(["grants", "funding"]);
  });

  it("reads the API key", () => {
    vi.stubEnv("SERPAPI_KEY", " test-serpapi-key ");
    expect(loadSearchConfig().serpApiKey).toBe("test-serpapi-key");
  });
});

describe("loadReasoningConfig", () => {
  it("defaults to grounded gemini-2.5-flash", () => {
    expect(loadReasoningConfig()).toEqual({
      geminiApiKey: undefined,
      model: "gemini-2.5-flash",
      searchGrounding: true,
      timeoutMs: 120000,
    });
  });

  it("turns grounding off", () => {
    vi.stubEnv("GEMINI_SEARCH_GROUNDING", "false");
    vi.stubEnv("GEMINI_MODEL", "gemini-2.5-pro");
    const config = loadReasoningConfig();
    expect(config.searchGrounding).toBe(false);
    expect(config.model).toBe("gemini-2.5-pro");
  });
});

describe("loadBacklogConfig", () => {
  it("defaults to a SQLite backlog in the data directory", () => {
    expect(loadBacklogConfig("/data")).toEqual({
      source: "sqlite",
      dbPath: path.join("/data", "backlog.db"),
      table: "opportunities",
      stageFilter: "LOI Backlog",
      limit: undefined,
      supabaseUrl: undefined,
      supabaseKey: undefined,
    });
  });

  it("reads a positive limit and ignores zero", () => {
    vi.stubEnv("BACKLOG_LIMIT", "25");
    expect(loadBacklogConfig("/data").limit).toBe(25);
    vi.stubEnv("BACKLOG_LIMIT", "0");
    expect(loadBacklogConfig("/data").limit).toBeUndefined();
  });

  it("rejects an unknown source", () => {
    vi.stubEnv("BACKLOG_SOURCE", "mysql");
    expect(problemsOf(() => loadBacklogConfig("/data"))).toEqual([
      'BACKLOG_SOURCE must be "sqlite" or "supabase", got "mysql"',
    ]);
  });
});

describe("validateBacklogConfig", () => {
  it("accepts a valid SQLite config", () => {
    expect(() => validateBacklogConfig(sqliteBacklog())).not.toThrow();
  });

  it("reports every problem at once", () => {
    expect(
      problemsOf(() =>
        validateBacklogConfig(sqliteBacklog({ table: "opps; DROP", stageFilter: "" })),
      ),
    ).toEqual([
      'DB_TABLE must be a plain identifier, got "opps; DROP"',
      "DB_STAGE_FILTER must not be empty",
    ]);
  });

  it("requires Supabase credentials", () => {
    expect(problemsOf(() => validateBacklogConfig(sqliteBacklog({ source: "supabase" })))).toEqual([
      "SUPABASE_URL is required for the supabase backlog",
      "SUPABASE_SERVICE_ROLE_KEY is required for the supabase backlog",
    ]);
  });

  it("requires an https Supabase URL", () => {
    expect(
      problemsOf(() =>
        validateBacklogConfig(
          sqliteBacklog({
            source: "supabase",
            supabaseUrl: "http://example.supabase.co",
            supabaseKey: "test-secret",
          }),
        ),
      ),
    ).toEqual(["SUPABASE_URL must start with https://"]);
  });
});

describe("loadOrganizationProfile", () => {
  it("reads ORG_* variables over defaults", () => {
    vi.stubEnv("ORG_NAME", "Code Club");
    vi.stubEnv("ORG_STATE", "PA");
    expect(loadOrganizationProfile()).toEqual({
      name: "Code Club",
      mission: "providing STEM education to underserved youth",
      region: "PA",
      targetLocalities: "local cities",
    });
  });
});

describe("loadRuleConfiguration", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "rule-config-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("falls back to the built-in rules when no document exists", () => {
    const rules = loadRuleConfiguration(path.join(tmpDir, "missing.json"), {
      name: "Code Club",
      mission: "teaching coding",
      region: "PA",
      targetLocalities: "Philadelphia",
    });
    expect(rules.organization.name).toBe("Code Club");
    expect(rules.redFlags[2].text).toBe("Only funds a state that is not PA");
    expect(rules.greenThreshold).toBe(4);
  });

  it("reads a rule document", () => {
    const file = path.join(tmpDir, "screener_config.json");
    fs.writeFileSync(
      file,
      JSON.stringify({
        org: { name: "Code Club", mission: "teaching coding", state: "PA" },
        grant_size: { min: 5000, max: 50000 },
        green_threshold: 1,
        red_flags: ["R1a. Closed", "R1b. Invitation only"],
        green_flags: ["G1. Funds STEM"],
      }),
    );

    const rules = loadRuleConfiguration(file);
    expect(rules.grantSizeBounds).toEqual({ min: 5000, max: 50000 });
    expect(rules.greenFlags).toEqual([{ label: "G1", text: "Funds STEM" }]);
  });

  it("fails on unreadable JSON", () => {
    const file = path.join(tmpDir, "broken.json");
    fs.writeFileSync(file, "{ not json");
    expect(() => loadRuleConfiguration(file)).toThrow(/Cannot read rule document/);
  });

  it("fails on an invalid document", () => {
    const file = path.join(tmpDir, "invalid.json");
    fs.writeFileSync(
      file,
      JSON.stringify({ org: { name: "Code Club" }, red_flags: [], green_flags: ["G1. x"] }),
    );
    expect(problemsOf(() => loadRuleConfiguration(file))).toEqual([
      "Red flag R1a (closed / not accepting) is required",
      "Red flag R1b (invitation only) is required",
      "green_threshold 4 exceeds the 1 green flag(s); ACCEPT would be unreachable",
    ]);
  });
});
