import axios from "axios";
import { RateLimiter } from "../core/rate-limiter.js";
import { ConfigurationError } from "../core/errors.js";
import { logWarn, getErrorMessage } from "../core/logging.js";
import type { SearchConfig } from "../core/config.js";
import type { SearchHit } from "../domain/screening/types.js";
import type { SearchProvider } from "../domain/evidence/evidence-aggregator.js";

const SERPAPI_URL = "https://serpapi.com/search.json";

// SerpAPI answers an empty result page with HTTP 200 and this error text.
const NO_RESULTS_PATTERN = /hasn't returned any results/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/** Narrow a search.json payload to its organic results. */
export function parseOrganicResults(data: unknown): SearchHit[] {
  if (!isRecord(data)) {
    throw new Error("SerpAPI returned a non-object response");
  }
  if (typeof data.error === "string") {
    if (NO_RESULTS_PATTERN.test(data.error)) return [];
    throw new Error(`SerpAPI error: ${data.error}`);
  }
  const organic = data.organic_results;
  if (!Array.isArray(organic)) return [];

  const hits: SearchHit[] = [];
  for (const item of organic) {
    if (!isRecord(item)) continue;
    hits.push({
      title: str(item.title),
      snippet: str(item.snippet),
      link: str(item.link),
    });
  }
  return hits;
}

function isRetryable(error: unknown): boolean {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) return status === 429 || status >= 500;
    return true; // network failure or timeout
  }
  return false;
}

/** Google web search through SerpAPI. */
export class SerpApiClient implements SearchProvider {
  private apiKey: string;
  private config: SearchConfig;
  private rateLimiter: RateLimiter;

  constructor(config: SearchConfig) {
    if (!config.serpApiKey) {
      throw new ConfigurationError("SERPAPI_KEY not set in environment");
    }
    this.apiKey = config.serpApiKey;
    this.config = config;
    this.rateLimiter = new RateLimiter(config.rateLimitMs, "SerpAPI");
  }

  async search(query: string, num: number): Promise<SearchHit[]> {
    const params = {
      engine: "google",
      q: query,
      api_key: this.apiKey,
      num,
      gl: "us",
      hl: "en",
    };

    let lastError: unknown = null;
    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      await this.rateLimiter.waitIfNeeded();
      try {
        const response = await axios.get<unknown>(SERPAPI_URL, {
          params,
          timeout: this.config.timeoutMs,
        });
        return parseOrganicResults(response.data);
      } catch (error: unknown) {
        lastError = error;
        if (!isRetryable(error) || attempt === this.config.maxRetries) break;

        const backoffMs = this.config.retryBackoffMs * Math.pow(2, attempt);
        logWarn(
          `Retry ${attempt + 1}/${this.config.maxRetries} for SerpAPI query in ${backoffMs}ms: ${getErrorMessage(error)}`,
        );
        await new Promise<void>((r) => setTimeout(r, backoffMs));
      }
    }

    throw lastError instanceof Error
      ? lastError
      : new Error(`SerpAPI query failed: ${String(lastError)}`);
  }
}
