import { describe, it, expect, vi, beforeEach } from "vitest";
import axios from "axios";
import { SerpApiClient, parseOrganicResults } from "../src/data-sources/serpapi-client.js";
import { ConfigurationError } from "../src/core/errors.js";
import { makeSearchConfig } from "./fixtures.js";

vi.mock("axios");
const mockedAxios = vi.mocked(axios, true);

function httpError(status: number): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    response: { status },
  });
}

describe("parseOrganicResults", () => {
  it("maps organic results and fills missing fields", () => {
    const hits = parseOrganicResults({
      organic_results: [
        { title: "Acme", snippet: "Funds STEM", link: "https://acme.org" },
        { title: "Partial" },
        "junk",
      ],
    });
    expect(hits).toEqual([
      { title: "Acme", snippet: "Funds STEM", link: "https://acme.org" },
      { title: "Partial", snippet: "", link: "" },
    ]);
  });

  it("treats the no-results error as an empty page", () => {
    expect(
      parseOrganicResults({ error: "Google hasn't returned any results for this query." }),
    ).toEqual([]);
  });

  it("returns nothing when organic_results is missing", () => {
    expect(parseOrganicResults({ search_metadata: {} })).toEqual([]);
  });

  it("throws on other API errors and non-object bodies", () => {
    expect(() => parseOrganicResults({ error: "Invalid API key." })).toThrow(
      "SerpAPI error: Invalid API key.",
    );
    expect(() => parseOrganicResults("<html>")).toThrow(
      "SerpAPI returned a non-object response",
    );
  });
});

describe("SerpApiClient", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("requires an API key", () => {
    expect(() => new SerpApiClient(makeSearchConfig({ serpApiKey: undefined }))).toThrow(
      ConfigurationError,
    );
  });

  it("queries Google through SerpAPI", async () => {
    mockedAxios.get.mockResolvedValueOnce({
      data: {
        organic_results: [{ title: "Acme", snippet: "Funds STEM", link: "https://acme.org" }],
      },
    });

    const client = new SerpApiClient(makeSearchConfig());
    const hits = await client.search("Acme site:candid.org", 5);

    expect(hits).toEqual([{ title: "Acme", snippet: "Funds STEM", link: "https://acme.org" }]);
    expect(mockedAxios.get).toHaveBeenCalledWith("https://serpapi.com/search.json", {
      params: {
        engine: "google",
        q: "Acme site:candid.org",
        api_key: "test-serpapi-key",
        num: 5,
        gl: "us",
        hl: "en",
      },
      timeout: 30000,
    });
  });

  it("retries rate-limited and server errors", async () => {
    mockedAxios.isAxiosError.mockReturnValue(true);
    mockedAxios.get
      .mockRejectedValueOnce(httpError(429))
      .mockRejectedValueOnce(httpError(503))
      .mockResolvedValueOnce({ data: { organic_results: [] } });

    const client = new SerpApiClient(makeSearchConfig({ maxRetries: 2, retryBackoffMs: 1 }));
    const hits = await client.search("Acme", 5);

    expect(hits).toEqual([]);
    expect(mockedAxios.get).toHaveBeenCalledTimes(3);
  });

  it("gives up after the last retry", async () => {
    mockedAxios.isAxiosError.mockReturnValue(true);
    mockedAxios.get.mockRejectedValue(httpError(500));

    const client = new SerpApiClient(makeSearchConfig({ maxRetries: 1, retryBackoffMs: 1 }));

    await expect(client.search("Acme", 5)).rejects.toThrow(
      "Request failed with status code 500",
    );
    expect(mockedAxios.get).toHaveBeenCalledTimes(2);
    mockedAxios.get.mockReset();
  });

  it("does not retry client errors", async () => {
    mockedAxios.isAxiosError.mockReturnValue(true);
    mockedAxios.get.mockRejectedValueOnce(httpError(401));

    const client = new SerpApiClient(makeSearchConfig({ maxRetries: 2, retryBackoffMs: 1 }));

    await expect(client.search("Acme", 5)).rejects.toThrow(
      "Request failed with status code 401",
    );
    expect(mockedAxios.get).toHaveBeenCalledTimes(1);
  });

  it("does not retry payload errors", async () => {
    mockedAxios.isAxiosError.mockReturnValue(false);
    mockedAxios.get.mockResolvedValueOnce({ data: { error: "Invalid API key." } });

    const client = new SerpApiClient(makeSearchConfig({ maxRetries: 2, retryBackoffMs: 1 }));

    await expect(client.search("Acme", 5)).rejects.toThrow("SerpAPI error: Invalid API key.");
    expect(mockedAxios.get).toHaveBeenCalledTimes(1);
  });
});
