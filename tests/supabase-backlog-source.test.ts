import { describe, it, expect, vi, beforeEach } from "vitest";
import { SupabaseBacklogSource } from "../src/data-sources/supabase-backlog-source.js";

interface FakeResult {
  data: unknown;
  error: { message: string } | null;
}

interface FakeQuery {
  select(columns: string): FakeQuery;
  eq(column: string, value: unknown): FakeQuery;
  limit(count: number): FakeQuery;
  range(from: number, to: number): FakeQuery;
  then(resolve: (result: FakeResult) => void, reject: (err: unknown) => void): void;
}

// PostgREST builders are thenables; each await takes the next queued result.
const supabase = vi.hoisted(() => {
  const calls: Array<[string, unknown[]]> = [];
  const results: FakeResult[] = [];

  const query: FakeQuery = {
    select(...args) {
      calls.push(["select", args]);
      return query;
    },
    eq(...args) {
      calls.push(["eq", args]);
      return query;
    },
    limit(...args) {
      calls.push(["limit", args]);
      return query;
    },
    range(...args) {
      calls.push(["range", args]);
      return query;
    },
    then(resolve, reject) {
      Promise.resolve(results.shift() ?? { data: [], error: null }).then(resolve, reject);
    },
  };

  const client = {
    from(table: string) {
      calls.push(["from", [table]]);
      return query;
    },
  };

  return { calls, results, client, createClient: vi.fn(() => client) };
});

vi.mock("@supabase/supabase-js", () => ({ createClient: supabase.createClient }));

function makeSource(): SupabaseBacklogSource {
  return SupabaseBacklogSource.fromConfig({
    url: "https://example.supabase.co",
    serviceRoleKey: "test-secret",
    table: "opportunities",
  });
}

describe("SupabaseBacklogSource", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    supabase.calls.length = 0;
    supabase.results.length = 0;
  });

  it("creates a client without session persistence", () => {
    makeSource();
    expect(supabase.createClient).toHaveBeenCalledWith(
      "https://example.supabase.co",
      "test-secret",
      { auth: { persistSession: false } },
    );
  });

  it("fetches the stage with a limit and maps rows", async () => {
    supabase.results.push({
      data: [
        {
          Id: "006A",
          Name: "Acme LOI",
          Corporate_Kanban_Sort__c: "~Acme Family Foundation",
          Amount: 10000,
          Grant_Requirements_Website__c: null,
          Grant_Focus__c: "STEM",
          StageName: "LOI Backlog",
        },
        "not a row",
      ],
      error: null,
    });

    const candidates = await makeSource().fetchCandidates({ stage: "LOI Backlog", limit: 10 });

    expect(supabase.calls).toEqual([
      ["from", ["opportunities"]],
      [
        "select",
        ["Id, Name, Corporate_Kanban_Sort__c, Amount, Grant_Requirements_Website__c, Grant_Focus__c, StageName"],
      ],
      ["eq", ["StageName", "LOI Backlog"]],
      ["limit", [10]],
    ]);
    expect(candidates).toHaveLength(1);
    expect(candidates[0].foundation_name).toBe("Acme Family Foundation");
    expect(candidates[0].search_name).toBe("Acme Family");
    expect(candidates[0].website).toBeNull();
  });

  it("surfaces query errors", async () => {
    supabase.results.push({ data: null, error: { message: "permission denied" } });
    await expect(makeSource().fetchCandidates({ stage: "LOI Backlog" })).rejects.toThrow(
      "Backlog query failed: permission denied",
    );
  });

  it("pages through stages to count them", async () => {
    const firstPage = [
      ...Array.from({ length: 600 }, () => ({ StageName: "LOI Backlog" })),
      ...Array.from({ length: 400 }, () => ({ StageName: "Submitted" })),
    ];
    supabase.results.push({ data: firstPage, error: null });
    supabase.results.push({ data: [{ StageName: "Submitted" }], error: null });

    const counts = await makeSource().countByStage();

    expect(counts).toEqual([
      { stage: "LOI Backlog", count: 600 },
      { stage: "Submitted", count: 401 },
    ]);
    expect(supabase.calls.filter(([method]) => method === "range")).toEqual([
      ["range", [0, 999]],
      ["range", [1000, 1999]],
    ]);
  });
});
