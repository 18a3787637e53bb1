import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { Candidate } from "../domain/screening/types.js";
import {
  candidateFromRow,
  validateTableName,
  type BacklogQuery,
  type BacklogSource,
  type StageCount,
} from "../domain/screening/backlog.js";
import { logDebug } from "../core/logging.js";

const SELECT_COLUMNS =
  "Id, Name, Corporate_Kanban_Sort__c, Amount, Grant_Requirements_Website__c, Grant_Focus__c, StageName";
const PAGE_SIZE = 1000;

export interface SupabaseBacklogConfig {
  url: string;
  serviceRoleKey: string;
  table: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRecords(data: unknown): Record<string, unknown>[] {
  return Array.isArray(data) ? data.filter(isRecord) : [];
}

/** Backlog table hosted in Supabase (Postgres), read through PostgREST. */
export class SupabaseBacklogSource implements BacklogSource {
  private client: SupabaseClient;
  private table: string;

  constructor(client: SupabaseClient, table: string) {
    this.client = client;
    this.table = validateTableName(table);
  }

  static fromConfig(config: SupabaseBacklogConfig): SupabaseBacklogSource {
    const client = createClient(config.url, config.serviceRoleKey, {
      auth: { persistSession: false },
    });
    return new SupabaseBacklogSource(client, config.table);
  }

  async fetchCandidates(query: BacklogQuery): Promise<Candidate[]> {
    let request = this.client
      .from(this.table)
      .select(SELECT_COLUMNS)
      .eq("StageName", query.stage);
    if (query.limit !== undefined) {
      request = request.limit(query.limit);
    }

    const { data, error } = await request;
    if (error) {
      throw new Error(`Backlog query failed: ${error.message}`);
    }
    const rows = toRecords(data);
    logDebug(`Supabase backlog: ${rows.length} row(s) in stage "${query.stage}"`);
    return rows.map(candidateFromRow);
  }

  // PostgREST has no GROUP BY, so stage names are paged in and counted here.
  async countByStage(): Promise<StageCount[]> {
    const counts = new Map<string, number>();

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.client
        .from(this.table)
        .select("StageName")
        .range(from, from + PAGE_SIZE - 1);
      if (error) {
        throw new Error(`Backlog count failed: ${error.message}`);
      }
      const rows = toRecords(data);
      for (const row of rows) {
        const stage = typeof row.StageName === "string" ? row.StageName : "";
        counts.set(stage, (counts.get(stage) ?? 0) + 1);
      }
      if (rows.length < PAGE_SIZE) break;
    }

    return [...counts.entries()]
      .map(([stage, count]) => ({ stage, count }))
      .sort((a, b) => b.count - a.count || a.stage.localeCompare(b.stage));
  }
}
