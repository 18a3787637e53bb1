import type { Candidate } from "./types.js";
import { cleanSearchName, normalizeFoundationName } from "./name-normalizer.js";
import { ConfigurationError } from "../../core/errors.js";

// Column names follow the CRM export the backlog table is loaded from.
export const BACKLOG_COLUMNS = [
  "Id",
  "Name",
  "Corporate_Kanban_Sort__c",
  "Amount",
  "Grant_Requirements_Website__c",
  "Grant_Focus__c",
  "StageName",
] as const;

export interface BacklogQuery {
  stage: string;
  limit?: number;
}

export interface StageCount {
  stage: string;
  count: number;
}

/** Read-only source of grant opportunities awaiting screening. */
export interface BacklogSource {
  fetchCandidates(query: BacklogQuery): Promise<Candidate[]>;
  countByStage(): Promise<StageCount[]>;
  close?(): void;
}

function text(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "bigint") return String(value);
  return "";
}

function optionalText(value: unknown): string | null {
  const t = text(value);
  return t ? t : null;
}

function amount(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.replace(/[$,\s]/g, ""));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Map a backlog row to a Candidate. The sort field carries the funder name
 * (usually "~Foundation Name"); the opportunity name is the fallback.
 */
export function candidateFromRow(row: Record<string, unknown>): Candidate {
  const name = text(row.Name);
  const foundationRaw = text(row.Corporate_Kanban_Sort__c) || name;
  const foundationName = normalizeFoundationName(foundationRaw);

  return {
    id: text(row.Id),
    name,
    foundation_name: foundationName,
    search_name: cleanSearchName(foundationName),
    amount: amount(row.Amount),
    website: optionalText(row.Grant_Requirements_Website__c),
    focus_area: optionalText(row.Grant_Focus__c),
    stage: text(row.StageName),
  };
}

/** Table names are interpolated into SQL, so only plain identifiers pass. */
export const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

export function validateTableName(table: string): string {
  if (!TABLE_NAME_PATTERN.test(table)) {
    throw new ConfigurationError(`Invalid backlog table name: "${table}"`);
  }
  return table;
}
