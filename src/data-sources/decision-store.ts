import path from "path";
import type {
  Citation,
  Classification,
  Decision,
} from "../domain/screening/types.js";
import { CLASSIFICATIONS } from "../domain/screening/types.js";
import type { ResultSink } from "../domain/screening/screening-pipeline.js";
import { displayRationale } from "../domain/screening/rationale.js";
import { logInfo, logWarn, getErrorMessage } from "../core/logging.js";
import {
  SqliteDatabase,
  rowNullableString,
  rowNumber,
  rowString,
  type SqlRow,
} from "./sqlite-adapter.js";

export interface DecisionRecord {
  id: number;
  foundation_name: string;
  candidate_id: string;
  grant_name: string;
  classification: Classification;
  row_color: string;
  confidence: number;
  rationale: string;
  display_rationale: string;
  next_action_date: string | null;
  source_links: string[];
  sources: Citation[];
  upstream_classification: Classification | null;
  screened_at: string;
}

export interface ListDecisionsOptions {
  classification?: Classification;
  since?: string;
  limit?: number;
}

export interface DecisionStats {
  total: number;
  accept: number;
  review: number;
  reject: number;
}

/** Light pastel background per classification, as hex RGB. */
export const ROW_COLORS: Record<Classification, string> = {
  ACCEPT: "#b6d7a8",
  REVIEW: "#fff2cc",
  REJECT: "#ea9999",
};

const DB_FILENAME = "decisions.db";
const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

function toClassification(value: string | null): Classification | null {
  return CLASSIFICATIONS.find((c) => c === value) ?? null;
}

function parseSources(json: string): Citation[] {
  try {
    const parsed: unknown = JSON.parse(json);
    if (!Array.isArray(parsed)) return [];
    const items: unknown[] = parsed;
    const out: Citation[] = [];
    for (const item of items) {
      if (
        typeof item === "object" &&
        item !== null &&
        "url" in item &&
        "label" in item &&
        typeof item.url === "string" &&
        typeof item.label === "string"
      ) {
        out.push({ label: item.label, url: item.url });
      }
    }
    return out;
  } catch (err) {
    logWarn(`Unreadable sources_json: ${getErrorMessage(err)}`);
    return [];
  }
}

/**
 * Result sink backed by SQLite. One row per screened funder; the
 * foundation_name column is what makes re-runs skip work already done.
 */
export class DecisionStore implements ResultSink {
  private db: SqliteDatabase | null = null;
  private dbPath: string | null;

  /** Pass null for an in-memory store. */
  constructor(dataDir: string | null) {
    this.dbPath = dataDir === null ? null : path.join(dataDir, DB_FILENAME);
  }

  initialize(): void {
    this.db = this.dbPath
      ? SqliteDatabase.open(this.dbPath)
      : SqliteDatabase.inMemory();

    // Ignored by sql.js, kept for documentation
    this.db.pragma("journal_mode = WAL");

    this.db.sqlExec(`
      CREATE TABLE IF NOT EXISTS screening_decisions (
        id                      INTEGER PRIMARY KEY AUTOINCREMENT,
        foundation_name         TEXT NOT NULL,
        candidate_id            TEXT NOT NULL,
        grant_name              TEXT NOT NULL,
        classification          TEXT NOT NULL CHECK(classification IN ('ACCEPT','REVIEW','REJECT')),
        row_color               TEXT NOT NULL,
        confidence              REAL NOT NULL,
        rationale               TEXT NOT NULL,
        display_rationale       TEXT NOT NULL,
        next_action_date        TEXT,
        source_links            TEXT NOT NULL DEFAULT '',
        sources_json            TEXT NOT NULL DEFAULT '[]',
        upstream_classification TEXT,
        screened_at             TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_decisions_foundation ON screening_decisions(foundation_name);
      CREATE INDEX IF NOT EXISTS idx_decisions_classification ON screening_decisions(classification);
      CREATE INDEX IF NOT EXISTS idx_decisions_screened_at ON screening_decisions(screened_at);
    `);

    this.db.persist();
    logInfo("DecisionStore initialized");
  }

  saveDecision(decision: Decision): DecisionRecord {
    const db = this.requireDb();

    const info = db
      .prepare(
        `
      INSERT INTO screening_decisions (
        foundation_name, candidate_id, grant_name, classification, row_color,
        confidence, rationale, display_rationale, next_action_date,
        source_links, sources_json, upstream_classification, screened_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `,
      )
      .run(
        decision.candidate.foundation_name.trim(),
        decision.candidate.id,
        decision.candidate.name,
        decision.classification,
        ROW_COLORS[decision.classification],
        decision.confidence,
        decision.rationale,
        displayRationale(decision.rationale),
        decision.next_action_date,
        decision.sources.map((s) => s.label).join("\n"),
        JSON.stringify(decision.sources),
        decision.upstream_classification,
        decision.screened_at,
      );

    const row = db
      .prepare("SELECT * FROM screening_decisions WHERE id = ?")
      .get(info.lastInsertRowid);
    db.persist();

    if (!row) {
      throw new Error(`Decision row ${info.lastInsertRowid} not found after insert`);
    }
    return this.mapRow(row);
  }

  getProcessedNameSet(): Set<string> {
    const rows = this.requireDb()
      .prepare("SELECT DISTINCT foundation_name FROM screening_decisions")
      .all();
    const names = new Set<string>();
    for (const row of rows) {
      const name = rowString(row, "foundation_name").trim();
      if (name) names.add(name);
    }
    return names;
  }

  async getProcessedNames(): Promise<Set<string>> {
    return this.getProcessedNameSet();
  }

  async append(decision: Decision): Promise<void> {
    this.saveDecision(decision);
  }

  getLatestByFoundation(foundationName: string): DecisionRecord | null {
    const row = this.requireDb()
      .prepare(
        "SELECT * FROM screening_decisions WHERE foundation_name = ? ORDER BY screened_at DESC, id DESC LIMIT 1",
      )
      .get(foundationName.trim());
    return row ? this.mapRow(row) : null;
  }

  listDecisions(options?: ListDecisionsOptions): DecisionRecord[] {
    const db = this.requireDb();

    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (options?.classification) {
      conditions.push("classification = ?");
      params.push(options.classification);
    }

    if (options?.since) {
      if (!/^\d{4}-\d{2}-\d{2}/.test(options.since)) {
        throw new Error(
          `Invalid since date format: "${options.since}". Expected ISO 8601 (e.g., "2026-01-01").`,
        );
      }
      conditions.push("screened_at >= ?");
      params.push(options.since);
    }

    const where =
      conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const limit = Math.max(
      1,
      Math.min(options?.limit ?? DEFAULT_LIMIT, MAX_LIMIT),
    );

    const rows = db
      .prepare(
        `SELECT * FROM screening_decisions ${where} ORDER BY screened_at DESC, id DESC LIMIT ?`,
      )
      .all(...params, limit);

    return rows.map((row) => this.mapRow(row));
  }

  getStats(): DecisionStats {
    const row = this.requireDb()
      .prepare(
        `
      SELECT
        COUNT(*) as total,
        SUM(CASE WHEN classification = 'ACCEPT' THEN 1 ELSE 0 END) as accept,
        SUM(CASE WHEN classification = 'REVIEW' THEN 1 ELSE 0 END) as review,
        SUM(CASE WHEN classification = 'REJECT' THEN 1 ELSE 0 END) as reject
      FROM screening_decisions
    `,
      )
      .get();

    // SUM() over zero rows is NULL, which rowNumber reads as 0
    return row
      ? {
          total: rowNumber(row, "total"),
          accept: rowNumber(row, "accept"),
          review: rowNumber(row, "review"),
          reject: rowNumber(row, "reject"),
        }
      : { total: 0, accept: 0, review: 0, reject: 0 };
  }

  /** Delete every stored decision. Returns the number removed. */
  clearResults(): number {
    const db = this.requireDb();
    const { changes } = db.prepare("DELETE FROM screening_decisions").run();
    db.persist();
    logInfo(`DecisionStore cleared ${changes} decision(s)`);
    return changes;
  }

  close(): void {
    if (this.db) {
      try {
        this.db.close();
      } catch (err) {
        logWarn(`DecisionStore.close(): ${getErrorMessage(err)}`);
      }
      this.db = null;
    }
  }

  private requireDb(): SqliteDatabase {
    if (!this.db) {
      throw new Error("DecisionStore not initialized. Call initialize() first.");
    }
    return this.db;
  }

  private mapRow(row: SqlRow): DecisionRecord {
    const links = rowString(row, "source_links");
    return {
      id: rowNumber(row, "id"),
      foundation_name: rowString(row, "foundation_name"),
      candidate_id: rowString(row, "candidate_id"),
      grant_name: rowString(row, "grant_name"),
      classification:
        toClassification(rowString(row, "classification")) ?? "REVIEW",
      row_color: rowString(row, "row_color"),
      confidence: rowNumber(row, "confidence"),
      rationale: rowString(row, "rationale"),
      display_rationale: rowString(row, "display_rationale"),
      next_action_date: rowNullableString(row, "next_action_date"),
      source_links: links ? links.split("\n") : [],
      sources: parseSources(rowString(row, "sources_json")),
      upstream_classification: toClassification(
        rowNullableString(row, "upstream_classification"),
      ),
      screened_at: rowString(row, "screened_at"),
    };
  }
}
