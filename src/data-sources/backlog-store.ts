import type { Candidate } from "../domain/screening/types.js";
import {
  BACKLOG_COLUMNS,
  candidateFromRow,
  validateTableName,
  type BacklogQuery,
  type BacklogSource,
  type StageCount,
} from "../domain/screening/backlog.js";
import { logInfo, logWarn, getErrorMessage } from "../core/logging.js";
import {
  SqliteDatabase,
  rowNumber,
  rowString,
  type SqlValue,
} from "./sqlite-adapter.js";

export interface BacklogRow {
  Id: string;
  Name: string;
  Corporate_Kanban_Sort__c?: string | null;
  Amount?: number | null;
  Grant_Requirements_Website__c?: string | null;
  Grant_Focus__c?: string | null;
  StageName: string;
}

/**
 * Backlog table in a local SQLite file, laid out like the CRM export
 * (one row per opportunity, funder name in Corporate_Kanban_Sort__c).
 */
export class SqliteBacklogStore implements BacklogSource {
  private db: SqliteDatabase | null = null;
  private dbPath: string | null;
  private table: string;

  /** Pass null as dbPath for an in-memory store. */
  constructor(dbPath: string | null, table: string) {
    this.dbPath = dbPath;
    this.table = validateTableName(table);
  }

  initialize(): void {
    this.db = this.dbPath
      ? SqliteDatabase.open(this.dbPath)
      : SqliteDatabase.inMemory();

    this.db.sqlExec(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        Id                            TEXT PRIMARY KEY,
        Name                          TEXT NOT NULL,
        Corporate_Kanban_Sort__c      TEXT,
        Amount                        REAL,
        Grant_Requirements_Website__c TEXT,
        Grant_Focus__c                TEXT,
        StageName                     TEXT NOT NULL
      );
    `);
    this.db.persist();
    logInfo(`SqliteBacklogStore initialized (table ${this.table})`);
  }

  /** Insert or replace backlog rows, e.g. from a CRM export. */
  importRows(rows: BacklogRow[]): number {
    const db = this.requireDb();
    const columns = BACKLOG_COLUMNS.join(", ");
    const placeholders = BACKLOG_COLUMNS.map(() => "?").join(", ");
    const paramSets: SqlValue[][] = rows.map((r) => [
      r.Id,
      r.Name,
      r.Corporate_Kanban_Sort__c ?? null,
      r.Amount ?? null,
      r.Grant_Requirements_Website__c ?? null,
      r.Grant_Focus__c ?? null,
      r.StageName,
    ]);
    db.runBulk(
      `INSERT OR REPLACE INTO ${this.table} (${columns}) VALUES (${placeholders})`,
      paramSets,
    );
    db.persist();
    return rows.length;
  }

  async fetchCandidates(query: BacklogQuery): Promise<Candidate[]> {
    const db = this.requireDb();
    const params: SqlValue[] = [query.stage];
    let sql = `SELECT ${BACKLOG_COLUMNS.join(", ")} FROM ${this.table} WHERE StageName = ? ORDER BY rowid`;
    if (query.limit !== undefined) {
      if (!Number.isInteger(query.limit) || query.limit < 1) {
        throw new Error(`Invalid backlog limit: ${query.limit}`);
      }
      sql += " LIMIT ?";
      params.push(query.limit);
    }
    return db.prepare(sql).all(...params).map(candidateFromRow);
  }

  async countByStage(): Promise<StageCount[]> {
    const rows = this.requireDb()
      .prepare(
        `SELECT StageName AS stage, COUNT(*) AS count FROM ${this.table} GROUP BY StageName ORDER BY count DESC, stage`,
      )
      .all();
    return rows.map((row) => ({
      stage: rowString(row, "stage"),
      count: rowNumber(row, "count"),
    }));
  }

  close(): void {
    if (this.db) {
      try {
        this.db.close();
      } catch (err) {
        logWarn(`SqliteBacklogStore.close(): ${getErrorMessage(err)}`);
      }
      this.db = null;
    }
  }

  private requireDb(): SqliteDatabase {
    if (!this.db) {
      throw new Error("SqliteBacklogStore not initialized. Call initialize() first.");
    }
    return this.db;
  }
}
