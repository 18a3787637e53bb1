/**
 * SQLite adapter wrapping sql.js (WASM) behind a small prepare/get/all/run API.
 *
 * sql.js runs SQLite entirely in WebAssembly, so there is no native addon to
 * build. Databases live in memory and are explicitly persisted to disk.
 */
import initSqlJs, {
  type Database as SqlJsDatabase,
  type SqlJsStatic,
  type SqlValue,
} from "sql.js";
import fs from "fs";
import path from "path";

export type { SqlValue };
export type SqlRow = Record<string, SqlValue>;

// ---------------------------------------------------------------------------
// Singleton WASM initialization
// ---------------------------------------------------------------------------

let SQL: SqlJsStatic | null = null;

/** Load the sql.js WASM binary. Idempotent. */
export async function ensureSqlJs(): Promise<SqlJsStatic> {
  if (!SQL) {
    SQL = await initSqlJs();
  }
  return SQL;
}

function requireSqlJs(): SqlJsStatic {
  if (!SQL) throw new Error("Call ensureSqlJs() before opening a database");
  return SQL;
}

// ---------------------------------------------------------------------------
// PreparedStatement
// ---------------------------------------------------------------------------

export class PreparedStatement {
  private db: SqlJsDatabase;
  private sql: string;
  private parent: SqliteDatabase;

  constructor(db: SqlJsDatabase, sql: string, parent: SqliteDatabase) {
    this.db = db;
    this.sql = sql;
    this.parent = parent;
  }

  /** Execute INSERT/UPDATE/DELETE. Returns { lastInsertRowid, changes }. */
  run(...params: SqlValue[]): { lastInsertRowid: number; changes: number } {
    const stmt = this.db.prepare(this.sql);
    try {
      if (params.length > 0) stmt.bind(params);
      stmt.step();
    } finally {
      stmt.free();
    }
    const changes = this.db.getRowsModified();
    this.parent.markDirty();
    const result = this.db.exec("SELECT last_insert_rowid() as id");
    const id = result.length > 0 ? result[0].values[0]?.[0] : undefined;
    return {
      lastInsertRowid: typeof id === "number" ? id : 0,
      changes,
    };
  }

  /** Execute SELECT, return first row as object or undefined. */
  get(...params: SqlValue[]): SqlRow | undefined {
    const stmt = this.db.prepare(this.sql);
    try {
      if (params.length > 0) stmt.bind(params);
      return stmt.step() ? stmt.getAsObject() : undefined;
    } finally {
      stmt.free();
    }
  }

  /** Execute SELECT, return all rows as objects. */
  all(...params: SqlValue[]): SqlRow[] {
    const stmt = this.db.prepare(this.sql);
    const rows: SqlRow[] = [];
    try {
      if (params.length > 0) stmt.bind(params);
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
    } finally {
      stmt.free();
    }
    return rows;
  }
}

// ---------------------------------------------------------------------------
// SqliteDatabase
// ---------------------------------------------------------------------------

export class SqliteDatabase {
  private db: SqlJsDatabase;
  private filePath: string | null;
  private dirty = false;

  private constructor(db: SqlJsDatabase, filePath: string | null) {
    this.db = db;
    this.filePath = filePath;
  }

  /** Open a file-backed database (loads existing file or creates new).
   *  Validates the SQLite header so a corrupted file is never overwritten. */
  static open(filePath: string): SqliteDatabase {
    const sql = requireSqlJs();
    let db: SqlJsDatabase;
    if (fs.existsSync(filePath)) {
      const buffer = fs.readFileSync(filePath);
      if (buffer.length < 100) {
        throw new Error(
          `Database file too small to be valid SQLite: ${filePath} (${buffer.length} bytes)`,
        );
      }
      if (buffer.subarray(0, 15).toString("utf8") !== "SQLite format 3") {
        throw new Error(
          `Not a valid SQLite database (bad header): ${filePath}`,
        );
      }
      db = new sql.Database(new Uint8Array(buffer));
    } else {
      db = new sql.Database();
    }
    return new SqliteDatabase(db, filePath);
  }

  /** Create an in-memory database (useful for tests). */
  static inMemory(): SqliteDatabase {
    return new SqliteDatabase(new (requireSqlJs().Database)(), null);
  }

  /** Run a PRAGMA statement. WAL mode is ignored (the database is in memory).
   *  Only allowlisted pragma names are accepted. */
  pragma(pragmaStr: string): void {
    if (/journal_mode\s*=\s*WAL/i.test(pragmaStr)) return;
    const ALLOWED =
      /^(journal_mode|foreign_keys|cache_size|busy_timeout)\s*=\s*\w+$/i;
    if (/[\r\n]/.test(pragmaStr) || !ALLOWED.test(pragmaStr)) {
      throw new Error(`Disallowed PRAGMA: ${pragmaStr}`);
    }
    this.db.run(`PRAGMA ${pragmaStr}`);
  }

  /** Run one or more SQL statements (DDL, multi-statement strings). */
  sqlExec(sql: string): void {
    this.db.run(sql);
    this.dirty = true;
  }

  prepare(sql: string): PreparedStatement {
    return new PreparedStatement(this.db, sql, this);
  }

  /** Compile once, bind and step for each parameter set, inside one transaction. */
  runBulk(sql: string, paramSets: SqlValue[][]): void {
    this.db.run("BEGIN");
    try {
      const stmt = this.db.prepare(sql);
      try {
        for (const params of paramSets) {
          stmt.bind(params);
          stmt.step();
          stmt.reset();
        }
      } finally {
        stmt.free();
      }
      this.db.run("COMMIT");
    } catch (err) {
      this.db.run("ROLLBACK");
      throw err;
    }
    this.dirty = true;
  }

  /** Write the database to disk (no-op for in-memory databases).
   *  Write-then-rename, so a crash mid-write leaves the old file intact. */
  persist(): void {
    if (this.filePath && this.dirty) {
      const data = this.db.export();
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
      const tmpPath = `${this.filePath}.tmp`;
      fs.writeFileSync(tmpPath, Buffer.from(data));
      fs.renameSync(tmpPath, this.filePath);
      this.dirty = false;
    }
  }

  markDirty(): void {
    this.dirty = true;
  }

  /** Close the database, persisting to disk first if file-backed. */
  close(): void {
    this.persist();
    this.db.close();
  }
}

// ---------------------------------------------------------------------------
// Row readers
// ---------------------------------------------------------------------------

export function rowString(row: SqlRow, key: string): string {
  const value = row[key];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return "";
}

export function rowNullableString(row: SqlRow, key: string): string | null {
  const value = row[key];
  return value === null || value === undefined ? null : rowString(row, key);
}

export function rowNumber(row: SqlRow, key: string): number {
  const value = row[key];
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}
