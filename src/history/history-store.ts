import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import path from "node:path";
import initSqlJs from "sql.js";
import type { Database, ParamsObject, SqlJsStatic, SqlValue } from "sql.js";
import { logger } from "../observability/logger.js";

export type HistoryMetadata = Record<string, unknown>;

export type HistoryItem = {
  id: number;
  query: string;
  response: string;
  hasScreenshot: boolean;
  screenshotPath: string | null;
  timestamp: string;
  modelName: string | null;
  metadata: HistoryMetadata | null;
};

export type NewHistoryItem = {
  query: string;
  response: string;
  hasScreenshot?: boolean;
  screenshotPath?: string | null;
  modelName?: string | null;
  metadata?: HistoryMetadata | null;
};

export type ListHistoryOptions = {
  limit?: number;
  offset?: number;
  filter?: string | undefined;
};

const MEMORY = ":memory:";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS history (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  query TEXT NOT NULL,
  response TEXT NOT NULL,
  has_screenshot INTEGER DEFAULT 0,
  screenshot_path TEXT,
  timestamp DATETIME DEFAULT CURRENT_TIMESTAMP,
  model_name TEXT,
  metadata TEXT
);
CREATE INDEX IF NOT EXISTS idx_history_timestamp ON history(timestamp);
`;

let engine: Promise<SqlJsStatic> | null = null;

// The CommonJS build exposes the initializer both as module.exports and as its `default`.
function loadEngine(): Promise<SqlJsStatic> {
  engine ??= initSqlJs.default();
  return engine;
}

function isPlainObject(value: unknown): value is HistoryMetadata {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function textOrNull(value: SqlValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  return typeof value === "string" ? value : String(value);
}

function parseMetadata(id: number, raw: string | null): HistoryMetadata | null {
  if (!raw) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return isPlainObject(parsed) ? parsed : null;
  } catch (error) {
    logger.error("failed to decode history metadata", undefined, { historyId: id, error });
    return null;
  }
}

function toHistoryItem(row: ParamsObject): HistoryItem {
  const id = Number(row.id);
  return {
    id,
    query: textOrNull(row.query) ?? "",
    response: textOrNull(row.response) ?? "",
    hasScreenshot: Number(row.has_screenshot) === 1,
    screenshotPath: textOrNull(row.screenshot_path),
    timestamp: textOrNull(row.timestamp) ?? "",
    modelName: textOrNull(row.model_name),
    metadata: parseMetadata(id, textOrNull(row.metadata)),
  };
}

export class HistoryStore {
  private closed = false;

  private constructor(
    readonly dbPath: string,
    private readonly db: Database,
    private readonly now: () => Date
  ) {}

  static async open(dbPath: string, now: () => Date = () => new Date()): Promise<HistoryStore> {
    const SQL = await loadEngine();
    let data: Buffer | null = null;
    if (dbPath !== MEMORY) {
      const resolved = path.resolve(dbPath);
      mkdirSync(path.dirname(resolved), { recursive: true });
      if (existsSync(resolved)) data = readFileSync(resolved);
    }
    const store = new HistoryStore(dbPath, new SQL.Database(data), now);
    store.db.exec(SCHEMA);
    store.persist();
    logger.info("history database ready", undefined, { dbPath });
    return store;
  }

  add(item: NewHistoryItem): number {
    this.db.run(
      `INSERT INTO history (query, response, has_screenshot, screenshot_path, timestamp, model_name, metadata)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        item.query,
        item.response,
        item.hasScreenshot ? 1 : 0,
        item.screenshotPath ?? null,
        this.now().toISOString(),
        item.modelName ?? null,
        item.metadata ? JSON.stringify(item.metadata) : null,
      ]
    );
    const id = Number(this.select("SELECT last_insert_rowid() AS id", [])[0]?.id);
    this.persist();
    logger.debug("history item added", undefined, { historyId: id });
    return id;
  }

  updateResponse(id: number, response: string): boolean {
    return this.change("UPDATE history SET response = ? WHERE id = ?", [response, id]) > 0;
  }

  list(options: ListHistoryOptions = {}): HistoryItem[] {
    const limit = options.limit ?? 50;
    const offset = options.offset ?? 0;
    const params: SqlValue[] = [];
    let sql = "SELECT * FROM history";
    if (options.filter) {
      sql += " WHERE query LIKE ? OR response LIKE ?";
      params.push(`%${options.filter}%`, `%${options.filter}%`);
    }
    sql += " ORDER BY timestamp DESC, id DESC LIMIT ? OFFSET ?";
    params.push(limit, offset);
    return this.select(sql, params).map(toHistoryItem);
  }

  get(id: number): HistoryItem | null {
    const row = this.select("SELECT * FROM history WHERE id = ?", [id])[0];
    return row ? toHistoryItem(row) : null;
  }

  delete(id: number): boolean {
    const deleted = this.change("DELETE FROM history WHERE id = ?", [id]) > 0;
    if (deleted) logger.debug("history item deleted", undefined, { historyId: id });
    return deleted;
  }

  clear(): number {
    const count = this.change("DELETE FROM history", []);
    logger.info("history cleared", undefined, { deleted: count });
    return count;
  }

  close(): void {
    if (this.closed) return;
    this.persist();
    this.db.close();
    this.closed = true;
  }

  private select(sql: string, params: SqlValue[]): ParamsObject[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      const rows: ParamsObject[] = [];
      while (statement.step()) rows.push(statement.getAsObject());
      return rows;
    } finally {
      statement.free();
    }
  }

  private change(sql: string, params: SqlValue[]): number {
    this.db.run(sql, params);
    const changes = this.db.getRowsModified();
    if (changes > 0) this.persist();
    return changes;
  }

  private persist(): void {
    if (this.dbPath === MEMORY) return;
    const resolved = path.resolve(this.dbPath);
    const temp = `${resolved}.tmp`;
    writeFileSync(temp, this.db.export());
    renameSync(temp, resolved);
  }
}
