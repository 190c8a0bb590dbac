import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import type { CachedSummary, UploadRecord } from './types';

export const DB_FILE = 'video-search.db';

export function resolveDbPath(dataDir: string): string {
  // Ensure directory exists (for mounted volumes)
  if (dataDir !== '.' && !fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }
  return path.join(dataDir, DB_FILE);
}

// Summaries and upload history; the video table lives in the warehouse
export class DB {
  public db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      console.log(`📂 Database path: ${dbPath}`);
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS summaries (
        cache_key TEXT PRIMARY KEY,
        model TEXT NOT NULL,
        summary TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS uploads (
        upload_id INTEGER PRIMARY KEY AUTOINCREMENT,
        source TEXT NOT NULL,
        rows_loaded INTEGER NOT NULL,
        rows_skipped INTEGER NOT NULL,
        uploaded_at TEXT NOT NULL
      );
    `);
  }

  getSummary(cacheKey: string): CachedSummary | undefined {
    const stmt = this.db.prepare('SELECT * FROM summaries WHERE cache_key = ?');
    return stmt.get(cacheKey) as CachedSummary | undefined;
  }

  insertSummary(summary: CachedSummary) {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO summaries
      (cache_key, model, summary, created_at)
      VALUES (?, ?, ?, ?)
    `);
    stmt.run(summary.cache_key, summary.model, summary.summary, summary.created_at);
  }

  insertUpload(upload: Omit<UploadRecord, 'upload_id'>): number {
    const stmt = this.db.prepare(`
      INSERT INTO uploads
      (source, rows_loaded, rows_skipped, uploaded_at)
      VALUES (?, ?, ?, ?)
    `);
    const info = stmt.run(upload.source, upload.rows_loaded, upload.rows_skipped, upload.uploaded_at);
    return Number(info.lastInsertRowid);
  }

  getRecentUploads(limit: number = 10): UploadRecord[] {
    const stmt = this.db.prepare('SELECT * FROM uploads ORDER BY upload_id DESC LIMIT ?');
    return stmt.all(limit) as UploadRecord[];
  }

  close() {
    this.db.close();
  }
}
