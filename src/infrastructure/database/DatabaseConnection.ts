import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

/**
 * Database connection manager for the transcript archive
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = IN_MEMORY) {
    this.dbPath = dbPath === IN_MEMORY ? dbPath : path.resolve(dbPath);

    if (this.dbPath !== IN_MEMORY) {
      // Ensure data directory exists
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS turns (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        turn_index INTEGER NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
        content TEXT NOT NULL,
        created_at TEXT NOT NULL,
        UNIQUE(session_id, turn_index)
      );

      CREATE INDEX IF NOT EXISTS idx_turns_session ON turns(session_id, turn_index);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): { totalTurns: number; totalSessions: number; databaseSize: number } {
    const row = this.db
      .prepare<[], { turns: number; sessions: number }>(
        'SELECT COUNT(*) AS turns, COUNT(DISTINCT session_id) AS sessions FROM turns'
      )
      .get();

    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      totalTurns: row?.turns ?? 0,
      totalSessions: row?.sessions ?? 0,
      databaseSize,
    };
  }
}
