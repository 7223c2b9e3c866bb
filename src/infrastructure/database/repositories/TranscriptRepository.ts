import type Database from 'better-sqlite3';
import type { ITranscriptRepository } from '../../../core/interfaces/ITranscriptRepository.js';
import type { Turn, TurnRecord, TurnRole } from '../../../core/entities/Conversation.js';

interface TurnRow {
  id: number;
  session_id: string;
  turn_index: number;
  role: TurnRole;
  content: string;
  created_at: string;
}

/**
 * SQLite implementation of the turn archive
 */
export class TranscriptRepository implements ITranscriptRepository {
  constructor(private db: Database.Database) {}

  saveTurn(sessionId: string, turnIndex: number, turn: Turn): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO turns (session_id, turn_index, role, content, created_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(sessionId, turnIndex, turn.role, turn.content, turn.timestamp.toISOString());
  }

  loadTranscript(sessionId: string): TurnRecord[] {
    const rows = this.db
      .prepare<[string], TurnRow>('SELECT * FROM turns WHERE session_id = ? ORDER BY turn_index')
      .all(sessionId);

    return rows.map((row) => ({
      id: row.id,
      session_id: row.session_id,
      turn_index: row.turn_index,
      role: row.role,
      content: row.content,
      created_at: row.created_at,
    }));
  }

  countTurns(sessionId: string): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM turns WHERE session_id = ?')
      .get(sessionId);
    return row?.count ?? 0;
  }

  clearSession(sessionId: string): void {
    this.db.prepare('DELETE FROM turns WHERE session_id = ?').run(sessionId);
  }
}
