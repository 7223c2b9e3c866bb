import type { Turn, TurnRecord } from '../entities/Conversation.js';

/**
 * Interface for the turn archive
 */
export interface ITranscriptRepository {
  saveTurn(sessionId: string, turnIndex: number, turn: Turn): void;

  loadTranscript(sessionId: string): TurnRecord[];

  countTurns(sessionId: string): number;

  clearSession(sessionId: string): void;
}
