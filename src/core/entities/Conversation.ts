/**
 * Conversation domain entities
 */
export type TurnRole = 'user' | 'assistant';

/**
 * One conversational exchange unit. Frozen on creation.
 */
export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
  readonly timestamp: Date;
}

export function createTurn(role: TurnRole, content: string, timestamp: Date = new Date()): Turn {
  return Object.freeze({ role, content, timestamp: new Date(timestamp.getTime()) });
}

export interface TurnRecord {
  id?: number;
  session_id: string;
  turn_index: number;
  role: TurnRole;
  content: string;
  created_at: string;
}
