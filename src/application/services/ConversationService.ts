import type { ITranscriptRepository } from '../../core/interfaces/ITranscriptRepository.js';
import type { Turn, TurnRecord } from '../../core/entities/Conversation.js';
import { errorMessage } from '../../core/errors.js';
import { logEvent } from '../../utils/logging.js';

export const DEFAULT_CONTEXT_CAPACITY = 20;

const SUMMARY_TAIL = 4;
const SUMMARY_EXCERPT = 150;

/**
 * Bounded conversation memory for one session.
 *
 * Turns stay in insertion order. Once the window holds more than `capacity`
 * turns the oldest are evicted, never the most recent. Archived turns are
 * kept in the transcript repository when one is configured.
 */
export class ConversationService {
  private turns: Turn[] = [];
  private archiveIndex = 0;

  constructor(
    private readonly sessionId: string,
    readonly capacity: number = DEFAULT_CONTEXT_CAPACITY,
    private readonly transcriptRepo?: ITranscriptRepository
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Context capacity must be a positive integer, got ${capacity}`);
    }
    if (transcriptRepo) {
      this.archiveIndex = this.tryArchive(() => transcriptRepo.countTurns(sessionId)) ?? 0;
    }
  }

  append(turn: Turn): void {
    this.turns.push(turn);
    if (this.turns.length > this.capacity) {
      this.turns.splice(0, this.turns.length - this.capacity);
    }

    const repo = this.transcriptRepo;
    if (repo) {
      const index = this.archiveIndex++;
      this.tryArchive(() => repo.saveTurn(this.sessionId, index, turn));
    }
  }

  /**
   * Turns oldest first. The returned array is a copy.
   */
  window(): Turn[] {
    return [...this.turns];
  }

  get size(): number {
    return this.turns.length;
  }

  reset(): void {
    this.turns = [];
    this.archiveIndex = 0;

    const repo = this.transcriptRepo;
    if (repo) {
      this.tryArchive(() => repo.clearSession(this.sessionId));
    }
  }

  /**
   * Every archived turn of the session, including those evicted from the
   * window. Undefined without an archive; read errors propagate.
   */
  transcript(): TurnRecord[] | undefined {
    return this.transcriptRepo?.loadTranscript(this.sessionId);
  }

  /**
   * Short memory overview: exchange count plus the last few turns
   */
  summary(): string {
    if (this.turns.length === 0) {
      return 'No conversation history yet.';
    }

    const exchanges = Math.floor(this.turns.length / 2);
    const tail = this.turns.slice(-SUMMARY_TAIL);
    const lines = [`Memory: ${exchanges} exchange${exchanges === 1 ? '' : 's'} remembered (capacity ${this.capacity} turns)`, ''];

    for (const turn of tail) {
      const who = turn.role === 'user' ? 'User' : 'Assistant';
      const content =
        turn.content.length > SUMMARY_EXCERPT ? `${turn.content.slice(0, SUMMARY_EXCERPT)}...` : turn.content;
      lines.push(`${who}: ${content}`);
    }

    if (this.turns.length > SUMMARY_TAIL) {
      lines.push('', `(+ ${this.turns.length - SUMMARY_TAIL} older turns in memory)`);
    }

    return lines.join('\n');
  }

  private tryArchive<T>(operation: () => T): T | undefined {
    try {
      return operation();
    } catch (error) {
      logEvent({
        component: 'conversation',
        event: 'transcript_write_failed',
        session: this.sessionId,
        error: errorMessage(error),
        severity: 'LOW',
      });
      return undefined;
    }
  }
}
