/**
 * Conversation
 *
 * Append-only sequence of question/answer turns scoped to one organization.
 * Only the most recent turns are replayed as context for a follow-up.
 */

import { InvalidInputError } from '@/lib/errors';
import type { LLMMessage } from '@/types/llm';
import type { ConversationTurn, SourceCitation } from '@/types/rag';
import { DEFAULT_HISTORY_TURNS } from './config';

export class Conversation {
  private readonly turns: ConversationTurn[] = [];

  constructor(
    readonly organizationId: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  addUserTurn(content: string): ConversationTurn {
    return this.append({ role: 'user', content, timestamp: this.now() });
  }

  addAssistantTurn(
    content: string,
    details: { sources?: SourceCitation[]; confidence?: number } = {}
  ): ConversationTurn {
    return this.append({
      role: 'assistant',
      content,
      timestamp: this.now(),
      sources: details.sources ? [...details.sources] : [],
      ...(details.confidence !== undefined && { confidence: details.confidence }),
    });
  }

  /**
   * The last `count` turns, oldest first.
   */
  recentTurns(count = DEFAULT_HISTORY_TURNS): ConversationTurn[] {
    if (count <= 0) return [];
    return this.turns.slice(-count);
  }

  /**
   * The last `count` turns as chat messages for replay.
   */
  toMessages(count = DEFAULT_HISTORY_TURNS): LLMMessage[] {
    return this.recentTurns(count).map((turn) => ({ role: turn.role, content: turn.content }));
  }

  /**
   * Every turn, oldest first. The returned array is a copy.
   */
  getTurns(): ConversationTurn[] {
    return [...this.turns];
  }

  get length(): number {
    return this.turns.length;
  }

  private append(turn: ConversationTurn): ConversationTurn {
    if (!turn.content.trim()) {
      throw new InvalidInputError(`Conversation ${turn.role} turn cannot be empty`, 'completion');
    }
    this.turns.push(turn);
    return turn;
  }
}
