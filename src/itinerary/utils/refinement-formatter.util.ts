// src/itinerary/utils/refinement-formatter.util.ts

import { ConversationHistory, ConversationRole, ConversationTurn } from '../interfaces/conversation.interface';

const SPEAKER_LABELS: Record<ConversationRole, string> = {
  user: 'User',
  assistant: 'AI',
};

/**
 * Refinement formatter
 *
 * Flattens a conversation into the transcript a refinement request carries:
 *
 *   User: make day two shorter
 *   AI: Day 2: ...
 */
export class RefinementFormatter {
  static format(history: ConversationHistory): string {
    return history.map((turn) => `${SPEAKER_LABELS[turn.role]}: ${turn.content}`).join('\n');
  }

  /**
   * New history with one more turn; the input is left untouched
   */
  static append(history: ConversationHistory, role: ConversationRole, content: string): ConversationHistory {
    const turn: ConversationTurn = Object.freeze({ role, content });
    return Object.freeze([...history, turn]);
  }
}
