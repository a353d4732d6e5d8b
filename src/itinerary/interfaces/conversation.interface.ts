// src/itinerary/interfaces/conversation.interface.ts

export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
  readonly role: ConversationRole;
  readonly content: string;
}

/**
 * Chronological conversation about one itinerary
 *
 * Owned by the caller: every planning or refinement call takes the history it
 * should continue and returns the extended copy.
 */
export type ConversationHistory = readonly ConversationTurn[];
