// src/llm/interfaces/llm.interface.ts

export enum LlmProvider {
  OPENAI = 'openai',
  GEMINI = 'gemini',
}

export type LlmRole = 'system' | 'user' | 'assistant';

/**
 * One chat message sent to the model
 */
export interface LlmMessage {
  role: LlmRole;
  content: string;
}

/**
 * Anything that turns a chat into a reply
 */
export interface TextGenerator {
  generate(messages: LlmMessage[]): Promise<string>;
}
