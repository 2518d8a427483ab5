export type Speaker = 'user' | 'assistant';

export interface ConversationTurn {
  id: string;
  speaker: Speaker;
  text: string;
  /** ISO 8601 */
  timestamp: string;
  annotations: Record<string, unknown>;
}

export const SCRATCH_KEYS = {
  LAST_USER_UTTERANCE: 'last_user_utterance',
  LAST_ASSISTANT_RESPONSE: 'last_assistant_response',
  PREVIOUS_USER_UTTERANCE: 'previous_user_utterance',
  PREVIOUS_ASSISTANT_RESPONSE: 'previous_assistant_response',
  CONVERSATION_LANGUAGE: 'conversation_language',
} as const;

/** Deep copy of the store handed to handlers and the dispatcher. */
export interface ContextSnapshot {
  history: ConversationTurn[];
  lastUserUtterance: string | null;
  lastAssistantResponse: string | null;
  previousUserUtterance: string | null;
  previousAssistantResponse: string | null;
  /** Every scratch key other than the four pointers */
  turnData: Record<string, unknown>;
}
