export const ASSISTANT_EVENTS = {
  INTENT_CLASSIFIED: 'intent.classified',
  TURN_RECORDED: 'turn.recorded',
  CONTEXT_CLEARED: 'context.cleared',
  HANDLER_FAILED: 'handler.failed',
  COLLABORATOR_FAILED: 'collaborator.failed',
} as const;

export interface IntentClassifiedEvent {
  rawText: string;
  intent: string;
  confidence: number;
  language: string;
}

export interface TurnRecordedEvent {
  turnId: string;
  speaker: 'user' | 'assistant';
  text: string;
  historySize: number;
}

export interface ContextClearedEvent {
  clearedAt: string;
  discardedTurns: number;
}

export interface HandlerFailedEvent {
  handler: string;
  reason: 'error' | 'timeout';
  message: string;
}

export interface CollaboratorFailedEvent {
  collaborator: string;
  message: string;
}
