import type { Language } from '../common/language';
import type { DispatchRoute } from '../dispatch/dispatch.types';
import type { Entity } from '../entities/entity.types';
import type { SentimentResult } from '../nlp-gateway/nlp-gateway.types';

export const ERROR_INTENTS = {
  EMPTY_INPUT: 'ERROR_EMPTY_INPUT',
  CLASSIFIER_UNAVAILABLE: 'ERROR_CLASSIFIER_UNAVAILABLE',
  INTERNAL: 'ERROR_INTERNAL',
} as const;

export type ResponseStatus = 'ok' | 'degraded' | 'error';

export type ErrorKind =
  | 'empty_input'
  | 'classifier_unavailable'
  | 'handler_failed'
  | 'internal';

/** Signals that could not be computed for a turn. */
export type DegradedSignal =
  | 'intent'
  | 'entities.general'
  | 'entities.specialized'
  | 'sentiment';

export interface AssistantResponse {
  intent: string;
  confidence: number;
  language: Language;
  entities: Entity[];
  sentiment: SentimentResult | null;
  responseText: string;
  handlerUsed: string | null;
  route: DispatchRoute | null;
  status: ResponseStatus;
  errorKind?: ErrorKind;
  degradedSignals: DegradedSignal[];
}
