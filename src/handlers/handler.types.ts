import { isSupportedLanguage, type Language } from '../common/language';
import { SCRATCH_KEYS, type ContextSnapshot } from '../context/context.types';
import type { Entity } from '../entities/entity.types';

export interface HandlerResult {
  response: string;
  /** Written into the scratch map after the handler returns */
  contextUpdates?: Record<string, unknown>;
}

export interface ActionHandler {
  readonly name: string;
  readonly description: string;
  /** Candidate label offered to zero-shot disambiguation */
  readonly disambiguationLabel: string;
  canHandle(text: string, context: ContextSnapshot): boolean;
  handle(
    text: string,
    entities: Entity[],
    context: ContextSnapshot,
  ): Promise<string | HandlerResult> | string | HandlerResult;
  failureMessage?(language: Language): string;
}

export function toHandlerResult(value: string | HandlerResult): HandlerResult {
  return typeof value === 'string' ? { response: value } : value;
}

/** Language of the conversation as recorded by the assistant, `es` when unset. */
export function conversationLanguage(context: ContextSnapshot): Language {
  const value = context.turnData[SCRATCH_KEYS.CONVERSATION_LANGUAGE];
  return isSupportedLanguage(value) ? value : 'es';
}
