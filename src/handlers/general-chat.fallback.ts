import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { Language } from '../common/language';
import type { ContextSnapshot } from '../context/context.types';
import {
  ASSISTANT_EVENTS,
  type CollaboratorFailedEvent,
} from '../events/assistant.events';
import { OllamaService } from '../ollama/ollama.service';

const SYSTEM_PROMPTS: Record<Language, string> = {
  es: 'Eres un asistente de voz amable. Responde en español con una o dos frases cortas.',
  en: 'You are a friendly voice assistant. Answer in English in one or two short sentences.',
};

const CANNED_REPLIES: Record<Language, string[]> = {
  es: [
    'No estoy seguro de haberte entendido. ¿Puedes decirlo de otra forma?',
    'Eso todavía no sé hacerlo.',
    'Perdona, ¿puedes repetirlo con otras palabras?',
  ],
  en: [
    "I'm not sure I understood. Could you put it another way?",
    "I can't do that yet.",
    'Sorry, could you say that differently?',
  ],
};

const HISTORY_TURNS = 6;

/**
 * Answers anything no handler claims, through the small LLM. When the LLM
 * is unavailable it rotates through canned replies.
 */
@Injectable()
export class GeneralChatFallback {
  private readonly logger = new Logger(GeneralChatFallback.name);
  private cannedIndex = 0;

  constructor(
    private readonly ollama: OllamaService,
    private readonly events: EventEmitter2,
  ) {}

  async respond(
    text: string,
    context: ContextSnapshot,
    language: Language,
  ): Promise<string> {
    try {
      const answer = (
        await this.ollama.generate(
          this.buildPrompt(text, context),
          SYSTEM_PROMPTS[language],
        )
      ).trim();
      if (answer) return answer;
      this.logger.warn('LLM returned an empty answer, using a canned reply');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`General chat unavailable: ${message}`);
      this.events.emit(ASSISTANT_EVENTS.COLLABORATOR_FAILED, {
        collaborator: 'llm',
        message,
      } satisfies CollaboratorFailedEvent);
    }
    return this.cannedReply(language);
  }

  cannedReply(language: Language): string {
    const replies = CANNED_REPLIES[language];
    const reply = replies[this.cannedIndex % replies.length];
    this.cannedIndex += 1;
    return reply;
  }

  private buildPrompt(text: string, context: ContextSnapshot): string {
    const history = context.history
      .slice(-HISTORY_TURNS)
      .map((turn) => `${turn.speaker}: ${turn.text}`)
      .join('\n');
    return history ? `${history}\nuser: ${text}` : `user: ${text}`;
  }
}
