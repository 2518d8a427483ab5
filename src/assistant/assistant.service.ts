import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { resolveLanguage, type Language } from '../common/language';
import {
  SCRATCH_KEYS,
  type ContextSnapshot,
  type ConversationTurn,
} from '../context/context.types';
import { ConversationContextStore } from '../context/conversation-context.store';
import { IntentDispatcherService } from '../dispatch/intent-dispatcher.service';
import { EntityExtractionService } from '../entities/entity-extraction.service';
import {
  ASSISTANT_EVENTS,
  type CollaboratorFailedEvent,
  type ContextClearedEvent,
  type IntentClassifiedEvent,
  type TurnRecordedEvent,
} from '../events/assistant.events';
import { NlpGatewayService } from '../nlp-gateway/nlp-gateway.service';
import type { SentimentResult } from '../nlp-gateway/nlp-gateway.types';
import { IntentClassifierService } from '../nlu/intent-classifier.service';
import type { IntentClassification } from '../nlu/intent.types';
import {
  ERROR_INTENTS,
  type AssistantResponse,
  type DegradedSignal,
} from './assistant.types';

const REPEAT_PROMPT: Record<Language, string> = {
  es: 'No te he entendido. ¿Puedes repetirlo?',
  en: "I didn't catch that. Could you say it again?",
};

const INTERNAL_ERROR_REPLY: Record<Language, string> = {
  es: 'Lo siento, ha ocurrido un error interno.',
  en: 'Sorry, something went wrong on my side.',
};

/**
 * Entry point of the pipeline: classifies the utterance, extracts entities
 * and sentiment, records the turn and dispatches it. Turns are processed one
 * at a time, in call order.
 */
@Injectable()
export class AssistantService {
  private readonly logger = new Logger(AssistantService.name);
  private readonly defaultLanguage: Language;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly config: ConfigService,
    private readonly classifier: IntentClassifierService,
    private readonly entityExtraction: EntityExtractionService,
    private readonly gateway: NlpGatewayService,
    private readonly store: ConversationContextStore,
    private readonly dispatcher: IntentDispatcherService,
    private readonly events: EventEmitter2,
  ) {
    this.defaultLanguage = resolveLanguage(
      this.config.get<string>('DEFAULT_LANGUAGE'),
      'es',
    );
  }

  /** Never rejects: failures are reported through `status` and `errorKind`. */
  process(text: unknown, languageHint?: unknown): Promise<AssistantResponse> {
    return this.enqueue(() => this.processTurn(text, languageHint));
  }

  getContext(): ContextSnapshot {
    return this.store.getContextForProcessing();
  }

  /** Waits for the turn in progress, then empties the store. */
  clearContext(): Promise<{ discardedTurns: number }> {
    return this.enqueue(() => {
      const discardedTurns = this.store.clearAllContext();
      this.events.emit(ASSISTANT_EVENTS.CONTEXT_CLEARED, {
        clearedAt: new Date().toISOString(),
        discardedTurns,
      } satisfies ContextClearedEvent);
      return { discardedTurns };
    });
  }

  private enqueue<T>(work: () => T | Promise<T>): Promise<T> {
    const result = this.queue.then(work);
    // failures reach the caller through `result`; the next turn still runs
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async processTurn(
    text: unknown,
    languageHint?: unknown,
  ): Promise<AssistantResponse> {
    const language = resolveLanguage(languageHint, this.defaultLanguage);

    if (typeof text !== 'string' || text.trim().length === 0) {
      this.logger.warn('Received empty utterance');
      return {
        intent: ERROR_INTENTS.EMPTY_INPUT,
        confidence: 0,
        language,
        entities: [],
        sentiment: null,
        responseText: REPEAT_PROMPT[language],
        handlerUsed: null,
        route: null,
        status: 'error',
        errorKind: 'empty_input',
        degradedSignals: [],
      };
    }

    try {
      return await this.runPipeline(text, language);
    } catch (error) {
      this.logger.error(`Processing "${text.slice(0, 60)}" failed`, error);
      return {
        intent: ERROR_INTENTS.INTERNAL,
        confidence: 0,
        language,
        entities: [],
        sentiment: null,
        responseText: INTERNAL_ERROR_REPLY[language],
        handlerUsed: null,
        route: null,
        status: 'error',
        errorKind: 'internal',
        degradedSignals: [],
      };
    }
  }

  private async runPipeline(
    text: string,
    language: Language,
  ): Promise<AssistantResponse> {
    const [classification, extraction, sentiment] = await Promise.all([
      Promise.resolve().then(() => this.classify(text, language)),
      this.entityExtraction.extract(text, language),
      this.analyzeSentiment(text, language),
    ]);

    const degradedSignals: DegradedSignal[] = [];
    if (classification.status === 'unavailable') degradedSignals.push('intent');
    for (const source of extraction.failedSources) {
      if (source === 'general') degradedSignals.push('entities.general');
      if (source === 'specialized') degradedSignals.push('entities.specialized');
    }
    if (sentiment === null) degradedSignals.push('sentiment');

    const intent = classification.status === 'ok' ? classification.intent : null;
    const confidence =
      classification.status === 'ok' ? classification.confidence : 0;
    const reportedIntent = intent ?? ERROR_INTENTS.CLASSIFIER_UNAVAILABLE;

    if (intent !== null) {
      this.events.emit(ASSISTANT_EVENTS.INTENT_CLASSIFIED, {
        rawText: text,
        intent,
        confidence,
        language,
      } satisfies IntentClassifiedEvent);
    }

    this.record(
      this.store.addUtterance('user', text, {
        intent: reportedIntent,
        confidence,
        entities: extraction.entities,
        sentiment,
        language,
      }),
    );
    this.store.setCurrentTurnData(SCRATCH_KEYS.CONVERSATION_LANGUAGE, language);

    const dispatch = await this.dispatcher.dispatch({
      intent,
      text,
      entities: extraction.entities,
      context: this.store.getContextForProcessing(),
      language,
    });

    if (!dispatch.contextCleared) {
      this.record(
        this.store.addUtterance('assistant', dispatch.responseText, {
          intent: reportedIntent,
          handlerUsed: dispatch.handlerUsed,
        }),
      );
    }

    const response: AssistantResponse = {
      intent: reportedIntent,
      confidence,
      language,
      entities: extraction.entities,
      sentiment,
      responseText: dispatch.responseText,
      handlerUsed: dispatch.handlerUsed,
      route: dispatch.route,
      status: 'ok',
      degradedSignals,
    };
    if (dispatch.failed) {
      response.status = 'degraded';
      response.errorKind = 'handler_failed';
    } else if (intent === null) {
      response.status = 'degraded';
      response.errorKind = 'classifier_unavailable';
    }
    return response;
  }

  private classify(text: string, language: Language): IntentClassification {
    try {
      return this.classifier.classify(text, language);
    } catch (error) {
      this.logger.error('Intent classification failed', error);
      return { status: 'unavailable', reason: 'Intent classification failed' };
    }
  }

  private async analyzeSentiment(
    text: string,
    language: Language,
  ): Promise<SentimentResult | null> {
    try {
      return await this.gateway.sentiment(text, language);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Sentiment unavailable: ${message}`);
      this.events.emit(ASSISTANT_EVENTS.COLLABORATOR_FAILED, {
        collaborator: 'sentiment',
        message,
      } satisfies CollaboratorFailedEvent);
      return null;
    }
  }

  private record(turn: ConversationTurn | null): void {
    if (!turn) return;
    this.events.emit(ASSISTANT_EVENTS.TURN_RECORDED, {
      turnId: turn.id,
      speaker: turn.speaker,
      text: turn.text,
      historySize: this.store.size,
    } satisfies TurnRecordedEvent);
  }
}
