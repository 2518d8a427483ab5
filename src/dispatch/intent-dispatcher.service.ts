import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { Language } from '../common/language';
import { OperationTimeoutError, withTimeout } from '../common/with-timeout';
import type { ContextSnapshot } from '../context/context.types';
import { ConversationContextStore } from '../context/conversation-context.store';
import type { Entity } from '../entities/entity.types';
import {
  ASSISTANT_EVENTS,
  type CollaboratorFailedEvent,
  type ContextClearedEvent,
  type HandlerFailedEvent,
} from '../events/assistant.events';
import { GeneralChatFallback } from '../handlers/general-chat.fallback';
import { HandlerRegistry } from '../handlers/handler.registry';
import { toHandlerResult, type ActionHandler } from '../handlers/handler.types';
import { NlpGatewayService } from '../nlp-gateway/nlp-gateway.service';
import {
  FALLBACK_HANDLER,
  INTERNAL_HANDLER,
  type DispatchResult,
  type DispatchRoute,
} from './dispatch.types';
import {
  INTERNAL_INTENTS,
  isInternalIntent,
  mappedHandlerName,
  type InternalIntent,
} from './intent-handler.map';
import {
  CONTEXT_CLEARED,
  FAREWELL,
  GREETING,
  genericHandlerApology,
  helpText,
} from './internal-replies';

export interface DispatchRequest {
  /** null when no classifier was available */
  intent: string | null;
  text: string;
  entities: Entity[];
  context: ContextSnapshot;
  language: Language;
}

/**
 * Routes a classified utterance: internal intents first, then the static
 * intent table, then every handler that claims the text, with zero-shot
 * disambiguation between several claimants. Anything left goes to the
 * general chat fallback.
 */
@Injectable()
export class IntentDispatcherService {
  private readonly logger = new Logger(IntentDispatcherService.name);
  private readonly threshold: number;
  private readonly handlerTimeoutMs: number;

  constructor(
    private readonly config: ConfigService,
    private readonly registry: HandlerRegistry,
    private readonly fallback: GeneralChatFallback,
    private readonly gateway: NlpGatewayService,
    private readonly store: ConversationContextStore,
    private readonly events: EventEmitter2,
  ) {
    this.threshold = Number(this.config.get('DISAMBIGUATION_THRESHOLD') ?? 0.5);
    this.handlerTimeoutMs = Number(
      this.config.get('HANDLER_TIMEOUT_MS') ?? 10000,
    );
  }

  async dispatch(request: DispatchRequest): Promise<DispatchResult> {
    const { intent } = request;

    if (intent === null) {
      this.logger.debug('No intent available, using the fallback');
      return this.useFallback(request);
    }

    if (isInternalIntent(intent)) {
      return this.answerInternal(intent, request.language);
    }

    const mapped = mappedHandlerName(intent);
    if (mapped !== undefined) {
      const handler = this.registry.get(mapped);
      if (handler) return this.invoke(handler, request, 'mapped');
      this.logger.debug(
        `${intent} maps to unregistered handler "${mapped}", selecting candidates`,
      );
    }

    return this.selectCandidate(request);
  }

  private answerInternal(
    intent: InternalIntent,
    language: Language,
  ): DispatchResult {
    const result = (responseText: string, contextCleared = false): DispatchResult => ({
      responseText,
      handlerUsed: INTERNAL_HANDLER,
      route: 'internal',
      failed: false,
      contextCleared,
    });

    switch (intent) {
      case INTERNAL_INTENTS.GREET:
        return result(GREETING[language]);
      case INTERNAL_INTENTS.FAREWELL:
        return result(FAREWELL[language]);
      case INTERNAL_INTENTS.HELP:
        return result(helpText(language, this.registry.list()));
      case INTERNAL_INTENTS.CLEAR_CONTEXT: {
        const discardedTurns = this.store.clearAllContext();
        this.events.emit(ASSISTANT_EVENTS.CONTEXT_CLEARED, {
          clearedAt: new Date().toISOString(),
          discardedTurns,
        } satisfies ContextClearedEvent);
        return result(CONTEXT_CLEARED[language], true);
      }
    }
  }

  private async selectCandidate(request: DispatchRequest): Promise<DispatchResult> {
    const candidates = this.registry.list().filter((handler) => {
      try {
        return handler.canHandle(request.text, request.context);
      } catch (error) {
        this.logger.warn(`canHandle of "${handler.name}" threw; skipping`, error);
        return false;
      }
    });

    if (candidates.length === 0) return this.useFallback(request);
    if (candidates.length === 1) {
      return this.invoke(candidates[0], request, 'candidate');
    }

    const chosen = await this.disambiguate(request.text, candidates);
    if (!chosen) return this.useFallback(request);
    return this.invoke(chosen, request, 'disambiguated');
  }

  private async disambiguate(
    text: string,
    candidates: ActionHandler[],
  ): Promise<ActionHandler | null> {
    const labels = candidates.map((h) => h.disambiguationLabel);
    try {
      const [top] = await this.gateway.zeroShotClassify(text, labels);
      if (!top || top.score < this.threshold) {
        this.logger.debug(
          `Disambiguation inconclusive among [${labels.join(', ')}] (top ${top?.score ?? 'none'})`,
        );
        return null;
      }
      return candidates.find((h) => h.disambiguationLabel === top.label) ?? null;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Zero-shot disambiguation failed: ${message}`);
      this.events.emit(ASSISTANT_EVENTS.COLLABORATOR_FAILED, {
        collaborator: 'zero-shot',
        message,
      } satisfies CollaboratorFailedEvent);
      return null;
    }
  }

  private async invoke(
    handler: ActionHandler,
    request: DispatchRequest,
    route: DispatchRoute,
  ): Promise<DispatchResult> {
    this.logger.debug(`Invoking handler "${handler.name}" (${route})`);
    try {
      const output = await withTimeout(
        Promise.resolve().then(() =>
          handler.handle(request.text, request.entities, request.context),
        ),
        this.handlerTimeoutMs,
        `handler ${handler.name}`,
      );
      const { response, contextUpdates } = toHandlerResult(output);
      for (const [key, value] of Object.entries(contextUpdates ?? {})) {
        this.store.setCurrentTurnData(key, value);
      }
      return {
        responseText: response,
        handlerUsed: handler.name,
        route,
        failed: false,
        contextCleared: false,
      };
    } catch (error) {
      const reason = error instanceof OperationTimeoutError ? 'timeout' : 'error';
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Handler "${handler.name}" failed (${reason})`, error);
      this.events.emit(ASSISTANT_EVENTS.HANDLER_FAILED, {
        handler: handler.name,
        reason,
        message,
      } satisfies HandlerFailedEvent);

      return {
        responseText:
          handler.failureMessage?.(request.language) ??
          genericHandlerApology(request.language, handler.name),
        handlerUsed: handler.name,
        route,
        failed: true,
        contextCleared: false,
      };
    }
  }

  private async useFallback(request: DispatchRequest): Promise<DispatchResult> {
    const responseText = await this.fallback.respond(
      request.text,
      request.context,
      request.language,
    );
    return {
      responseText,
      handlerUsed: FALLBACK_HANDLER,
      route: 'fallback',
      failed: false,
      contextCleared: false,
    };
  }
}
