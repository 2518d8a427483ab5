import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  ASSISTANT_EVENTS,
  type CollaboratorFailedEvent,
  type ContextClearedEvent,
  type HandlerFailedEvent,
  type IntentClassifiedEvent,
  type TurnRecordedEvent,
} from '../events/assistant.events';

function excerpt(text: string): string {
  return `${text.slice(0, 60)}${text.length > 60 ? '…' : ''}`;
}

@Injectable()
export class AssistantEventsListener {
  private readonly logger = new Logger('AssistantEventsListener');

  @OnEvent(ASSISTANT_EVENTS.INTENT_CLASSIFIED)
  onIntentClassified(event: IntentClassifiedEvent) {
    this.logger.log(
      `[intent.classified] ${event.intent} (${event.confidence.toFixed(3)}, ${event.language}) text="${excerpt(event.rawText)}"`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.TURN_RECORDED)
  onTurnRecorded(event: TurnRecordedEvent) {
    this.logger.debug(
      `[turn.recorded] ${event.speaker} id=${event.turnId} history=${event.historySize} text="${excerpt(event.text)}"`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.CONTEXT_CLEARED)
  onContextCleared(event: ContextClearedEvent) {
    this.logger.log(
      `[context.cleared] at=${event.clearedAt} discarded=${event.discardedTurns}`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.HANDLER_FAILED)
  onHandlerFailed(event: HandlerFailedEvent) {
    this.logger.warn(
      `[handler.failed] handler=${event.handler} reason=${event.reason} message="${event.message}"`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.COLLABORATOR_FAILED)
  onCollaboratorFailed(event: CollaboratorFailedEvent) {
    this.logger.warn(
      `[collaborator.failed] ${event.collaborator}: ${event.message}`,
    );
  }
}
