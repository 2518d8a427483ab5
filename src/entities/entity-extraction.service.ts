import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { Language } from '../common/language';
import {
  ASSISTANT_EVENTS,
  type CollaboratorFailedEvent,
} from '../events/assistant.events';
import { NlpGatewayService } from '../nlp-gateway/nlp-gateway.service';
import type { TaggedSpan } from '../nlp-gateway/nlp-gateway.types';
import { mergeEntities } from './entity-merger';
import type {
  Entity,
  EntityExtractionResult,
  EntitySource,
} from './entity.types';
import { PatternMatcherService } from './pattern-matcher.service';

@Injectable()
export class EntityExtractionService {
  private readonly logger = new Logger(EntityExtractionService.name);

  constructor(
    private readonly patterns: PatternMatcherService,
    private readonly gateway: NlpGatewayService,
    private readonly events: EventEmitter2,
  ) {}

  /**
   * Runs the rule source and both external taggers concurrently and merges
   * their output. A failing tagger contributes nothing.
   */
  async extract(text: string, lang: Language): Promise<EntityExtractionResult> {
    const failedSources: EntitySource[] = [];

    const external = async (
      source: Exclude<EntitySource, 'rule'>,
      call: () => Promise<TaggedSpan[]>,
    ): Promise<Entity[]> => {
      try {
        const spans = await call();
        return spans.map((span) => ({ ...span, source }));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`${source} entity tagger failed: ${message}`);
        failedSources.push(source);
        this.events.emit(ASSISTANT_EVENTS.COLLABORATOR_FAILED, {
          collaborator: `${source}-ner`,
          message,
        } satisfies CollaboratorFailedEvent);
        return [];
      }
    };

    const [general, specialized] = await Promise.all([
      external('general', () => this.gateway.analyze(text, lang)),
      external('specialized', () => this.gateway.specializedNer(text)),
    ]);
    const rule = this.patterns.extract(text, lang);

    const entities = mergeEntities(rule, general, specialized);
    this.logger.debug(
      `Merged ${rule.length} rule, ${specialized.length} specialized, ${general.length} general → ${entities.length}`,
    );
    return { entities, failedSources: failedSources.sort() };
  }
}
