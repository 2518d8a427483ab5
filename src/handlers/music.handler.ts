import { Injectable } from '@nestjs/common';
import type { ContextSnapshot } from '../context/context.types';
import type { Entity } from '../entities/entity.types';
import {
  conversationLanguage,
  type ActionHandler,
  type HandlerResult,
} from './handler.types';

const MUSIC_KEYWORDS =
  /\b(play|music|song|playlist|pon|ponme|reproduce|toca|m[uú]sica|canci[oó]n|lista)\b/i;
const PLAY_REQUEST = /\b(?:play|pon|ponme|reproduce|toca)\s+(.+)$/i;
const TITLE_LABELS = ['WORK_OF_ART', 'PERSON', 'ORG'];

export const LAST_MUSIC_QUERY_KEY = 'last_music_query';

@Injectable()
export class MusicHandler implements ActionHandler {
  readonly name = 'music';
  readonly description = 'Plays songs, artists and playlists';
  readonly disambiguationLabel = 'play music';

  canHandle(text: string): boolean {
    return MUSIC_KEYWORDS.test(text);
  }

  handle(text: string, entities: Entity[], context: ContextSnapshot): HandlerResult {
    const query = this.findQuery(text, entities);
    const english = conversationLanguage(context) === 'en';

    if (!query) {
      return {
        response: english
          ? 'What would you like me to play?'
          : '¿Qué quieres que ponga?',
      };
    }

    return {
      response: english ? `Playing "${query}".` : `Reproduciendo "${query}".`,
      contextUpdates: { [LAST_MUSIC_QUERY_KEY]: query },
    };
  }

  private findQuery(text: string, entities: Entity[]): string | null {
    for (const label of TITLE_LABELS) {
      const entity = entities.find((e) => e.label === label);
      if (entity) return entity.text;
    }

    const match = PLAY_REQUEST.exec(text.trim());
    const rest = match?.[1]?.replace(/[.!?¡¿]+$/u, '').trim();
    return rest ? rest : null;
  }
}
