import { Injectable } from '@nestjs/common';
import type { ContextSnapshot } from '../context/context.types';
import type { Entity } from '../entities/entity.types';
import type { Language } from '../common/language';
import { conversationLanguage, type ActionHandler } from './handler.types';

const TIME_KEYWORDS = /\b(hora|horas|time|clock|o'clock)\b/i;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

@Injectable()
export class TimeHandler implements ActionHandler {
  readonly name = 'time';
  readonly description = 'Tells the current time';
  readonly disambiguationLabel = 'current time';

  canHandle(text: string): boolean {
    return TIME_KEYWORDS.test(text);
  }

  handle(_text: string, _entities: Entity[], context: ContextSnapshot): string {
    const now = new Date();
    const clock = `${now.getHours()}:${pad(now.getMinutes())}`;

    if (conversationLanguage(context) === 'en') {
      return `It's ${clock}.`;
    }
    return now.getHours() === 1 ? `Es la ${clock}.` : `Son las ${clock}.`;
  }

  failureMessage(language: Language): string {
    return language === 'en'
      ? "Sorry, I couldn't read the clock."
      : 'Lo siento, no he podido consultar la hora.';
  }
}
