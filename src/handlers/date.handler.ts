import { Injectable } from '@nestjs/common';
import type { ContextSnapshot } from '../context/context.types';
import type { Entity } from '../entities/entity.types';
import { conversationLanguage, type ActionHandler } from './handler.types';

const DATE_KEYWORDS = /\b(fecha|d[ií]a|hoy|date|day|today)\b/i;

const DAY_NAMES = {
  es: ['domingo', 'lunes', 'martes', 'miércoles', 'jueves', 'viernes', 'sábado'],
  en: ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'],
};

const MONTH_NAMES = {
  es: [
    'enero', 'febrero', 'marzo', 'abril', 'mayo', 'junio',
    'julio', 'agosto', 'septiembre', 'octubre', 'noviembre', 'diciembre',
  ],
  en: [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December',
  ],
};

@Injectable()
export class DateHandler implements ActionHandler {
  readonly name = 'date';
  readonly description = "Tells today's date";
  readonly disambiguationLabel = 'current date';

  canHandle(text: string): boolean {
    return DATE_KEYWORDS.test(text);
  }

  handle(_text: string, _entities: Entity[], context: ContextSnapshot): string {
    const now = new Date();
    const day = now.getDate();
    const year = now.getFullYear();

    if (conversationLanguage(context) === 'en') {
      const weekday = DAY_NAMES.en[now.getDay()];
      const month = MONTH_NAMES.en[now.getMonth()];
      return `Today is ${weekday}, ${month} ${day}, ${year}.`;
    }

    const weekday = DAY_NAMES.es[now.getDay()];
    const month = MONTH_NAMES.es[now.getMonth()];
    return `Hoy es ${weekday}, ${day} de ${month} de ${year}.`;
  }
}
