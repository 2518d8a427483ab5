import type { Language } from '../common/language';
import type { ActionHandler } from '../handlers/handler.types';

export const GREETING: Record<Language, string> = {
  es: '¡Hola! ¿En qué puedo ayudarte?',
  en: 'Hello! How can I help you?',
};

export const FAREWELL: Record<Language, string> = {
  es: '¡Hasta luego!',
  en: 'Goodbye!',
};

export const CONTEXT_CLEARED: Record<Language, string> = {
  es: 'He olvidado nuestra conversación.',
  en: "I've cleared our conversation.",
};

export function helpText(language: Language, handlers: ActionHandler[]): string {
  const intro =
    language === 'en' ? 'I can help you with:' : 'Puedo ayudarte con:';
  const lines = handlers.map((h) => `- ${h.name}: ${h.description}`);
  return [intro, ...lines].join('\n');
}

export function genericHandlerApology(language: Language, handler: string): string {
  return language === 'en'
    ? `Sorry, something went wrong with ${handler}.`
    : `Lo siento, algo ha fallado con ${handler}.`;
}
