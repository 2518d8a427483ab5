/** Intents answered by the dispatcher itself, without any handler. */
export const INTERNAL_INTENTS = {
  HELP: 'INTENT_HELP',
  CLEAR_CONTEXT: 'INTENT_CLEAR_CONTEXT',
  GREET: 'INTENT_GREET',
  FAREWELL: 'INTENT_FAREWELL',
} as const;

export type InternalIntent =
  (typeof INTERNAL_INTENTS)[keyof typeof INTERNAL_INTENTS];

const INTERNAL_INTENT_SET: ReadonlySet<string> = new Set(
  Object.values(INTERNAL_INTENTS),
);

export function isInternalIntent(intent: string): intent is InternalIntent {
  return INTERNAL_INTENT_SET.has(intent);
}

/** Intent → handler name. Handlers named here need not be registered. */
export const INTENT_HANDLER_MAP: Readonly<Record<string, string>> = {
  INTENT_GET_TIME: 'time',
  INTENT_GET_DATE: 'date',
  INTENT_GET_WEATHER: 'weather',
  INTENT_GET_NEWS: 'news',
  INTENT_SET_REMINDER: 'reminders',
  INTENT_SET_ALARM: 'reminders',
  INTENT_OPEN_URL: 'browser',
  INTENT_SEARCH_WEB: 'browser',
};

const PLAY_INTENT_PREFIX = 'INTENT_PLAY_';

export function mappedHandlerName(intent: string): string | undefined {
  if (intent.startsWith(PLAY_INTENT_PREFIX)) return 'music';
  return Object.prototype.hasOwnProperty.call(INTENT_HANDLER_MAP, intent)
    ? INTENT_HANDLER_MAP[intent]
    : undefined;
}
