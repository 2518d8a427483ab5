export const SUPPORTED_LANGUAGES = ['es', 'en'] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export function isSupportedLanguage(value: unknown): value is Language {
  return (
    typeof value === 'string' &&
    (SUPPORTED_LANGUAGES as readonly string[]).includes(value)
  );
}

/**
 * Resolves a caller-supplied language hint, falling back when the hint is
 * missing or names a language without models.
 */
export function resolveLanguage(hint: unknown, fallback: Language): Language {
  const normalized =
    typeof hint === 'string' ? hint.trim().toLowerCase() : undefined;
  return isSupportedLanguage(normalized) ? normalized : fallback;
}
