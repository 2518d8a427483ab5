import { Logger } from '@nestjs/common';

const logger = new Logger('Tokenizer');

const TOKEN_PATTERNS: Record<string, RegExp> = {
  en: /[a-z0-9']+/g,
  es: /[a-z0-9ñáéíóúü]+/g,
};

const GENERIC_TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Splits an utterance into lower-case tokens using the character allow-list
 * of the given language. Unknown language codes use a generic
 * letters-and-digits rule. Never throws: non-string input yields `[]`.
 */
export function tokenize(text: unknown, lang: string): string[] {
  if (typeof text !== 'string') {
    logger.error(`Tokenizer received non-string input: ${typeof text}`);
    return [];
  }

  let lower = text.toLowerCase();

  if (lang === 'es') {
    lower = lower.replace(/^[¿¡]+|[¿¡]+$/g, '');
  }

  const pattern = TOKEN_PATTERNS[lang];
  let tokens: string[];

  if (pattern) {
    tokens = lower.match(pattern) ?? [];
  } else {
    logger.warn(`Unsupported tokenizer language "${lang}", using generic word split`);
    tokens = lower.match(GENERIC_TOKEN_PATTERN) ?? [];
  }

  if (lang === 'en') {
    // apostrophes only survive inside a word ("don't")
    tokens = tokens
      .map((token) => token.replace(/^'+|'+$/g, ''))
      .filter((token) => token.length > 0);
  }

  logger.debug(`"${text.slice(0, 60)}" → [${tokens.join(', ')}] (lang: ${lang})`);
  return tokens;
}
