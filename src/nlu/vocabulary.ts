import { Logger } from '@nestjs/common';

export type Vocabulary = ReadonlyMap<string, number>;

const logger = new Logger('Vocabulary');

function compareTokens(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Assigns every distinct token a stable index: tokens are sorted and indexed
 * by their sorted position, so identical corpora always yield identical maps.
 */
export function buildVocabulary(sequences: readonly (readonly string[])[]): Vocabulary {
  const distinct = new Set<string>();
  for (const sequence of sequences) {
    for (const token of sequence) {
      distinct.add(token);
    }
  }

  const sorted = [...distinct].sort(compareTokens);
  const vocabulary = new Map<string, number>();
  sorted.forEach((token, index) => vocabulary.set(token, index));

  logger.log(`Built vocabulary with ${vocabulary.size} unique tokens`);
  return vocabulary;
}
