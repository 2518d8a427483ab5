import { Injectable, Logger } from '@nestjs/common';
import * as chrono from 'chrono-node';
import type { Language } from '../common/language';
import { spansOverlap } from './entity-merger';
import type { Entity } from './entity.types';

interface PatternRule {
  label: string;
  pattern: RegExp;
  /** Capture group holding the entity text; 0 for the whole match */
  group: number;
}

// Order matters: a later match that overlaps an earlier one is discarded.
const PATTERN_RULES: PatternRule[] = [
  { label: 'URL', pattern: /\b(?:https?:\/\/|www\.)[^\s]+[^\s.,;:!?)"'»”]/gi, group: 0 },
  { label: 'EMAIL', pattern: /\b[\w.+-]+@[\w-]+(?:\.[\w-]+)+\b/g, group: 0 },
  { label: 'PHONE_NUMBER', pattern: /(?:\+\d{1,3}[ .-]?)?\b\d(?:[ .-]?\d){8,14}\b/g, group: 0 },
  { label: 'WORK_OF_ART', pattern: /"([^"\n]+)"|“([^”\n]+)”|«([^»\n]+)»/g, group: 1 },
];

/**
 * Deterministic entity source: regular expressions for contact data and
 * quoted titles, chrono-node for dates and times.
 */
@Injectable()
export class PatternMatcherService {
  private readonly logger = new Logger(PatternMatcherService.name);

  extract(text: string, lang: Language, referenceDate?: Date): Entity[] {
    const found: Entity[] = [];
    const accept = (entity: Entity) => {
      if (!found.some((other) => spansOverlap(other, entity))) {
        found.push(entity);
      }
    };

    for (const rule of PATTERN_RULES) {
      for (const match of text.matchAll(rule.pattern)) {
        const entity = this.fromMatch(rule, match);
        if (entity) accept(entity);
      }
    }

    for (const entity of this.extractTemporal(text, lang, referenceDate)) {
      accept(entity);
    }

    this.logger.debug(
      `${found.length} rule entit${found.length === 1 ? 'y' : 'ies'} in "${text.slice(0, 60)}"`,
    );
    return found.sort((a, b) => a.start - b.start);
  }

  private fromMatch(rule: PatternRule, match: RegExpMatchArray): Entity | null {
    if (match.index === undefined) return null;

    if (rule.group === 0) {
      return {
        text: match[0],
        label: rule.label,
        start: match.index,
        end: match.index + match[0].length,
        source: 'rule',
      };
    }

    // quoted titles: the first alternative that matched, without its quotes
    const inner = match.slice(1).find((g) => g !== undefined);
    if (!inner) return null;
    const start = match.index + match[0].indexOf(inner);
    return {
      text: inner,
      label: rule.label,
      start,
      end: start + inner.length,
      source: 'rule',
    };
  }

  private extractTemporal(
    text: string,
    lang: Language,
    referenceDate?: Date,
  ): Entity[] {
    const parser = lang === 'es' ? chrono.es : chrono.en;
    const results = parser.parse(text, referenceDate ?? new Date(), {
      forwardDate: true,
    });

    return results.map((result) => ({
      text: result.text,
      label: result.start.isCertain('hour') ? 'TIME' : 'DATE',
      start: result.index,
      end: result.index + result.text.length,
      source: 'rule' as const,
    }));
  }
}
