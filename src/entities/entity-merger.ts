import type { Entity } from './entity.types';

interface Span {
  start: number;
  end: number;
}

export function spansOverlap(a: Span, b: Span): boolean {
  return Math.max(a.start, b.start) < Math.min(a.end, b.end);
}

/**
 * Reconciles the three entity sources into one non-overlapping list.
 *
 * Priority is rule > specialized > general: every rule entity is kept, and a
 * lower-priority entity is kept only when no already accepted span overlaps
 * it. Within a tier, earlier entities win. Confidence scores play no part.
 */
export function mergeEntities(
  ruleEntities: readonly Entity[],
  generalEntities: readonly Entity[],
  specializedEntities: readonly Entity[],
): Entity[] {
  const accepted: Entity[] = [...ruleEntities];

  for (const tier of [specializedEntities, generalEntities]) {
    for (const candidate of tier) {
      if (!accepted.some((entity) => spansOverlap(entity, candidate))) {
        accepted.push(candidate);
      }
    }
  }

  return accepted.sort((a, b) => a.start - b.start);
}
