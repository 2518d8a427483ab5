/** Which extractor produced an entity, in decreasing order of trust. */
export type EntitySource = 'rule' | 'specialized' | 'general';

export interface Entity {
  text: string;
  label: string;
  /** Inclusive start offset in the utterance */
  start: number;
  /** Exclusive end offset in the utterance */
  end: number;
  source: EntitySource;
  score?: number;
}

export interface EntityExtractionResult {
  entities: Entity[];
  /** External sources that failed and contributed nothing */
  failedSources: EntitySource[];
}
