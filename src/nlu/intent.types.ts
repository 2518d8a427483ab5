export interface LabeledTokens {
  tokens: readonly string[];
  label: string;
}

export interface ClassScore {
  label: string;
  logScore: number;
  /** Softmax of the log scores, 0.0 - 1.0 */
  confidence: number;
}

export const MODEL_FORMAT = 'naive-bayes/v1';

/**
 * Flat JSON record of a trained classifier. Priors of -Infinity are stored as
 * `null`; `logLikelihoods[label][i]` belongs to the token whose index is `i`.
 */
export interface SerializedClassifierModel {
  format: typeof MODEL_FORMAT;
  alpha: number;
  classes: string[];
  logPriors: Record<string, number | null>;
  logLikelihoods: Record<string, number[]>;
  vocabulary: Record<string, number>;
  vocabularySize: number;
}

export type IntentClassification =
  | {
      status: 'ok';
      intent: string;
      confidence: number;
      tokens: string[];
      ranking: ClassScore[];
    }
  | {
      status: 'unavailable';
      reason: string;
    };

export interface TrainingReport {
  language: string;
  samples: number;
  classes: number;
  vocabularySize: number;
  emptyClasses: string[];
  modelPath: string;
}
