import { Logger } from '@nestjs/common';
import { ClassifierStateError, InvalidModelError } from './nlu.errors';
import {
  MODEL_FORMAT,
  type ClassScore,
  type LabeledTokens,
  type SerializedClassifierModel,
} from './intent.types';
import type { Vocabulary } from './vocabulary';

export const DEFAULT_ALPHA = 1.0;

function compareLabels(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Multinomial Naive Bayes over token counts with additive (Lidstone)
 * smoothing.
 *
 * An instance is trained exactly once; retraining means building a new
 * instance. Classes are kept in label order and the first maximum wins, so
 * equal scores resolve to the lexicographically smallest label.
 */
export class NaiveBayesClassifier {
  private readonly logger = new Logger(NaiveBayesClassifier.name);

  private trained = false;
  private labels: string[] = [];
  private readonly logPriors = new Map<string, number>();
  private readonly logLikelihoods = new Map<string, number[]>();
  private vocab: Vocabulary = new Map();

  constructor(readonly alpha: number = DEFAULT_ALPHA) {
    if (!Number.isFinite(alpha) || alpha <= 0) {
      throw new RangeError(`alpha must be a finite number > 0, got ${alpha}`);
    }
  }

  get isTrained(): boolean {
    return this.trained;
  }

  get classes(): readonly string[] {
    return this.labels;
  }

  get vocabulary(): Vocabulary {
    return this.vocab;
  }

  get vocabularySize(): number {
    return this.vocab.size;
  }

  /**
   * Estimates priors and smoothed per-token log likelihoods.
   * `declaredClasses` may name labels without any sample; they get a prior of
   * -Infinity and can never be predicted.
   */
  train(
    samples: readonly LabeledTokens[],
    vocabulary: Vocabulary,
    declaredClasses: readonly string[] = [],
  ): void {
    if (this.trained) {
      throw new ClassifierStateError(
        'Classifier is already trained; create a new instance to retrain',
      );
    }

    const labels = [
      ...new Set([...declaredClasses, ...samples.map((s) => s.label)]),
    ].sort(compareLabels);
    const vocabularySize = vocabulary.size;

    const docCounts = new Map<string, number>();
    const tokenCounts = new Map<string, number[]>();
    const totalTokens = new Map<string, number>();
    for (const label of labels) {
      docCounts.set(label, 0);
      tokenCounts.set(label, new Array<number>(vocabularySize).fill(0));
      totalTokens.set(label, 0);
    }

    for (const sample of samples) {
      docCounts.set(sample.label, (docCounts.get(sample.label) ?? 0) + 1);
      const counts = tokenCounts.get(sample.label);
      if (!counts) continue;
      for (const token of sample.tokens) {
        const index = vocabulary.get(token);
        if (index === undefined) continue;
        counts[index] += 1;
        totalTokens.set(sample.label, (totalTokens.get(sample.label) ?? 0) + 1);
      }
    }

    const totalDocs = samples.length;
    for (const label of labels) {
      const docs = docCounts.get(label) ?? 0;
      if (docs === 0) {
        this.logger.warn(
          `Class "${label}" has no training documents; its prior is -Infinity`,
        );
        this.logPriors.set(label, Number.NEGATIVE_INFINITY);
      } else {
        this.logPriors.set(label, Math.log(docs) - Math.log(totalDocs));
      }

      const counts = tokenCounts.get(label) ?? [];
      const denominator = Math.log(
        (totalTokens.get(label) ?? 0) + this.alpha * vocabularySize,
      );
      this.logLikelihoods.set(
        label,
        counts.map((count) => Math.log(count + this.alpha) - denominator),
      );
    }

    if (labels.length === 0) {
      this.logger.warn('Trained without any class; predictions will be null');
    }

    this.labels = labels;
    this.vocab = new Map(vocabulary);
    this.trained = true;
    this.logger.log(
      `Trained on ${totalDocs} samples: ${labels.length} classes, vocabulary ${vocabularySize}`,
    );
  }

  /** Returns the highest-scoring label, or null when there are no classes. */
  predict(tokens: readonly string[]): string | null {
    const indexes = this.knownIndexes(tokens);
    let best: string | null = null;
    let bestScore = Number.NEGATIVE_INFINITY;

    for (const label of this.labels) {
      const score = this.score(label, indexes);
      if (best === null || score > bestScore) {
        best = label;
        bestScore = score;
      }
    }
    return best;
  }

  /** Every class with its log score and softmax confidence, best first. */
  rank(tokens: readonly string[]): ClassScore[] {
    const indexes = this.knownIndexes(tokens);
    const scored = this.labels.map((label) => ({
      label,
      logScore: this.score(label, indexes),
    }));

    scored.sort((a, b) => {
      if (a.logScore !== b.logScore) {
        return a.logScore > b.logScore ? -1 : 1;
      }
      return compareLabels(a.label, b.label);
    });

    const maxScore = scored[0]?.logScore ?? Number.NEGATIVE_INFINITY;
    if (!Number.isFinite(maxScore)) {
      return scored.map((s) => ({ ...s, confidence: 0 }));
    }
    const expScores = scored.map((s) => Math.exp(s.logScore - maxScore));
    const sum = expScores.reduce((acc, value) => acc + value, 0);

    return scored.map((s, i) => ({ ...s, confidence: expScores[i] / sum }));
  }

  logPrior(label: string): number | undefined {
    return this.logPriors.get(label);
  }

  logLikelihood(label: string, token: string): number | undefined {
    const index = this.vocab.get(token);
    if (index === undefined) return undefined;
    return this.logLikelihoods.get(label)?.[index];
  }

  toJSON(): SerializedClassifierModel {
    if (!this.trained) {
      throw new ClassifierStateError('Cannot serialize an untrained classifier');
    }

    const logPriors: Record<string, number | null> = {};
    const logLikelihoods: Record<string, number[]> = {};
    for (const label of this.labels) {
      const prior = this.logPriors.get(label) ?? Number.NEGATIVE_INFINITY;
      logPriors[label] = Number.isFinite(prior) ? prior : null;
      logLikelihoods[label] = [...(this.logLikelihoods.get(label) ?? [])];
    }

    return {
      format: MODEL_FORMAT,
      alpha: this.alpha,
      classes: [...this.labels],
      logPriors,
      logLikelihoods,
      vocabulary: Object.fromEntries(this.vocab),
      vocabularySize: this.vocab.size,
    };
  }

  /**
   * Rebuilds a trained classifier from its serialized record.
   * @throws InvalidModelError when the record is malformed
   */
  static fromJSON(record: unknown): NaiveBayesClassifier {
    if (!isRecord(record)) {
      throw new InvalidModelError('Model record is not an object');
    }
    if (record['format'] !== MODEL_FORMAT) {
      throw new InvalidModelError(`Unknown model format: ${String(record['format'])}`);
    }

    const alpha = record['alpha'];
    if (typeof alpha !== 'number' || !Number.isFinite(alpha) || alpha <= 0) {
      throw new InvalidModelError('alpha must be a finite number > 0');
    }

    const classes = record['classes'];
    if (
      !Array.isArray(classes) ||
      !classes.every((c): c is string => typeof c === 'string') ||
      new Set(classes).size !== classes.length
    ) {
      throw new InvalidModelError('classes must be a list of distinct strings');
    }

    const vocabularySize = record['vocabularySize'];
    const rawVocabulary = record['vocabulary'];
    if (!isRecord(rawVocabulary) || typeof vocabularySize !== 'number') {
      throw new InvalidModelError('vocabulary and vocabularySize are required');
    }
    const vocabulary = new Map<string, number>();
    const seenIndexes = new Set<number>();
    for (const [token, index] of Object.entries(rawVocabulary)) {
      if (
        typeof index !== 'number' ||
        !Number.isInteger(index) ||
        index < 0 ||
        index >= vocabularySize ||
        seenIndexes.has(index)
      ) {
        throw new InvalidModelError(`Invalid vocabulary index for "${token}"`);
      }
      seenIndexes.add(index);
      vocabulary.set(token, index);
    }
    if (vocabulary.size !== vocabularySize) {
      throw new InvalidModelError(
        `vocabularySize ${vocabularySize} does not match ${vocabulary.size} entries`,
      );
    }

    const rawPriors = record['logPriors'];
    const rawLikelihoods = record['logLikelihoods'];
    if (!isRecord(rawPriors) || !isRecord(rawLikelihoods)) {
      throw new InvalidModelError('logPriors and logLikelihoods are required');
    }

    const classifier = new NaiveBayesClassifier(alpha);
    for (const label of classes) {
      const prior = rawPriors[label];
      if (prior === null) {
        classifier.logPriors.set(label, Number.NEGATIVE_INFINITY);
      } else if (typeof prior === 'number' && Number.isFinite(prior)) {
        classifier.logPriors.set(label, prior);
      } else {
        throw new InvalidModelError(`Missing or invalid prior for "${label}"`);
      }

      const likelihoods = rawLikelihoods[label];
      if (
        !Array.isArray(likelihoods) ||
        likelihoods.length !== vocabularySize ||
        !likelihoods.every(
          (v): v is number => typeof v === 'number' && Number.isFinite(v),
        )
      ) {
        throw new InvalidModelError(`Invalid likelihoods for "${label}"`);
      }
      classifier.logLikelihoods.set(label, [...likelihoods]);
    }

    classifier.labels = [...classes].sort(compareLabels);
    classifier.vocab = vocabulary;
    classifier.trained = true;
    return classifier;
  }

  private knownIndexes(tokens: readonly string[]): number[] {
    const indexes: number[] = [];
    for (const token of tokens) {
      const index = this.vocab.get(token);
      if (index !== undefined) indexes.push(index);
    }
    return indexes;
  }

  private score(label: string, indexes: readonly number[]): number {
    const likelihoods = this.logLikelihoods.get(label) ?? [];
    let score = this.logPriors.get(label) ?? Number.NEGATIVE_INFINITY;
    for (const index of indexes) {
      score += likelihoods[index];
    }
    return score;
  }
}
