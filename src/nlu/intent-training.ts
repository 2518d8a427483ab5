import type { Language } from '../common/language';
import type { IntentSampleFileDto } from './intent-samples.dto';
import { NaiveBayesClassifier } from './naive-bayes.classifier';
import { tokenize } from './tokenizer';
import { buildVocabulary } from './vocabulary';

export interface TrainedIntentModel {
  classifier: NaiveBayesClassifier;
  samples: number;
  /** Declared labels that had no sample */
  emptyClasses: string[];
}

/** Tokenizes the samples of one language and trains a fresh classifier on them. */
export function trainIntentModel(
  file: IntentSampleFileDto,
  language: Language,
  alpha: number,
): TrainedIntentModel {
  const labelled = file.samples.map((sample) => ({
    tokens: tokenize(sample.text, language),
    label: sample.intent,
  }));

  const vocabulary = buildVocabulary(labelled.map((s) => s.tokens));
  const classifier = new NaiveBayesClassifier(alpha);
  classifier.train(labelled, vocabulary, file.labels);

  const withSamples = new Set(labelled.map((s) => s.label));
  return {
    classifier,
    samples: labelled.length,
    emptyClasses: classifier.classes.filter((label) => !withSamples.has(label)),
  };
}
