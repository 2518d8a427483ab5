import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SUPPORTED_LANGUAGES, type Language } from '../common/language';
import { ClassifierModelStore } from './classifier-model.store';
import { IntentSamplesLoader } from './intent-samples.loader';
import type { IntentClassification, TrainingReport } from './intent.types';
import { trainIntentModel } from './intent-training';
import { DEFAULT_ALPHA, NaiveBayesClassifier } from './naive-bayes.classifier';
import { tokenize } from './tokenizer';

@Injectable()
export class IntentClassifierService implements OnModuleInit {
  private readonly logger = new Logger(IntentClassifierService.name);
  private readonly models = new Map<Language, NaiveBayesClassifier>();
  private readonly alpha: number;
  private readonly trainOnStart: boolean;

  constructor(
    private readonly config: ConfigService,
    private readonly store: ClassifierModelStore,
    private readonly samples: IntentSamplesLoader,
  ) {
    this.alpha = Number(this.config.get('INTENT_ALPHA') ?? DEFAULT_ALPHA);
    this.trainOnStart =
      String(this.config.get('INTENT_TRAIN_ON_START') ?? 'true') !== 'false';
  }

  async onModuleInit(): Promise<void> {
    for (const language of SUPPORTED_LANGUAGES) {
      if (await this.loadModel(language)) continue;
      if (!this.trainOnStart) continue;

      try {
        await this.train(language);
      } catch (error) {
        this.logger.error(
          `Training the ${language} intent model failed; classifier unavailable`,
          error,
        );
      }
    }
  }

  /** Replaces the live model of a language with the one stored on disk. */
  async loadModel(language: Language): Promise<boolean> {
    const classifier = await this.store.load(language);
    if (!classifier) return false;
    this.models.set(language, classifier);
    return true;
  }

  /**
   * Trains a fresh model from the bundled samples, saves it and swaps it in
   * for the language.
   */
  async train(language: Language): Promise<TrainingReport> {
    const file = await this.samples.load(language);
    const { classifier, samples, emptyClasses } = trainIntentModel(
      file,
      language,
      this.alpha,
    );

    const modelPath = await this.store.save(language, classifier);
    this.models.set(language, classifier);

    return {
      language,
      samples,
      classes: classifier.classes.length,
      vocabularySize: classifier.vocabularySize,
      emptyClasses,
      modelPath,
    };
  }

  classify(text: string, language: Language): IntentClassification {
    const classifier = this.models.get(language);
    if (!classifier || classifier.classes.length === 0) {
      this.logger.warn(`Intent classifier unavailable for "${language}"`);
      return {
        status: 'unavailable',
        reason: `No intent model loaded for language "${language}"`,
      };
    }

    const tokens = tokenize(text, language);
    const ranking = classifier.rank(tokens);
    const intent = classifier.predict(tokens);
    if (intent === null) {
      return { status: 'unavailable', reason: 'Intent model has no classes' };
    }

    const confidence = ranking.find((r) => r.label === intent)?.confidence ?? 0;
    this.logger.debug(
      `"${text.slice(0, 60)}" → ${intent} (${confidence.toFixed(3)})`,
    );
    return { status: 'ok', intent, confidence, tokens, ranking };
  }
}
