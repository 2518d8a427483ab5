import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { NaiveBayesClassifier } from './naive-bayes.classifier';

@Injectable()
export class ClassifierModelStore {
  private readonly logger = new Logger(ClassifierModelStore.name);
  private readonly modelDir: string;

  constructor(private readonly config: ConfigService) {
    this.modelDir = resolve(
      this.config.get<string>('INTENT_MODEL_DIR') ?? join(process.cwd(), 'models'),
    );
  }

  pathFor(language: string): string {
    return join(this.modelDir, `intent-classifier.${language}.json`);
  }

  async save(language: string, classifier: NaiveBayesClassifier): Promise<string> {
    const path = this.pathFor(language);
    await mkdir(this.modelDir, { recursive: true });
    await writeFile(path, JSON.stringify(classifier.toJSON()), 'utf-8');
    this.logger.log(`Saved ${language} intent model to ${path}`);
    return path;
  }

  /**
   * Loads the model of a language. A missing, unreadable or corrupt file
   * means "classifier unavailable" and resolves to null.
   */
  async load(language: string): Promise<NaiveBayesClassifier | null> {
    const path = this.pathFor(language);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      const code =
        error instanceof Error && 'code' in error ? String(error.code) : undefined;
      if (code === 'ENOENT') {
        this.logger.warn(`No ${language} intent model at ${path}`);
      } else {
        this.logger.error(`Could not read ${language} intent model at ${path}`, error);
      }
      return null;
    }

    try {
      const classifier = NaiveBayesClassifier.fromJSON(JSON.parse(raw));
      this.logger.log(
        `Loaded ${language} intent model (${classifier.classes.length} classes, vocabulary ${classifier.vocabularySize})`,
      );
      return classifier;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Corrupt ${language} intent model at ${path}: ${message}`);
      return null;
    }
  }
}
