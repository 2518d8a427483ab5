import 'reflect-metadata';
import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { SUPPORTED_LANGUAGES } from '../common/language';
import { ClassifierModelStore } from '../nlu/classifier-model.store';
import { IntentSamplesLoader } from '../nlu/intent-samples.loader';
import { trainIntentModel } from '../nlu/intent-training';
import { DEFAULT_ALPHA } from '../nlu/naive-bayes.classifier';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [ClassifierModelStore, IntentSamplesLoader],
})
class IntentTrainingModule {}

async function main() {
  const logger = new Logger('TrainIntentModels');
  const app = await NestFactory.createApplicationContext(IntentTrainingModule);

  const alpha = Number(app.get(ConfigService).get('INTENT_ALPHA') ?? DEFAULT_ALPHA);
  const samples = app.get(IntentSamplesLoader);
  const store = app.get(ClassifierModelStore);

  let failures = 0;
  for (const language of SUPPORTED_LANGUAGES) {
    try {
      const file = await samples.load(language);
      const model = trainIntentModel(file, language, alpha);
      const path = await store.save(language, model.classifier);
      logger.log(
        `${language}: ${model.samples} samples, ${model.classifier.classes.length} classes, vocabulary ${model.classifier.vocabularySize} → ${path}`,
      );
      if (model.emptyClasses.length > 0) {
        logger.warn(`${language}: no samples for ${model.emptyClasses.join(', ')}`);
      }
    } catch (error) {
      failures += 1;
      logger.error(`${language}: training failed`, error);
    }
  }

  await app.close();
  process.exitCode = failures > 0 ? 1 : 0;
}

void main();
