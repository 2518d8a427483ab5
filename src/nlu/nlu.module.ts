import { Module } from '@nestjs/common';
import { EntitiesModule } from '../entities/entities.module';
import { ClassifierModelStore } from './classifier-model.store';
import { IntentClassifierService } from './intent-classifier.service';
import { IntentSamplesLoader } from './intent-samples.loader';
import { NluController } from './nlu.controller';

@Module({
  imports: [EntitiesModule],
  controllers: [NluController],
  providers: [ClassifierModelStore, IntentSamplesLoader, IntentClassifierService],
  exports: [IntentClassifierService],
})
export class NluModule {}
