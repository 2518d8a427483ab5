import { Module } from '@nestjs/common';
import { NlpGatewayModule } from '../nlp-gateway/nlp-gateway.module';
import { EntityExtractionService } from './entity-extraction.service';
import { PatternMatcherService } from './pattern-matcher.service';

@Module({
  imports: [NlpGatewayModule],
  providers: [PatternMatcherService, EntityExtractionService],
  exports: [PatternMatcherService, EntityExtractionService],
})
export class EntitiesModule {}
