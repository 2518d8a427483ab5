import { Body, Controller, Post } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiTags } from '@nestjs/swagger';
import { resolveLanguage, type Language } from '../common/language';
import { EntityExtractionService } from '../entities/entity-extraction.service';
import { IntentClassifierService } from './intent-classifier.service';
import { NluTextDto, NluTrainDto } from './nlu.dto';

@ApiTags('nlu')
@Controller('nlu')
export class NluController {
  private readonly defaultLanguage: Language;

  constructor(
    private readonly classifier: IntentClassifierService,
    private readonly entities: EntityExtractionService,
    config: ConfigService,
  ) {
    this.defaultLanguage = resolveLanguage(
      config.get<string>('DEFAULT_LANGUAGE'),
      'es',
    );
  }

  @Post('classify')
  classify(@Body() dto: NluTextDto) {
    const language = resolveLanguage(dto.language, this.defaultLanguage);
    return { language, ...this.classifier.classify(dto.text, language) };
  }

  @Post('entities')
  async extractEntities(@Body() dto: NluTextDto) {
    const language = resolveLanguage(dto.language, this.defaultLanguage);
    return { language, ...(await this.entities.extract(dto.text, language)) };
  }

  @Post('train')
  async train(@Body() dto: NluTrainDto) {
    return this.classifier.train(dto.language);
  }
}
