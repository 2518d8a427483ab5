import { IsIn, IsOptional, IsString, MinLength } from 'class-validator';
import { SUPPORTED_LANGUAGES, type Language } from '../common/language';

export class NluTextDto {
  @IsString()
  @MinLength(1)
  text!: string;

  @IsOptional()
  @IsString()
  language?: string;
}

export class NluTrainDto {
  @IsIn([...SUPPORTED_LANGUAGES])
  language!: Language;
}
