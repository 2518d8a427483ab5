import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsString,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { SUPPORTED_LANGUAGES, type Language } from '../common/language';

export class IntentSampleDto {
  @IsString()
  @MinLength(1)
  text!: string;

  @IsString()
  @MinLength(1)
  intent!: string;
}

export class IntentSampleFileDto {
  @IsIn([...SUPPORTED_LANGUAGES])
  language!: Language;

  @IsArray()
  @IsString({ each: true })
  labels!: string[];

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => IntentSampleDto)
  samples!: IntentSampleDto[];
}
