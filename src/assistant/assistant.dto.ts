import { IsOptional, IsString, MaxLength } from 'class-validator';

export class ProcessUtteranceDto {
  @IsString()
  @MaxLength(2000)
  text!: string;

  @IsOptional()
  @IsString()
  language?: string;
}
