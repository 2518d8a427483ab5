import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { Language } from '../common/language';
import { IntentSampleFileDto } from './intent-samples.dto';

@Injectable()
export class IntentSamplesLoader {
  private readonly logger = new Logger(IntentSamplesLoader.name);
  private readonly dataDir: string;

  constructor(private readonly config: ConfigService) {
    this.dataDir = resolve(
      this.config.get<string>('INTENT_DATA_DIR') ??
        join(process.cwd(), 'data', 'intents'),
    );
  }

  pathFor(language: Language): string {
    return join(this.dataDir, `${language}.json`);
  }

  /**
   * Reads and validates the labelled utterances of one language.
   * @throws Error when the file is missing, not JSON or fails validation
   */
  async load(language: Language): Promise<IntentSampleFileDto> {
    const path = this.pathFor(language);
    const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
    const file = plainToInstance(IntentSampleFileDto, raw);

    const errors = validateSync(file);
    if (errors.length > 0) {
      const details = errors.map((e) => e.toString()).join('; ');
      throw new Error(`Invalid intent samples in ${path}: ${details}`);
    }
    if (file.language !== language) {
      throw new Error(
        `Intent samples in ${path} are for "${file.language}", expected "${language}"`,
      );
    }

    this.logger.log(
      `Loaded ${file.samples.length} ${language} intent samples from ${path}`,
    );
    return file;
  }
}
