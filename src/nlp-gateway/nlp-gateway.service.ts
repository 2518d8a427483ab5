import {
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Language } from '../common/language';
import type {
  NlpCollaborator,
  SentimentResult,
  TaggedSpan,
  ZeroShotScore,
} from './nlp-gateway.types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/** UTF-16 offset of every code point boundary of `text`, end included. */
function codeUnitOffsets(text: string): number[] {
  const offsets = [0];
  let unit = 0;
  for (const char of text) {
    unit += char.length;
    offsets.push(unit);
  }
  return offsets;
}

/**
 * Client of the NLP sidecar that hosts the pretrained models: the linguistic
 * base pipeline, the specialized NER tagger, zero-shot classification and
 * sentiment. Every call is bounded by a timeout and fails with
 * ServiceUnavailableException; callers decide what "no result" means.
 */
@Injectable()
export class NlpGatewayService {
  private readonly logger = new Logger(NlpGatewayService.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly config: ConfigService) {
    this.baseUrl =
      this.config.get<string>('NLP_SERVICE_URL') ?? 'http://127.0.0.1:8400';
    this.timeoutMs = Number(this.config.get('NLP_SERVICE_TIMEOUT_MS') ?? 5000);
  }

  /** Base NER of the linguistic pipeline (general tagger). */
  async analyze(text: string, lang: Language): Promise<TaggedSpan[]> {
    const body = await this.post('analyze', { text, lang });
    return this.parseSpans('analyze', body, text);
  }

  /** Specialized NER tagger. */
  async specializedNer(text: string): Promise<TaggedSpan[]> {
    const body = await this.post('ner', { text });
    return this.parseSpans('ner', body, text);
  }

  /** Scores `labels` against `text`, best first. */
  async zeroShotClassify(
    text: string,
    labels: readonly string[],
  ): Promise<ZeroShotScore[]> {
    const body = await this.post('zero-shot', { text, labels });
    const rawLabels = isRecord(body) ? body['labels'] : undefined;
    const rawScores = isRecord(body) ? body['scores'] : undefined;
    if (
      !Array.isArray(rawLabels) ||
      !Array.isArray(rawScores) ||
      rawLabels.length !== rawScores.length
    ) {
      throw this.malformed('zero-shot');
    }

    const ranked: ZeroShotScore[] = [];
    rawLabels.forEach((label: unknown, i) => {
      const score: unknown = rawScores[i];
      if (typeof label === 'string' && isFiniteNumber(score)) {
        ranked.push({ label, score });
      }
    });
    return ranked.sort((a, b) => b.score - a.score);
  }

  async sentiment(text: string, lang: Language): Promise<SentimentResult> {
    const body = await this.post('sentiment', { text, lang });
    const label = isRecord(body) ? body['label'] : undefined;
    const score = isRecord(body) ? body['score'] : undefined;
    if (typeof label !== 'string' || !isFiniteNumber(score)) {
      throw this.malformed('sentiment');
    }
    return { label, score };
  }

  private async post(
    collaborator: NlpCollaborator,
    payload: Record<string, unknown>,
  ): Promise<unknown> {
    const url = `${this.baseUrl}/${collaborator}`;
    this.logger.debug(`Calling NLP service: ${url}`);

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `timed out after ${this.timeoutMs}ms`
          : 'unreachable';
      this.logger.error(`NLP service ${collaborator} ${reason}`, error);
      throw new ServiceUnavailableException(
        `NLP service ${collaborator} ${reason}`,
      );
    }

    if (!res.ok) {
      throw new ServiceUnavailableException(
        `NLP service ${collaborator} failed: ${res.status} ${await res.text()}`,
      );
    }

    try {
      return await res.json();
    } catch {
      throw this.malformed(collaborator);
    }
  }

  private parseSpans(
    collaborator: NlpCollaborator,
    body: unknown,
    text: string,
  ): TaggedSpan[] {
    const entities = isRecord(body) ? body['entities'] : undefined;
    if (!Array.isArray(entities)) {
      throw this.malformed(collaborator);
    }

    // The sidecar counts code points; spans here index the JS string.
    const offsets = codeUnitOffsets(text);
    const spans: TaggedSpan[] = [];
    for (const item of entities) {
      if (!isRecord(item)) continue;
      const { text: spanText, label, start, end, score } = item;
      if (
        typeof label !== 'string' ||
        !Number.isInteger(start) ||
        !Number.isInteger(end) ||
        !isFiniteNumber(start) ||
        !isFiniteNumber(end) ||
        start < 0 ||
        end <= start ||
        end >= offsets.length
      ) {
        this.logger.debug(`Dropping ${collaborator} entity with invalid span`);
        continue;
      }
      const unitStart = offsets[start];
      const unitEnd = offsets[end];
      spans.push({
        text:
          typeof spanText === 'string'
            ? spanText
            : text.slice(unitStart, unitEnd),
        label,
        start: unitStart,
        end: unitEnd,
        ...(isFiniteNumber(score) ? { score } : {}),
      });
    }
    return spans;
  }

  private malformed(collaborator: NlpCollaborator): ServiceUnavailableException {
    return new ServiceUnavailableException(
      `NLP service ${collaborator} returned a malformed response`,
    );
  }
}
