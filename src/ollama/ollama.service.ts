import {
  Injectable,
  InternalServerErrorException,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

type OllamaGenerateResponse = {
  model: string;
  response: string;
  done: boolean;
};

function isGenerateResponse(value: unknown): value is OllamaGenerateResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'response' in value &&
    typeof value.response === 'string'
  );
}

@Injectable()
export class OllamaService {
  private readonly logger = new Logger(OllamaService.name);
  private readonly baseUrl: string;
  private readonly smallModel: string;
  private readonly timeoutMs: number;

  constructor(private readonly config: ConfigService) {
    this.baseUrl =
      this.config.get<string>('OLLAMA_BASE_URL') ?? 'http://127.0.0.1:11434';
    this.smallModel =
      this.config.get<string>('OLLAMA_SMALL_MODEL') ?? 'qwen3:4b';
    this.timeoutMs = Number(this.config.get('OLLAMA_TIMEOUT_MS') ?? 15000);
  }

  /** Non-streaming completion on the small model, bounded by OLLAMA_TIMEOUT_MS. */
  async generate(prompt: string, system?: string): Promise<string> {
    const url = `${this.baseUrl}/api/generate`;
    this.logger.debug(`Calling Ollama generate (${this.smallModel}): ${url}`);
    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.smallModel,
          prompt,
          system,
          stream: false,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!res.ok) {
        throw new InternalServerErrorException(
          `Ollama generate failed: ${res.status} ${await res.text()}`,
        );
      }
      const json: unknown = await res.json();
      if (!isGenerateResponse(json)) {
        throw new InternalServerErrorException(
          'Ollama generate returned a malformed response',
        );
      }
      return json.response;
    } catch (error) {
      this.logger.error('Ollama generate error', error);
      throw error instanceof InternalServerErrorException
        ? error
        : new ServiceUnavailableException('LLM service unreachable');
    }
  }
}
