import { Module, OnModuleInit } from '@nestjs/common';
import { OllamaModule } from '../ollama/ollama.module';
import { DateHandler } from './date.handler';
import { GeneralChatFallback } from './general-chat.fallback';
import { HandlerRegistry } from './handler.registry';
import { MusicHandler } from './music.handler';
import { TimeHandler } from './time.handler';

@Module({
  imports: [OllamaModule],
  providers: [
    HandlerRegistry,
    GeneralChatFallback,
    TimeHandler,
    DateHandler,
    MusicHandler,
  ],
  exports: [HandlerRegistry, GeneralChatFallback],
})
export class HandlersModule implements OnModuleInit {
  constructor(
    private readonly registry: HandlerRegistry,
    private readonly time: TimeHandler,
    private readonly date: DateHandler,
    private readonly music: MusicHandler,
  ) {}

  onModuleInit(): void {
    this.registry.register(this.time);
    this.registry.register(this.date);
    this.registry.register(this.music);
  }
}
