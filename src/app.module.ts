import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AssistantModule } from './assistant/assistant.module';
import { NluModule } from './nlu/nlu.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    EventEmitterModule.forRoot({ wildcard: true }),
    NluModule,
    AssistantModule,
  ],
})
export class AppModule {}
