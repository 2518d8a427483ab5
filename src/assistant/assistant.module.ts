import { Module } from '@nestjs/common';
import { ContextModule } from '../context/context.module';
import { DispatchModule } from '../dispatch/dispatch.module';
import { EntitiesModule } from '../entities/entities.module';
import { NlpGatewayModule } from '../nlp-gateway/nlp-gateway.module';
import { NluModule } from '../nlu/nlu.module';
import { AssistantController } from './assistant.controller';
import { AssistantEventsListener } from './assistant.events.listener';
import { AssistantService } from './assistant.service';

@Module({
  imports: [
    NluModule,
    EntitiesModule,
    NlpGatewayModule,
    ContextModule,
    DispatchModule,
  ],
  controllers: [AssistantController],
  providers: [AssistantService, AssistantEventsListener],
})
export class AssistantModule {}
