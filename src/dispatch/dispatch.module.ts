import { Module } from '@nestjs/common';
import { ContextModule } from '../context/context.module';
import { HandlersModule } from '../handlers/handlers.module';
import { NlpGatewayModule } from '../nlp-gateway/nlp-gateway.module';
import { IntentDispatcherService } from './intent-dispatcher.service';

@Module({
  imports: [HandlersModule, NlpGatewayModule, ContextModule],
  providers: [IntentDispatcherService],
  exports: [IntentDispatcherService],
})
export class DispatchModule {}
