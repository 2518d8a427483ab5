import { Module } from '@nestjs/common';
import { ConversationContextStore } from './conversation-context.store';

@Module({
  providers: [ConversationContextStore],
  exports: [ConversationContextStore],
})
export class ContextModule {}
