import { Module } from '@nestjs/common';
import { NlpGatewayService } from './nlp-gateway.service';

@Module({
  providers: [NlpGatewayService],
  exports: [NlpGatewayService],
})
export class NlpGatewayModule {}
