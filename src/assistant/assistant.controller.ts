import { Body, Controller, Delete, Get, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ProcessUtteranceDto } from './assistant.dto';
import { AssistantService } from './assistant.service';

@ApiTags('assistant')
@Controller('assistant')
export class AssistantController {
  constructor(private readonly assistant: AssistantService) {}

  @Post('process')
  async process(@Body() dto: ProcessUtteranceDto) {
    return this.assistant.process(dto.text, dto.language);
  }

  @Get('context')
  getContext() {
    return this.assistant.getContext();
  }

  @Delete('context')
  async clearContext() {
    return this.assistant.clearContext();
  }
}
