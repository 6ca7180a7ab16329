import { Module } from '@nestjs/common';
import { OpenAiModule } from '../openai/openai.module';
import { SummaryService } from './summary.service';

@Module({
  imports: [OpenAiModule],
  providers: [SummaryService],
  exports: [SummaryService],
})
export class SummaryModule {}
