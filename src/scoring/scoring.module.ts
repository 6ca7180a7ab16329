import { Module } from '@nestjs/common';
import { OpenAiModule } from '../openai/openai.module';
import { ScoringService } from './scoring.service';

@Module({
  imports: [OpenAiModule],
  providers: [ScoringService],
  exports: [ScoringService],
})
export class ScoringModule {}
