import { Module } from '@nestjs/common';
import { FeedsModule } from '../feeds/feeds.module';
import { NotionModule } from '../notion/notion.module';
import { ScoringModule } from '../scoring/scoring.module';
import { SpeechModule } from '../speech/speech.module';
import { SummaryModule } from '../summary/summary.module';
import { BriefStorageService } from './brief-storage.service';
import { BriefService } from './brief.service';

@Module({
  imports: [FeedsModule, ScoringModule, SummaryModule, SpeechModule, NotionModule],
  providers: [BriefService, BriefStorageService],
  exports: [BriefService],
})
export class BriefModule {}
