import { Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { errorMessage } from '../common/errors';
import { DEFAULT_CRON, DEFAULT_TIMEZONE } from '../config/brief.config';
import { BriefService } from '../brief/brief.service';

// 데코레이터는 클래스 정의 시점에 평가되므로 main.ts 에서 .env 를 먼저 읽어 둔다
@Injectable()
export class SchedulerService {
  private readonly logger = new Logger(SchedulerService.name);

  constructor(private readonly briefService: BriefService) {}

  @Cron(process.env.BRIEF_CRON || DEFAULT_CRON, {
    name: 'daily-brief',
    timeZone: process.env.TZ || DEFAULT_TIMEZONE,
  })
  async handleDailyBrief(): Promise<void> {
    this.logger.log('Starting scheduled daily brief');
    try {
      const result = await this.briefService.run();
      this.logger.log(`Scheduled daily brief completed: ${result.page.url}`);
    } catch (error) {
      this.logger.error(`Scheduled daily brief failed: ${errorMessage(error)}`);
    }
  }
}
