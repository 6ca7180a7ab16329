import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { BriefModule } from '../brief/brief.module';
import { SchedulerService } from './scheduler.service';

@Module({
  imports: [ScheduleModule.forRoot(), BriefModule],
  providers: [SchedulerService],
})
export class SchedulerModule {}
