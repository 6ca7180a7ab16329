import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BriefModule } from './brief/brief.module';
import { BriefConfigModule } from './config/brief-config.module';
import { SchedulerModule } from './scheduler/scheduler.module';

export interface AppModuleOptions {
  schedule?: boolean;
}

@Module({})
export class AppModule {
  static register(options: AppModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath: '.env',
        }),
        BriefConfigModule,
        BriefModule,
        ...(options.schedule ? [SchedulerModule] : []),
      ],
    };
  }
}
