import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BRIEF_CONFIG, loadBriefConfig } from './brief.config';
import { DEFAULT_FEED_SOURCES, FEED_SOURCES } from './feed-sources';

@Global()
@Module({
  providers: [
    {
      provide: BRIEF_CONFIG,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        loadBriefConfig((key) => config.get<string>(key)),
    },
    {
      provide: FEED_SOURCES,
      useValue: DEFAULT_FEED_SOURCES,
    },
  ],
  exports: [BRIEF_CONFIG, FEED_SOURCES],
})
export class BriefConfigModule {}
