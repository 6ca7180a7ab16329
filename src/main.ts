#!/usr/bin/env node
import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { BriefService } from './brief/brief.service';
import { errorMessage } from './common/errors';
import { logLevelsFrom } from './config/brief.config';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  const schedule = process.argv.includes('--schedule');

  const app = await NestFactory.createApplicationContext(
    AppModule.register({ schedule }),
    {
      logger: logLevelsFrom(process.env.LOG_LEVEL),
      abortOnError: false,
    },
  );

  if (schedule) {
    // 등록된 cron 작업이 프로세스를 유지한다. 종료 시그널에서 정리.
    app.enableShutdownHooks();
    logger.log('Scheduler started; waiting for the next daily run');
    return;
  }

  try {
    const result = await app.get(BriefService).run();
    logger.log(
      `Done: ${result.document.sections.length} sections published to ${result.page.url}`,
    );
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  logger.error(`Daily brief failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});
