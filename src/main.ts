#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AppService } from './app.service';
import { ConfigService } from './config/config.service';
import { DEFAULT_LOG_LEVEL, resolveLogLevels } from './common/logging/log-levels';
import { describeException } from './common/exceptions/exception.utils';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
    abortOnError: false,
  });
  const configService = app.get(ConfigService);
  app.useLogger(resolveLogLevels(configService.getOptional('LOG_LEVEL', DEFAULT_LOG_LEVEL)));

  try {
    await app.get(AppService).run();
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  console.error(`Error: ${describeException(error)}`);
  process.exitCode = 1;
});
