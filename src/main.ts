import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { FUND_CONFIG, FundConfig } from './config/fund.config';

dotenv.config();

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();

  const config = app.get<FundConfig>(FUND_CONFIG);
  await app.listen(config.port);
  Logger.log(`Fund unitisation service listening on port ${config.port} (base ${config.baseCcy})`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error('Failed to start', err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exit(1);
});
