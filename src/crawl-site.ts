#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SiteCrawlModule } from './site-crawl.module';
import { SiteCrawlService } from './batch/services/site-crawl.service';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(SiteCrawlModule);
  const logger = new Logger('SiteCrawl');

  try {
    const baseUrl =
      process.argv[2] ?? app.get(ConfigService).get<string>('SITE_BASE_URL');
    if (!baseUrl) {
      throw new Error('Pass a base URL or set SITE_BASE_URL');
    }

    const report = await app.get(SiteCrawlService).run(baseUrl);
    if (report) {
      logger.log(`Results saved to: ${report.output_dir}`);
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((error) => {
  const logger = new Logger('SiteCrawl');
  logger.error('Site crawl failed', error);
  process.exit(1);
});
