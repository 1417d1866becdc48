import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BatchModule } from './batch/batch.module';
import { validateEnvironment } from './config/env.validation';

/** Root module of the standalone sitemap crawl. */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    BatchModule,
  ],
})
export class SiteCrawlModule {}
