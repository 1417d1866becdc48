import { Module } from '@nestjs/common';
import { BatchCrawlCoordinator } from './services/batch-crawl-coordinator.service';
import { ResultSinkService } from './services/result-sink.service';
import { SiteCrawlService } from './services/site-crawl.service';
import { CrawlerModule } from '../crawler/crawler.module';
import { SitemapModule } from '../sitemap/sitemap.module';

@Module({
  imports: [CrawlerModule, SitemapModule],
  providers: [BatchCrawlCoordinator, ResultSinkService, SiteCrawlService],
  exports: [BatchCrawlCoordinator, SiteCrawlService],
})
export class BatchModule {}
