import { Module } from '@nestjs/common';
import { SitemapResolverService } from './services/sitemap-resolver.service';
import { CrawlerModule } from '../crawler/crawler.module';

@Module({
  imports: [CrawlerModule],
  providers: [SitemapResolverService],
  exports: [SitemapResolverService],
})
export class SitemapModule {}
