import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { HttpFetchService } from './services/http-fetch.service';
import { LinkParserService } from './services/link-parser.service';
import { PageRenderer } from './services/page-renderer';
import { HttpPageRenderer } from './services/http-page-renderer.service';
import { PageCrawlerService } from './services/page-crawler.service';
import { ExtractionModule } from '../extraction/extraction.module';

@Module({
  imports: [HttpModule, ExtractionModule],
  providers: [
    HttpFetchService,
    LinkParserService,
    { provide: PageRenderer, useClass: HttpPageRenderer },
    PageCrawlerService,
  ],
  exports: [PageCrawlerService, HttpFetchService],
})
export class CrawlerModule {}
