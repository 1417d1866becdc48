import { Module } from '@nestjs/common';
import { ContentExtractionService } from './services/content-extraction.service';
import { SchemaExtractorService } from './services/schema-extractor.service';
import { MarkdownGeneratorService } from './services/markdown-generator.service';

@Module({
  providers: [
    ContentExtractionService,
    SchemaExtractorService,
    MarkdownGeneratorService,
  ],
  exports: [ContentExtractionService],
})
export class ExtractionModule {}
