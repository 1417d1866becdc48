import { Transform, Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { ExtractionSchemaDto } from '../../extraction/dto/extraction-schema.dto';
import { WaitCondition } from '../../crawler/types/rendered-page';

export enum ContentFilterKind {
  PRUNING = 'pruning',
  BM25 = 'bm25',
  NONE = 'none',
}

export class CrawlRequestDto {
  /** A single URL or a list; only the first one is crawled. */
  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string' ? [value] : value,
  )
  @IsArray()
  @ArrayMinSize(1)
  @IsUrl({}, { each: true })
  urls!: string[];

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10)
  priority: number = 1;

  @IsOptional()
  @IsBoolean()
  use_llm: boolean = false;

  @IsOptional()
  @ValidateNested()
  @Type(() => ExtractionSchemaDto)
  custom_schema?: ExtractionSchemaDto;

  @IsOptional()
  @IsString()
  search_query?: string;

  @IsOptional()
  @IsBoolean()
  extract_json: boolean = true;

  @IsOptional()
  @IsEnum(ContentFilterKind)
  content_filter: ContentFilterKind = ContentFilterKind.PRUNING;

  @IsOptional()
  @IsNumber()
  @Min(0)
  filter_threshold: number = 0.5;

  @IsOptional()
  @IsEnum(WaitCondition)
  wait_for: WaitCondition = WaitCondition.DOM_CONTENT_LOADED;

  /** Accepted up to 60s, applied up to 30s. */
  @IsOptional()
  @IsInt()
  @Min(1000)
  @Max(60000)
  page_timeout: number = 30000;
}
