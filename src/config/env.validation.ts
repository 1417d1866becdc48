import {
  plainToInstance,
  Transform,
  TransformFnParams,
} from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

// reads the raw value; implicit conversion would turn "false" into true
const toBoolean = ({ obj, key }: TransformFnParams): unknown => {
  const raw: unknown = obj[key];
  return typeof raw === 'string' ? raw.toLowerCase() === 'true' : raw;
};

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 8080;

  @IsOptional()
  @IsString()
  NODE_ENV?: string;

  @IsOptional()
  @IsString()
  DATABASE_PATH: string = ':memory:';

  @IsOptional()
  @IsString()
  API_TOKEN?: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  AUTH_DISABLED: boolean = false;

  @IsOptional()
  @IsInt()
  @Min(1)
  MAX_CONCURRENT_TASKS: number = 5;

  @IsOptional()
  @IsInt()
  @Min(100)
  HTTP_TIMEOUT_MS: number = 10000;

  @IsOptional()
  @IsString()
  USER_AGENT?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  PRUNING_MIN_WORD_THRESHOLD: number = 50;

  @IsOptional()
  @IsInt()
  @Min(1)
  SITE_CRAWL_CONCURRENCY: number = 5;

  @IsOptional()
  @IsInt()
  @Min(0)
  BATCH_DELAY_MS: number = 1000;

  @IsOptional()
  @IsString()
  OUTPUT_DIR: string = 'output';

  @IsOptional()
  @IsString()
  EXTRACTION_SCHEMA_PATH: string = 'config/article-schema.json';

  @IsOptional()
  @IsString()
  SITE_BASE_URL?: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  SITEMAP_KEEP_MIXED_LEAVES: boolean = false;

  @IsOptional()
  @IsInt()
  @Min(1)
  SITEMAP_FETCH_CONCURRENCY: number = 4;
}

export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new Error(`Invalid environment: ${messages.join('; ')}`);
  }
  return validated;
}
