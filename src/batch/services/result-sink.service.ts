import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { appendFile, mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { CrawlResult } from '../../crawler/types/crawl-result';
import {
  CrawlFailure,
  ErrorRecord,
  toSuccessRecord,
} from '../types/result-records';
import { errorMessage } from '../../common/errors/crawl.errors';

export const RESULTS_FILE = 'results.jsonl';
export const ERRORS_FILE = 'errors.jsonl';
export const STATS_FILE = 'stats.json';

export interface BatchFlush {
  results: CrawlResult[];
  failures: CrawlFailure[];
}

export interface SinkWriteSummary {
  written: number;
  failed: number;
}

/** Receives the outcome of each batch once the batch has settled. */
export interface ResultSink {
  flush(batch: BatchFlush): Promise<SinkWriteSummary>;
}

/**
 * Append-only JSONL logs for one run. Records are written one line at a
 * time; a record that cannot be written is logged and skipped.
 */
export class JsonlResultSink implements ResultSink {
  private readonly logger = new Logger(JsonlResultSink.name);

  constructor(
    readonly outputDir: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  get resultsPath(): string {
    return join(this.outputDir, RESULTS_FILE);
  }

  get errorsPath(): string {
    return join(this.outputDir, ERRORS_FILE);
  }

  async flush(batch: BatchFlush): Promise<SinkWriteSummary> {
    const summary: SinkWriteSummary = { written: 0, failed: 0 };

    for (const result of batch.results) {
      const ok = await this.append(this.resultsPath, result.url, () =>
        toSuccessRecord(result, this.clock().toISOString()),
      );
      summary[ok ? 'written' : 'failed'] += 1;
    }
    for (const failure of batch.failures) {
      const ok = await this.append(
        this.errorsPath,
        failure.url,
        (): ErrorRecord => ({
          url: failure.url,
          timestamp: this.clock().toISOString(),
          outcome: failure.outcome,
          error: failure.error,
        }),
      );
      summary[ok ? 'written' : 'failed'] += 1;
    }

    return summary;
  }

  async writeStats(stats: object): Promise<void> {
    await writeFile(
      join(this.outputDir, STATS_FILE),
      `${JSON.stringify(stats, null, 2)}\n`,
      'utf8',
    );
  }

  private async append(
    path: string,
    url: string,
    buildRecord: () => object,
  ): Promise<boolean> {
    try {
      await appendFile(path, `${JSON.stringify(buildRecord())}\n`, 'utf8');
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to persist record for ${url}: ${errorMessage(error)}`,
      );
      return false;
    }
  }
}

export function formatRunTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** Parses a JSONL log back into its records, skipping blank lines. */
export async function readRecords(path: string): Promise<unknown[]> {
  const content = await readFile(path, 'utf8');
  return content
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line): unknown => JSON.parse(line));
}

@Injectable()
export class ResultSinkService {
  private readonly logger = new Logger(ResultSinkService.name);
  private readonly outputRoot: string;

  constructor(private readonly configService: ConfigService) {
    this.outputRoot = this.configService.get<string>('OUTPUT_DIR', 'output');
  }

  /** Creates `<root>/<YYYYMMDD_HHMMSS>/` and a sink writing into it. */
  async openRun(
    rootDir: string = this.outputRoot,
    startedAt: Date = new Date(),
  ): Promise<JsonlResultSink> {
    const outputDir = join(rootDir, formatRunTimestamp(startedAt));
    await mkdir(outputDir, { recursive: true });
    this.logger.log(`Saving results to: ${outputDir}`);
    return new JsonlResultSink(outputDir);
  }
}
