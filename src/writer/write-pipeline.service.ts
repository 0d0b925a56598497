import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock, SLEEP, Sleep } from '../common/clock';
import { WriteError, asError, describeError } from '../common/pipeline-error';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { parseLine } from '../ingestion/points/line-protocol';
import {
  EXISTENCE_CHECKER,
  ExistenceChecker,
  TIME_SERIES_STORE,
  TimeSeriesStore,
} from './interfaces/time-series-store.interface';

/** Stored values closer than this count as unchanged */
export const VALUE_TOLERANCE = 0.000001;

export interface FlushOptions {
  /** Write everything (store upserts) instead of skipping stored points */
  override: boolean;
  batchSize?: number;
}

export interface BatchOutcome {
  index: number;
  lines: number;
  attempts: number;
}

/**
 * Result of one batch: the retry loop never throws, it reports.
 */
export type BatchResult =
  | { ok: true; outcome: BatchOutcome }
  | { ok: false; error: WriteError };

export interface FlushResult {
  linesRead: number;
  linesWritten: number;
  linesSkipped: number;
  batches: BatchOutcome[];
  durationMs: number;
}

/**
 * WritePipeline - line protocol source -> time-series store
 *
 * Lines are grouped into fixed-size batches, one store call per batch.
 * A failing batch is retried with bounded exponential backoff; once the
 * retries are exhausted the flush stops with a WriteError. Batches already
 * written are not rolled back (at-least-once).
 */
@Injectable()
export class WritePipeline {
  private readonly logger = new Logger(WritePipeline.name);

  constructor(
    @Inject(TIME_SERIES_STORE) private readonly store: TimeSeriesStore,
    @Inject(EXISTENCE_CHECKER) private readonly existence: ExistenceChecker,
    @Inject(SLEEP) private readonly sleep: Sleep,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(pipelineConfig.KEY) private readonly config: PipelineConfig,
  ) {}

  /**
   * @throws WriteError when a batch exhausts its retries
   */
  async flush(
    source: AsyncIterable<string> | Iterable<string>,
    options: FlushOptions,
  ): Promise<FlushResult> {
    const startTime = this.clock.now().getTime();
    const batchSize = options.batchSize ?? this.config.batchSize;
    const result: FlushResult = {
      linesRead: 0,
      linesWritten: 0,
      linesSkipped: 0,
      batches: [],
      durationMs: 0,
    };
    const batch: string[] = [];
    let linesAttempted = 0;

    const send = async (): Promise<void> => {
      // Pause between batches for the store's ingestion rate limit
      if (result.batches.length > 0 && this.config.writeDelayMs > 0) {
        await this.sleep(this.config.writeDelayMs);
      }

      linesAttempted += batch.length;
      const batchResult = await this.writeBatch([...batch], result.batches.length);
      batch.length = 0;

      if (!batchResult.ok) {
        const { error } = batchResult;
        throw new WriteError(
          error.message,
          error.attempts,
          linesAttempted,
          result.linesWritten,
          error.originalError,
        );
      }

      result.batches.push(batchResult.outcome);
      result.linesWritten += batchResult.outcome.lines;
      this.logger.log(
        `Wrote batch of ${batchResult.outcome.lines} lines. Total written: ${result.linesWritten}`,
      );
    };

    for await (const rawLine of source) {
      const line = rawLine.trim();
      if (line === '') continue;
      result.linesRead++;

      if (!options.override && (await this.isStored(line))) {
        result.linesSkipped++;
        continue;
      }

      batch.push(line);
      if (batch.length >= batchSize) {
        await send();
      }
    }

    if (batch.length > 0) {
      await send();
    }

    result.durationMs = this.clock.now().getTime() - startTime;
    this.logger.log(
      `Flush complete: ${result.linesWritten}/${result.linesRead} lines in ${result.batches.length} batch(es), ${result.linesSkipped} already stored`,
    );
    return result;
  }

  /**
   * Write one batch with up to `maxRetries` retries.
   */
  async writeBatch(lines: string[], index = 0): Promise<BatchResult> {
    const { maxRetries } = this.config.retry;

    for (let attempt = 1; ; attempt++) {
      try {
        await this.store.writeLines(lines);
        return { ok: true, outcome: { index, lines: lines.length, attempts: attempt } };
      } catch (error) {
        const message = describeError(error);
        if (attempt > maxRetries) {
          this.logger.error(
            `Batch ${index} (${lines.length} lines) failed after ${attempt} attempt(s): ${message}`,
          );
          return {
            ok: false,
            error: new WriteError(
              `Batch ${index} failed after ${attempt} attempt(s): ${message}`,
              attempt,
              lines.length,
              0,
              asError(error),
            ),
          };
        }

        const delay = this.backoffDelay(attempt);
        this.logger.warn(
          `Batch ${index} attempt ${attempt}/${maxRetries + 1} failed: ${message}. Retrying in ${delay}ms`,
        );
        await this.sleep(delay);
      }
    }
  }

  /**
   * Delay before the retry following failed attempt `attempt` (1-based).
   */
  backoffDelay(attempt: number): number {
    const { retryIntervalMs, exponentialBase, maxRetryDelayMs } =
      this.config.retry;
    return Math.min(
      retryIntervalMs * Math.pow(exponentialBase, attempt - 1),
      maxRetryDelayMs,
    );
  }

  /**
   * A line counts as stored when every one of its fields is already in the
   * store with a value within VALUE_TOLERANCE. A missing or changed field
   * gets the whole line written again (the store upserts by timestamp).
   */
  private async isStored(line: string): Promise<boolean> {
    const parsed = parseLine(line);
    if (!parsed) return false;

    let stored: Map<string, number>;
    try {
      stored = await this.existence.storedFields(
        parsed.measurement,
        parsed.tags,
        parsed.timestamp,
        parsed.fields.map(([field]) => field),
      );
    } catch (error) {
      this.logger.warn(
        `Existence check failed for ${parsed.measurement}@${parsed.timestamp}, writing anyway: ${describeError(error)}`,
      );
      return false;
    }

    return parsed.fields.every(([field, value]) => {
      const current = stored.get(field);
      return current !== undefined && Math.abs(current - value) <= VALUE_TOLERANCE;
    });
  }
}
