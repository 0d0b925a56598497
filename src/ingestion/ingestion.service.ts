import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../common/clock';
import { RunOptions } from '../common/run-options';
import { WriteError, describeError } from '../common/pipeline-error';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { AuditTarget, PointsFile } from '../writer/points-file';
import { WritePipeline } from '../writer/write-pipeline.service';
import { RawRecord } from './dto/raw-record';
import { PointBuilder } from './points/point-builder.service';

export interface IngestionContext {
  target: AuditTarget;
  options: RunOptions;
  /** Variable allow-list; the timestamp field is always kept */
  variables?: ReadonlySet<string>;
}

/**
 * Ingestion Result Summary
 */
export interface IngestionResult {
  success: boolean;
  recordsProcessed: number;
  /** Records without a usable timestamp */
  recordsSkipped: number;
  linesBuilt: number;
  /** Lines handed to the store, including a batch that failed */
  linesAttempted: number;
  /** Lines the store committed */
  linesWritten: number;
  /** Points already in the store (override off) */
  linesAlreadyStored: number;
  pointsFilePath: string | null;
  /** UTC instant of the last timestamped record */
  lastTimestamp: Date | null;
  errors: string[];
  durationMs: number;
}

/**
 * IngestionService - decoded records -> line protocol -> store
 *
 * Responsibilities:
 * 1. Timestamp normalization and variable allow-list per record
 * 2. Point building into the per-process intermediate file
 * 3. Batched store write (when enabled) through WritePipeline
 * 4. Audit artifact: gzip retained copy, or cleanup of the intermediate
 *
 * A WriteError is reported in the result (success=false) rather than
 * thrown: batches flushed before it stay written and the caller records
 * the failed run.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private readonly pointBuilder: PointBuilder,
    private readonly writePipeline: WritePipeline,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(pipelineConfig.KEY) private readonly config: PipelineConfig,
  ) {}

  async ingestRecords(
    records: RawRecord[],
    context: IngestionContext,
  ): Promise<IngestionResult> {
    const startTime = this.clock.now().getTime();
    const { options } = context;
    const result: IngestionResult = {
      success: false,
      recordsProcessed: 0,
      recordsSkipped: 0,
      linesBuilt: 0,
      linesAttempted: 0,
      linesWritten: 0,
      linesAlreadyStored: 0,
      pointsFilePath: null,
      lastTimestamp: null,
      errors: [],
      durationMs: 0,
    };

    const pointsFile = await PointsFile.create(
      this.config.outputDir,
      process.pid,
    );

    try {
      for (const record of records) {
        result.recordsProcessed++;
        const built = this.pointBuilder.buildRecord(record, context.variables);
        if (!built.timestamp) {
          result.recordsSkipped++;
          continue;
        }
        result.lastTimestamp = built.timestamp;
        await pointsFile.append(built.lines);
      }
      result.linesBuilt = pointsFile.lines;
      this.logger.log(
        `Built ${result.linesBuilt} line(s) from ${result.recordsProcessed} record(s) (${result.recordsSkipped} without timestamp)`,
      );

      if (options.dbWrite) {
        try {
          const flushed = await this.writePipeline.flush(pointsFile.read(), {
            override: options.override,
          });
          result.linesAttempted = flushed.linesWritten;
          result.linesWritten = flushed.linesWritten;
          result.linesAlreadyStored = flushed.linesSkipped;
        } catch (error) {
          if (!(error instanceof WriteError)) throw error;
          result.linesAttempted = error.linesAttempted;
          result.linesWritten = error.linesWritten;
          result.errors.push(error.message);
          this.logger.error(
            `Store write failed with ${error.linesWritten}/${error.linesAttempted} attempted line(s) committed: ${error.message}`,
          );
        }
      }
    } finally {
      await this.finishPointsFile(pointsFile, context, result);
    }

    result.success = result.errors.length === 0;
    result.durationMs = this.clock.now().getTime() - startTime;
    return result;
  }

  /**
   * Retain or discard the intermediate file. A failure here is reported in
   * the result so it never replaces an error already on its way out.
   */
  private async finishPointsFile(
    pointsFile: PointsFile,
    context: IngestionContext,
    result: IngestionResult,
  ): Promise<void> {
    try {
      if (context.options.retainFile) {
        result.pointsFilePath = await pointsFile.retain(context.target);
        this.logger.log(`Gzipped points file to ${result.pointsFilePath}`);
      } else {
        await pointsFile.discard();
        this.logger.debug(`Removed temporary file ${pointsFile.path}`);
      }
    } catch (error) {
      const message = `Could not finish points file ${pointsFile.path}: ${describeError(error)}`;
      result.errors.push(message);
      this.logger.error(message);
    }
  }
}
