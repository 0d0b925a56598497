import { Inject, Injectable, Logger } from '@nestjs/common';
import * as path from 'node:path';
import {
  addDays,
  CalendarDate,
  compareDates,
  datesBetween,
  formatCalendarDate,
  formatIsoDate,
  isSameDate,
  utcDateOf,
} from '../common/calendar-date';
import { CLOCK, Clock, SLEEP, Sleep } from '../common/clock';
import { InvalidRangeError, describeError } from '../common/pipeline-error';
import { RunOptions } from '../common/run-options';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { PayloadDecoder } from '../ingestion/decoder/payload-decoder.service';
import { IngestionResult, IngestionService } from '../ingestion/ingestion.service';
import { RunLedger } from '../ledger/run-ledger.service';
import { RunMode } from '../ledger/run-record';
import { RunFileLogger, runLogFileName } from '../logging/run-file.logger';
import {
  DAY_RANGES,
  DayRange,
  PAYLOAD_SOURCE,
  PayloadSource,
} from '../upstream/payload-source.interface';
import { loadVariableList } from './variable-list';

/**
 * Outcome of one (date, range) unit of a daily or backfill run.
 */
export interface UnitOutcome {
  date: CalendarDate;
  range: DayRange;
  success: boolean;
  numRecords: number;
  /** False for the current UTC date and when ledger logging is off */
  logged: boolean;
  logPath: string;
  ingestion: IngestionResult | null;
  error?: string;
}

export interface LiveOutcome {
  success: boolean;
  numRecords: number;
  /** `HH-mm-ss` UTC start of the poll, the ledger range of live runs */
  sampleTime: string;
  logged: boolean;
  logPath: string;
  ingestion: IngestionResult | null;
  /** Time spent waiting for the next cadence slot */
  sleptMs: number;
  error?: string;
}

interface LedgerEntry {
  mode: RunMode;
  date: CalendarDate;
  range: string;
  startedAt: Date;
  success: boolean;
  numRecords: number;
  logPath: string;
  ingestion: IngestionResult | null;
  options: RunOptions;
}

const pad = (value: number): string => String(value).padStart(2, '0');

function formatUtcTime(instant: Date): string {
  return [
    instant.getUTCHours(),
    instant.getUTCMinutes(),
    instant.getUTCSeconds(),
  ]
    .map(pad)
    .join('-');
}

/**
 * PipelineOrchestrator - drives live polls and date-range backfills
 *
 * Every unit runs fetch -> decode -> ingest -> ledger with its own log
 * file. Units run one after another; a failing unit is recorded and its
 * siblings still run.
 */
@Injectable()
export class PipelineOrchestrator {
  private readonly logger = new Logger(PipelineOrchestrator.name);

  constructor(
    @Inject(PAYLOAD_SOURCE) private readonly source: PayloadSource,
    private readonly decoder: PayloadDecoder,
    private readonly ingestion: IngestionService,
    private readonly ledger: RunLedger,
    private readonly runLogger: RunFileLogger,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(SLEEP) private readonly sleep: Sleep,
    @Inject(pipelineConfig.KEY) private readonly config: PipelineConfig,
  ) {}

  /**
   * Poll the live endpoint once, then wait out the rest of the cadence.
   *
   * @throws FetchError when the live endpoint cannot be reached
   */
  async runLive(options: RunOptions): Promise<LiveOutcome> {
    const startedAt = this.clock.now();
    const date = utcDateOf(startedAt);
    const sampleTime = formatUtcTime(startedAt);
    const logPath = this.runLogPath('live', date, sampleTime);

    const outcome: LiveOutcome = {
      success: false,
      numRecords: 0,
      sampleTime,
      logged: false,
      logPath,
      ingestion: null,
      sleptMs: 0,
    };

    try {
      this.runLogger.attachRunFile(logPath);
      const variables = await this.resolveVariables(options);
      const raw = await this.source.fetchLive();

      try {
        const records = this.decoder.decode(raw);
        outcome.numRecords = records.length;
        outcome.ingestion = await this.ingestion.ingestRecords(records, {
          target: { mode: 'live', date: formatIsoDate(date), time: sampleTime },
          options,
          variables,
        });
        outcome.error = this.ingestionError(outcome.ingestion);
      } catch (error) {
        outcome.error = describeError(error);
      }
      outcome.success = outcome.error === undefined;

      if (outcome.error !== undefined) {
        this.logger.error(`Live run ${sampleTime} failed: ${outcome.error}`);
      }

      if (options.logRun) {
        outcome.logged = await this.recordRun({
          mode: 'live',
          date,
          range: sampleTime,
          startedAt,
          success: outcome.success,
          numRecords: outcome.numRecords,
          logPath,
          ingestion: outcome.ingestion,
          options,
        });
      }

      const elapsed = this.clock.now().getTime() - startedAt.getTime();
      const remaining = this.config.cadenceMs - elapsed;
      if (remaining > 0) {
        this.logger.log(`Sleeping ${remaining} ms until the next poll`);
        await this.sleep(remaining);
        outcome.sleptMs = remaining;
      } else {
        this.logger.warn(`Live cadence exceeded by ${-remaining} ms`);
      }
      return outcome;
    } finally {
      this.runLogger.attachRunFile(null);
    }
  }

  /**
   * Ingest one day (default: yesterday UTC).
   */
  async runDaily(
    date: CalendarDate | undefined,
    options: RunOptions,
  ): Promise<UnitOutcome[]> {
    const day = date ?? addDays(utcDateOf(this.clock.now()), -1);
    return this.runRange(day, day, options);
  }

  /**
   * Ingest every (date, range) unit from `start` to `end` inclusive.
   *
   * @throws InvalidRangeError when start is after end
   */
  async runRange(
    start: CalendarDate,
    end: CalendarDate,
    options: RunOptions,
  ): Promise<UnitOutcome[]> {
    if (compareDates(start, end) > 0) {
      throw new InvalidRangeError(
        `Start date ${formatCalendarDate(start)} is after end date ${formatCalendarDate(end)}`,
      );
    }

    const variables = await this.resolveVariables(options);
    const ranges = options.ranges ?? [...DAY_RANGES];
    const units = datesBetween(start, end).flatMap((date) =>
      ranges.map((range) => ({ date, range })),
    );

    this.logger.log(
      `Processing ${units.length} unit(s) from ${formatCalendarDate(start)} to ${formatCalendarDate(end)}`,
    );

    const outcomes: UnitOutcome[] = [];
    for (const [index, unit] of units.entries()) {
      if (index > 0 && this.config.unitDelayMs > 0) {
        await this.sleep(this.config.unitDelayMs);
      }
      outcomes.push(await this.runUnit(unit.date, unit.range, options, variables));
    }

    const failed = outcomes.filter((o) => !o.success).length;
    this.logger.log(
      `Completed ${outcomes.length - failed}/${outcomes.length} unit(s)`,
    );
    return outcomes;
  }

  /**
   * One daily unit. Never throws: failures come back as success=false.
   */
  async runUnit(
    date: CalendarDate,
    range: DayRange,
    options: RunOptions,
    variables?: ReadonlySet<string>,
  ): Promise<UnitOutcome> {
    const startedAt = this.clock.now();
    const logPath = this.runLogPath('daily', date, String(range));
    const label = `${formatCalendarDate(date)} range ${range}`;

    const outcome: UnitOutcome = {
      date,
      range,
      success: false,
      numRecords: 0,
      logged: false,
      logPath,
      ingestion: null,
    };

    try {
      this.runLogger.attachRunFile(logPath);
      this.logger.log(`Fetching ${label}`);
      const raw = await this.source.fetchDaily(date, range);
      const records = this.decoder.decode(raw);
      outcome.numRecords = records.length;

      outcome.ingestion = await this.ingestion.ingestRecords(records, {
        target: { mode: 'daily', date: formatIsoDate(date), range },
        options,
        variables,
      });
      outcome.error = this.ingestionError(outcome.ingestion);
    } catch (error) {
      outcome.error = describeError(error);
    }
    outcome.success = outcome.error === undefined;

    if (outcome.error !== undefined) {
      this.logger.error(`Unit ${label} failed: ${outcome.error}`);
    }

    try {
      if (!options.logRun) {
        return outcome;
      }
      if (isSameDate(date, utcDateOf(startedAt))) {
        this.logger.log(`Not logging ${label}: the day is not over yet`);
        return outcome;
      }
      outcome.logged = await this.recordRun({
        mode: 'daily',
        date,
        range: String(range),
        startedAt,
        success: outcome.success,
        numRecords: outcome.numRecords,
        logPath,
        ingestion: outcome.ingestion,
        options,
      });
      return outcome;
    } finally {
      this.runLogger.attachRunFile(null);
    }
  }

  private async resolveVariables(
    options: RunOptions,
  ): Promise<ReadonlySet<string> | undefined> {
    if (!options.variableFile) return undefined;
    const variables = await loadVariableList(options.variableFile);
    this.logger.log(
      `Restricting to ${variables.size} variable(s) from ${options.variableFile}`,
    );
    return variables;
  }

  private ingestionError(result: IngestionResult): string | undefined {
    return result.success ? undefined : result.errors.join('; ');
  }

  private runLogPath(mode: RunMode, date: CalendarDate, rangeOrTime: string): string {
    return path.join(
      this.config.logDir,
      runLogFileName(mode, formatIsoDate(date), rangeOrTime, process.pid),
    );
  }

  /**
   * Upsert the ledger row. A ledger failure is logged and reported as
   * not logged; it does not fail the unit's data.
   */
  private async recordRun(entry: LedgerEntry): Promise<boolean> {
    const { options } = entry;
    try {
      await this.ledger.upsert({
        runTime: entry.startedAt.toISOString(),
        dateRun: formatCalendarDate(entry.date),
        range: entry.range,
        mode: entry.mode,
        parameters: {
          dbWrite: options.dbWrite,
          override: options.override,
          retainFile: options.retainFile,
          variableFile: options.variableFile ?? null,
          linesAttempted: entry.ingestion?.linesAttempted ?? 0,
          linesWritten: entry.ingestion?.linesWritten ?? 0,
        },
        processId: process.pid,
        success: entry.success,
        numRecords: entry.numRecords,
        logPath: entry.logPath,
        pointsFilePath: entry.ingestion?.pointsFilePath ?? null,
      });
      return true;
    } catch (error) {
      this.logger.error(
        `Could not log ${entry.mode} run ${formatCalendarDate(entry.date)} range ${entry.range}: ${describeError(error)}`,
      );
      return false;
    }
  }
}
