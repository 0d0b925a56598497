import { InvalidArgumentError } from 'commander';
import {
  CalendarDate,
  isSameDate,
  parseCalendarDate,
} from '../common/calendar-date';
import { InvalidRangeError } from '../common/pipeline-error';
import { RunOptions } from '../common/run-options';
import { RunMode } from '../ledger/run-record';
import { DayRange } from '../upstream/payload-source.interface';

/**
 * Options as commander hands them to the action handler.
 */
export interface CliOptions {
  mode?: RunMode;
  date?: string;
  startdate?: string;
  enddate?: string;
  range?: DayRange;
  dbWrite: boolean;
  override: boolean;
  retainFile: boolean;
  debug: boolean;
  /** Live cadence in seconds */
  delay?: number;
  dbHost?: string;
  dbOrg?: string;
  logRun: boolean;
  variableFile?: string;
  listRuns: boolean;
}

export type PipelineRequest =
  | { kind: 'live' }
  | { kind: 'daily'; date?: CalendarDate }
  | { kind: 'range'; start: CalendarDate; end: CalendarDate }
  | { kind: 'runs'; mode?: RunMode };

export interface Invocation {
  request: PipelineRequest;
  options: RunOptions;
  debug: boolean;
  /** Environment overrides applied before configuration loads */
  env: Record<string, string>;
}

/** `true`, `1` and `yes` (any case) are true; anything else is false */
export function parseFlag(value: string): boolean {
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

export function parseMode(value: string): RunMode {
  if (value === 'live' || value === 'daily') return value;
  throw new InvalidArgumentError(`Mode must be 'live' or 'daily'.`);
}

export function parseRange(value: string): DayRange {
  if (value === '1') return 1;
  if (value === '2') return 2;
  throw new InvalidArgumentError('Range must be 1 (00:00-12:00) or 2 (12:00-24:00).');
}

export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new InvalidArgumentError('Delay must be a whole number of seconds.');
  }
  return seconds;
}

/**
 * Decide what to run from the parsed command line.
 *
 * Live mode wins; otherwise a start/end pair is a range (a single day
 * when both match); anything else is a daily run of `--date`, or of
 * yesterday without one.
 */
export function buildInvocation(cli: CliOptions): Invocation {
  const options: RunOptions = {
    dbWrite: cli.dbWrite,
    override: cli.override,
    retainFile: cli.retainFile,
    logRun: cli.logRun,
    variableFile: cli.variableFile,
    ranges: cli.range === undefined ? undefined : [cli.range],
  };

  const env: Record<string, string> = {};
  if (cli.dbHost) env.INFLUX_URL = cli.dbHost;
  if (cli.dbOrg) env.INFLUX_ORG = cli.dbOrg;
  if (cli.delay !== undefined) env.PIPELINE_CADENCE_MS = String(cli.delay * 1000);

  return { request: resolveRequest(cli), options, debug: cli.debug, env };
}

function resolveRequest(cli: CliOptions): PipelineRequest {
  if (cli.listRuns) {
    return { kind: 'runs', mode: cli.mode };
  }
  if (cli.mode === 'live') {
    return { kind: 'live' };
  }

  if (cli.startdate !== undefined || cli.enddate !== undefined) {
    if (cli.startdate === undefined || cli.enddate === undefined) {
      throw new InvalidRangeError('--startdate and --enddate must be given together');
    }
    const start = parseCalendarDate(cli.startdate);
    const end = parseCalendarDate(cli.enddate);
    return isSameDate(start, end)
      ? { kind: 'daily', date: start }
      : { kind: 'range', start, end };
  }

  return {
    kind: 'daily',
    date: cli.date === undefined ? undefined : parseCalendarDate(cli.date),
  };
}
