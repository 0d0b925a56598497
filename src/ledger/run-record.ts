export type RunMode = 'daily' | 'live';

/**
 * Natural key of a run. Range is '1' or '2' for daily units and the
 * sample time (HH-mm-ss UTC) for live polls.
 */
export interface RunKey {
  dateRun: string;
  range: string;
  mode: RunMode;
}

export interface RunRecord extends RunKey {
  runTime: string;
  parameters: Record<string, unknown>;
  processId: number;
  success: boolean;
  numRecords: number;
  logPath: string | null;
  pointsFilePath: string | null;
}
