import { DayRange } from '../upstream/payload-source.interface';

/**
 * Per-invocation switches (from the command line).
 */
export interface RunOptions {
  /** Send points to the time-series store */
  dbWrite: boolean;
  /** Rewrite every point; when false, points already stored are skipped */
  override: boolean;
  /** Keep a gzip audit copy of the emitted lines */
  retainFile: boolean;
  /** Record the run in the ledger */
  logRun: boolean;
  /** Allow-list file restricting which variables are classified */
  variableFile?: string;
  /** Subset of intra-day ranges for daily runs (default both) */
  ranges?: DayRange[];
}
