import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';

/**
 * PipelineRun Entity - one row per (date, range, mode)
 *
 * The natural key is unique; writing the same key again replaces the row
 * (last write wins), so backfills can be repeated without piling up
 * ledger entries.
 */
@Entity('runs')
@Unique('uq_runs_date_range_mode', ['dateRun', 'range', 'mode'])
export class PipelineRun {
  @PrimaryGeneratedColumn()
  id!: number;

  /** ISO-8601 UTC time the run started */
  @Column({ name: 'run_time', type: 'text' })
  runTime!: string;

  /** Date the run covers (MM-DD-YYYY) */
  @Column({ name: 'date_run', type: 'text' })
  dateRun!: string;

  /** Intra-day range ('1' | '2') or, for live runs, the sample time */
  @Column({ name: 'range', type: 'text' })
  range!: string;

  /** 'daily' | 'live' */
  @Column({ name: 'mode', type: 'text' })
  mode!: string;

  /** Run options, JSON */
  @Column({ name: 'parameters', type: 'text' })
  parameters!: string;

  @Column({ name: 'process_id', type: 'integer' })
  processId!: number;

  /** Stored as 0/1 */
  @Column({ name: 'success', type: 'integer' })
  success!: number;

  @Column({ name: 'num_records', type: 'integer' })
  numRecords!: number;

  @Column({ name: 'log_path', type: 'text', nullable: true })
  logPath!: string | null;

  @Column({ name: 'points_file_path', type: 'text', nullable: true })
  pointsFilePath!: string | null;
}
