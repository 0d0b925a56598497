import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { PipelineRun } from '../database/entities/pipeline-run.entity';
import { describeError } from '../common/pipeline-error';
import { RunKey, RunMode, RunRecord } from './run-record';

/**
 * RunLedger - idempotent log of pipeline executions
 *
 * One process owns the ledger file at a time; every write is a single
 * INSERT ... ON CONFLICT DO UPDATE statement, so no extra locking.
 */
@Injectable()
export class RunLedger implements OnModuleInit {
  private readonly logger = new Logger(RunLedger.name);

  constructor(
    @InjectRepository(PipelineRun)
    private readonly runRepository: Repository<PipelineRun>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.init();
  }

  /**
   * Create the runs table when it is absent. Safe to call repeatedly.
   */
  async init(): Promise<void> {
    const tableName = this.runRepository.metadata.tableName;
    const queryRunner = this.dataSource.createQueryRunner();
    try {
      if (await queryRunner.hasTable(tableName)) {
        this.logger.debug(`Ledger table '${tableName}' present`);
        return;
      }
      await this.dataSource.synchronize();
      this.logger.log(`Created ledger table '${tableName}'`);
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Insert the run, or replace the row holding the same (date, range, mode).
   */
  async upsert(record: RunRecord): Promise<void> {
    const values: QueryDeepPartialEntity<PipelineRun> = {
      runTime: record.runTime,
      dateRun: record.dateRun,
      range: record.range,
      mode: record.mode,
      parameters: JSON.stringify(record.parameters),
      processId: record.processId,
      success: record.success ? 1 : 0,
      numRecords: record.numRecords,
      logPath: record.logPath,
      pointsFilePath: record.pointsFilePath,
    };

    try {
      // ON CONFLICT (date_run, range, mode) DO UPDATE
      await this.runRepository
        .createQueryBuilder()
        .insert()
        .into(PipelineRun)
        .values(values)
        .orUpdate(
          [
            'run_time',
            'parameters',
            'process_id',
            'success',
            'num_records',
            'log_path',
            'points_file_path',
          ],
          ['date_run', 'range', 'mode'],
        )
        .execute();
    } catch (error) {
      this.logger.error('Ledger upsert failed', {
        key: `${record.dateRun}/${record.range}/${record.mode}`,
        error: describeError(error),
      });
      throw error;
    }

    this.logger.log(
      `Logged ${record.mode} run ${record.dateRun} range ${record.range}: success=${record.success}, records=${record.numRecords}`,
    );
  }

  async find(key: RunKey): Promise<RunRecord | null> {
    const row = await this.runRepository.findOneBy({
      dateRun: key.dateRun,
      range: key.range,
      mode: key.mode,
    });
    return row ? this.toRecord(row) : null;
  }

  async list(mode?: RunMode): Promise<RunRecord[]> {
    const rows = await this.runRepository.find({
      where: mode ? { mode } : {},
      order: { dateRun: 'ASC', range: 'ASC' },
    });
    return rows.map((row) => this.toRecord(row));
  }

  private toRecord(row: PipelineRun): RunRecord {
    return {
      runTime: row.runTime,
      dateRun: row.dateRun,
      range: row.range,
      mode: row.mode === 'live' ? 'live' : 'daily',
      parameters: this.parseParameters(row.parameters),
      processId: row.processId,
      success: row.success === 1,
      numRecords: row.numRecords,
      logPath: row.logPath,
      pointsFilePath: row.pointsFilePath,
    };
  }

  private parseParameters(serialized: string): Record<string, unknown> {
    try {
      const parsed: unknown = JSON.parse(serialized);
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        return Object.fromEntries(Object.entries(parsed));
      }
    } catch (error) {
      this.logger.warn(`Unreadable run parameters: ${describeError(error)}`);
    }
    return {};
  }
}
