import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PipelineRun } from '../database/entities/pipeline-run.entity';
import { RunLedger } from './run-ledger.service';
import { RunLedgerModule } from './run-ledger.module';
import { RunRecord } from './run-record';

describe('RunLedger', () => {
  let module: TestingModule;
  let ledger: RunLedger;

  const record = (overrides: Partial<RunRecord> = {}): RunRecord => ({
    runTime: '2025-05-30T01:00:00.000Z',
    dateRun: '05-29-2025',
    range: '1',
    mode: 'daily',
    parameters: { dbWrite: true, override: true },
    processId: 1001,
    success: true,
    numRecords: 720,
    logPath: 'logs/daily_2025-05-29_1_1001.log',
    pointsFilePath: null,
    ...overrides,
  });

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [
        TypeOrmModule.forRoot({
          type: 'better-sqlite3',
          database: ':memory:',
          entities: [PipelineRun],
          synchronize: false,
        }),
        RunLedgerModule,
      ],
    }).compile();
    await module.init();

    ledger = module.get(RunLedger);
  });

  afterEach(async () => {
    await module.close();
  });

  it('should create the table on start and tolerate repeated init', async () => {
    await ledger.init();
    await ledger.init();

    await expect(ledger.list()).resolves.toEqual([]);
  });

  it('should read back what it stored', async () => {
    await ledger.upsert(record());

    await expect(
      ledger.find({ dateRun: '05-29-2025', range: '1', mode: 'daily' }),
    ).resolves.toEqual(record());
  });

  it('should return null for an unknown key', async () => {
    await expect(
      ledger.find({ dateRun: '01-01-2025', range: '1', mode: 'daily' }),
    ).resolves.toBeNull();
  });

  it('should keep one row per key with the latest values', async () => {
    await ledger.upsert(record({ success: false, numRecords: 0 }));
    await ledger.upsert(
      record({
        runTime: '2025-05-30T02:00:00.000Z',
        success: true,
        numRecords: 715,
        processId: 2002,
        pointsFilePath: 'output/date_2025-05-29_Range1.txt.gz',
      }),
    );

    const rows = await ledger.list();
    expect(rows).toHaveLength(1);
    expect(rows[0]).toEqual(
      record({
        runTime: '2025-05-30T02:00:00.000Z',
        success: true,
        numRecords: 715,
        processId: 2002,
        pointsFilePath: 'output/date_2025-05-29_Range1.txt.gz',
      }),
    );
  });

  it('should keep rows apart by range and mode', async () => {
    await ledger.upsert(record({ range: '2' }));
    await ledger.upsert(record({ range: '1' }));
    await ledger.upsert(record({ range: '06-30-00', mode: 'live' }));

    const all = await ledger.list();
    expect(all.map((r) => `${r.mode}/${r.range}`)).toEqual([
      'live/06-30-00',
      'daily/1',
      'daily/2',
    ]);

    const daily = await ledger.list('daily');
    expect(daily.map((r) => r.range)).toEqual(['1', '2']);
  });
});
