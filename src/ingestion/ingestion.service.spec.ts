import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { gunzipSync } from 'node:zlib';
import {
  InMemoryExistenceChecker,
  InMemoryTimeSeriesStore,
  ManualClock,
  recordingSleep,
} from '../../test/utils/fakes';
import { buildTestConfig, TEST_MAPPINGS } from '../../test/utils/pipeline-fixtures';
import { RunOptions } from '../common/run-options';
import { PipelineConfig } from '../config/pipeline.config';
import { WritePipeline } from '../writer/write-pipeline.service';
import { FieldClassifier } from './classifier/field-classifier.service';
import { RawRecord } from './dto/raw-record';
import { IngestionContext, IngestionService } from './ingestion.service';
import { PointBuilder } from './points/point-builder.service';

describe('IngestionService', () => {
  let outputDir: string;
  let store: InMemoryTimeSeriesStore;
  let service: IngestionService;

  const records = [
    new RawRecord([
      ['Timelogged', '05/29/2025 12:00:00 AM'],
      ['HOT_BLAST_TEMP', '1150'],
      ['STACK_TEMP_L1_N', '820'],
    ]),
    new RawRecord([
      ['Timelogged', '05/29/2025 12:00:00 PM'],
      ['TOP_PRESS', '2.5'],
    ]),
    new RawRecord([['TOP_PRESS', '2.6']]),
  ];

  const expectedLines = [
    'process_params hot_blast_temp=1150 1748457000',
    'temperature_profile stack_temp_level1_north=820 1748457000',
    'process_params top_pressure=2.5 1748500200',
  ];

  const context = (options: Partial<RunOptions> = {}): IngestionContext => ({
    target: { mode: 'daily', date: '2025-05-29', range: 1 },
    options: {
      dbWrite: false,
      override: true,
      retainFile: false,
      logRun: false,
      ...options,
    },
  });

  const createService = (overrides: Partial<PipelineConfig> = {}): IngestionService => {
    const config = buildTestConfig({ outputDir, ...overrides });
    const clock = new ManualClock('2025-05-30T01:00:00Z');

    return new IngestionService(
      new PointBuilder(new FieldClassifier(TEST_MAPPINGS), config),
      new WritePipeline(
        store,
        new InMemoryExistenceChecker(store),
        recordingSleep(),
        clock,
        config,
      ),
      clock,
      config,
    );
  };

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ingestion-'));
    store = new InMemoryTimeSeriesStore();
    service = createService();
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it('should build lines without writing when db-write is off', async () => {
    const result = await service.ingestRecords(records, context());

    expect(result).toMatchObject({
      success: true,
      recordsProcessed: 3,
      recordsSkipped: 1,
      linesBuilt: 3,
      linesWritten: 0,
      pointsFilePath: null,
      errors: [],
    });
    expect(result.lastTimestamp).toEqual(new Date('2025-05-29T06:30:00.000Z'));
    expect(store.calls).toBe(0);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });

  it('should write every built line to the store', async () => {
    const result = await service.ingestRecords(records, context({ dbWrite: true }));

    expect(store.lines).toEqual(expectedLines);
    expect(result.linesWritten).toBe(3);
    expect(result.success).toBe(true);
  });

  it('should skip stored points when override is off', async () => {
    await service.ingestRecords(records, context({ dbWrite: true }));

    const again = await service.ingestRecords(
      records,
      context({ dbWrite: true, override: false }),
    );

    expect(again.linesWritten).toBe(0);
    expect(again.linesAlreadyStored).toBe(3);
    expect(store.lines).toHaveLength(3);
  });

  it('should retain a gzip audit copy of the lines', async () => {
    const result = await service.ingestRecords(records, context({ retainFile: true }));

    const expectedPath = path.join(outputDir, 'date_2025-05-29_Range1.txt.gz');
    expect(result.pointsFilePath).toBe(expectedPath);
    expect(gunzipSync(fs.readFileSync(expectedPath)).toString('utf-8')).toBe(
      `${expectedLines.join('\n')}\n`,
    );
    expect(fs.readdirSync(outputDir)).toEqual(['date_2025-05-29_Range1.txt.gz']);
  });

  it('should restrict records to the variable allow-list', async () => {
    const result = await service.ingestRecords(records, {
      ...context({ dbWrite: true }),
      variables: new Set(['TOP_PRESS']),
    });

    expect(store.lines).toEqual(['process_params top_pressure=2.5 1748500200']);
    expect(result.linesBuilt).toBe(1);
    expect(result.recordsSkipped).toBe(1);
  });

  it('should report a failed store write and still keep the audit copy', async () => {
    store.failNext(6);

    const result = await service.ingestRecords(
      records,
      context({ dbWrite: true, retainFile: true }),
    );

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      'Batch 0 failed after 6 attempt(s): store unavailable',
    ]);
    expect(result.linesWritten).toBe(0);
    expect(result.linesAttempted).toBe(3);
    expect(result.pointsFilePath).toBe(
      path.join(outputDir, 'date_2025-05-29_Range1.txt.gz'),
    );
  });

  it('should keep the counts of batches committed before a failed one', async () => {
    store.acceptOnly(1);
    const single = createService({ batchSize: 1 });

    const result = await single.ingestRecords([records[0]], context({ dbWrite: true }));

    expect(store.lines).toEqual(['process_params hot_blast_temp=1150 1748457000']);
    expect(result).toMatchObject({
      success: false,
      linesBuilt: 2,
      linesAttempted: 2,
      linesWritten: 1,
      errors: ['Batch 1 failed after 6 attempt(s): store unavailable'],
    });
  });

  it('should rewrite points whose values changed or gained fields when override is off', async () => {
    const first = new RawRecord([
      ['Timelogged', '05/29/2025 12:00:00 AM'],
      ['HOT_BLAST_TEMP', '1150'],
      ['TOP_PRESS', '2.5'],
    ]);
    await service.ingestRecords([first], {
      ...context({ dbWrite: true }),
      variables: new Set(['HOT_BLAST_TEMP']),
    });

    const corrected = new RawRecord([
      ['Timelogged', '05/29/2025 12:00:00 AM'],
      ['HOT_BLAST_TEMP', '1200'],
      ['TOP_PRESS', '2.5'],
    ]);
    const result = await service.ingestRecords(
      [corrected],
      context({ dbWrite: true, override: false }),
    );

    expect(store.lines).toEqual([
      'process_params hot_blast_temp=1150 1748457000',
      'process_params hot_blast_temp=1200,top_pressure=2.5 1748457000',
    ]);
    expect(result.linesWritten).toBe(1);
    expect(result.linesAlreadyStored).toBe(0);
  });

  it('should report a points file failure without hiding the write error', async () => {
    fs.mkdirSync(path.join(outputDir, 'date_2025-05-29_Range1.txt'));
    store.failNext(6);

    const result = await service.ingestRecords(
      records,
      context({ dbWrite: true, retainFile: true }),
    );

    expect(result.success).toBe(false);
    expect(result.pointsFilePath).toBeNull();
    expect(result.errors).toHaveLength(2);
    expect(result.errors[0]).toBe('Batch 0 failed after 6 attempt(s): store unavailable');
    expect(result.errors[1]).toMatch(
      /^Could not finish points file .*tmp_\d+\.txt: EISDIR/,
    );
  });

  it('should handle an empty record list', async () => {
    const result = await service.ingestRecords([], context({ dbWrite: true }));

    expect(result).toMatchObject({
      success: true,
      recordsProcessed: 0,
      linesBuilt: 0,
      linesWritten: 0,
      lastTimestamp: null,
    });
    expect(store.calls).toBe(0);
  });
});
