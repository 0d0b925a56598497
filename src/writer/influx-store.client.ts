import { Inject, Injectable, Logger } from '@nestjs/common';
import { flux, InfluxDB, ParameterizedQuery } from '@influxdata/influxdb-client';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import {
  ExistenceChecker,
  TimeSeriesStore,
} from './interfaces/time-series-store.interface';

export const INFLUX_CONNECTION = Symbol('INFLUX_CONNECTION');

/**
 * The part of the InfluxDB client the pipeline talks to.
 */
export type InfluxConnection = Pick<InfluxDB, 'getWriteApi' | 'getQueryApi'>;

export function createInfluxConnection(config: PipelineConfig): InfluxDB {
  return new InfluxDB({
    url: config.influx.url,
    token: config.influx.token,
    timeout: config.influx.timeoutMs,
  });
}

/**
 * InfluxDB v2 write path, precision seconds.
 *
 * The client's own retry buffer is disabled: retry and backoff are run by
 * WritePipeline so attempts stay visible per batch.
 */
@Injectable()
export class InfluxTimeSeriesStore implements TimeSeriesStore {
  private readonly logger = new Logger(InfluxTimeSeriesStore.name);

  constructor(
    @Inject(INFLUX_CONNECTION) private readonly connection: InfluxConnection,
    @Inject(pipelineConfig.KEY) private readonly config: PipelineConfig,
  ) {}

  async writeLines(lines: string[]): Promise<void> {
    const { org, bucket } = this.config.influx;
    const writeApi = this.connection.getWriteApi(org, bucket, 's', {
      maxRetries: 0,
      batchSize: lines.length + 1,
      flushInterval: 0,
    });

    writeApi.writeRecords(lines);
    // close() flushes and rejects when the write fails
    await writeApi.close();
    this.logger.debug(`Wrote ${lines.length} line(s) to bucket ${bucket}`);
  }
}

/**
 * Reads the stored field values of a point inside its one-second window.
 */
@Injectable()
export class InfluxExistenceChecker implements ExistenceChecker {
  constructor(
    @Inject(INFLUX_CONNECTION) private readonly connection: InfluxConnection,
    @Inject(pipelineConfig.KEY) private readonly config: PipelineConfig,
  ) {}

  async storedFields(
    measurement: string,
    tags: Record<string, string>,
    timestamp: number,
    fields: string[],
  ): Promise<Map<string, number>> {
    const query = this.buildQuery(measurement, tags, timestamp, fields);
    const rows = await this.connection
      .getQueryApi(this.config.influx.org)
      .collectRows(query, (values, tableMeta) => {
        const field: unknown = tableMeta.get(values, '_field');
        const value: unknown = tableMeta.get(values, '_value');
        return typeof field === 'string' && typeof value === 'number'
          ? { field, value }
          : undefined;
      });

    return new Map(rows.map((row) => [row.field, row.value]));
  }

  buildQuery(
    measurement: string,
    tags: Record<string, string>,
    timestamp: number,
    fields: string[],
  ): ParameterizedQuery {
    const start = new Date(timestamp * 1000);
    const stop = new Date((timestamp + 1) * 1000);

    let query = flux`from(bucket: ${this.config.influx.bucket})
  |> range(start: ${start}, stop: ${stop})
  |> filter(fn: (r) => r._measurement == ${measurement})`;
    for (const [key, value] of Object.entries(tags)) {
      query = flux`${query}
  |> filter(fn: (r) => r[${key}] == ${value})`;
    }

    const [first, ...rest] = fields;
    if (first !== undefined) {
      let condition = flux`r._field == ${first}`;
      for (const field of rest) {
        condition = flux`${condition} or r._field == ${field}`;
      }
      query = flux`${query}
  |> filter(fn: (r) => ${condition})`;
    }

    return flux`${query}
  |> keep(columns: ["_field", "_value"])`;
  }
}
