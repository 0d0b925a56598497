import { Module } from '@nestjs/common';
import { pipelineConfig } from '../config/pipeline.config';
import {
  createInfluxConnection,
  INFLUX_CONNECTION,
  InfluxExistenceChecker,
  InfluxTimeSeriesStore,
} from './influx-store.client';
import {
  EXISTENCE_CHECKER,
  TIME_SERIES_STORE,
} from './interfaces/time-series-store.interface';
import { WritePipeline } from './write-pipeline.service';

/**
 * WriterModule
 *
 * Batched, retried writes to InfluxDB. The store and the existence checker
 * sit behind tokens so tests swap them for in-process fakes.
 */
@Module({
  providers: [
    WritePipeline,
    {
      provide: INFLUX_CONNECTION,
      useFactory: createInfluxConnection,
      inject: [pipelineConfig.KEY],
    },
    { provide: TIME_SERIES_STORE, useClass: InfluxTimeSeriesStore },
    { provide: EXISTENCE_CHECKER, useClass: InfluxExistenceChecker },
  ],
  exports: [WritePipeline],
})
export class WriterModule {}
