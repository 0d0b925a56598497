import { Module } from '@nestjs/common';
import { FIELD_MAPPINGS, loadFieldMappings } from '../config/field-mappings';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { WriterModule } from '../writer/writer.module';
import { FieldClassifier } from './classifier/field-classifier.service';
import { PayloadDecoder } from './decoder/payload-decoder.service';
import { IngestionService } from './ingestion.service';
import { PointBuilder } from './points/point-builder.service';

/**
 * IngestionModule
 *
 * Components:
 * - PayloadDecoder: raw payload string -> RawRecords
 * - FieldClassifier: raw variable -> (measurement, field), numeric coercion
 * - PointBuilder: RawRecord -> line protocol, one line per measurement
 * - IngestionService: records -> intermediate file -> WritePipeline
 */
@Module({
  imports: [WriterModule],
  providers: [
    {
      provide: FIELD_MAPPINGS,
      useFactory: (config: PipelineConfig) =>
        loadFieldMappings(config.mappingsPath),
      inject: [pipelineConfig.KEY],
    },
    FieldClassifier,
    PayloadDecoder,
    PointBuilder,
    IngestionService,
  ],
  exports: [IngestionService, PayloadDecoder],
})
export class IngestionModule {}
