import { Inject, Injectable, Logger } from '@nestjs/common';
import { pipelineConfig, PipelineConfig } from '../../config/pipeline.config';
import { FieldClassifier } from '../classifier/field-classifier.service';
import { RawRecord } from '../dto/raw-record';
import {
  parseLocalTimestamp,
  toEpochSeconds,
} from '../timestamps/local-time';
import { Point, serializePoint } from './line-protocol';

export interface BuiltRecord {
  timestamp: Date | null;
  lines: string[];
}

/**
 * PointBuilder - one RawRecord -> one Point per measurement
 *
 * Fields are visited in record order and grouped by measurement in
 * first-seen order, so identical input always serializes to identical
 * bytes (audit diffs and store overwrites rely on it).
 */
@Injectable()
export class PointBuilder {
  private readonly logger = new Logger(PointBuilder.name);

  constructor(
    private readonly classifier: FieldClassifier,
    @Inject(pipelineConfig.KEY) private readonly config: PipelineConfig,
  ) {}

  /**
   * Normalize the record's local timestamp to a UTC instant.
   * Null when the field is missing or unparsable.
   */
  resolveTimestamp(record: RawRecord): Date | null {
    const raw = record.rawTimestamp();
    if (raw === null) return null;
    const timestamp = parseLocalTimestamp(raw, this.config.timezone);
    if (!timestamp) {
      this.logger.warn(`Failed to parse ${record.timestampField}: '${raw}'`);
    }
    return timestamp;
  }

  build(record: RawRecord, timestamp: Date): Point[] {
    const grouped = new Map<string, Map<string, number>>();
    let unclassified = 0;
    let absent = 0;

    for (const [name, value] of record.fields()) {
      const identity = this.classifier.classify(name);
      if (!identity) {
        unclassified++;
        continue;
      }
      // Reserved identity, never emitted
      if (this.classifier.isStringField(identity.field)) continue;

      const numeric = this.classifier.toNumeric(value);
      if (numeric === null) {
        absent++;
        continue;
      }

      let fields = grouped.get(identity.measurement);
      if (!fields) {
        fields = new Map();
        grouped.set(identity.measurement, fields);
      }
      fields.set(identity.field, numeric);
    }

    const seconds = toEpochSeconds(timestamp);
    const points = Array.from(grouped, ([measurement, fields]) => ({
      measurement,
      fields: Array.from(fields),
      timestamp: seconds,
    }));

    this.logger.debug(
      `Built ${points.length} point(s) at ${timestamp.toISOString()} from ${record.size} variable(s) (${unclassified} unclassified, ${absent} without value)`,
    );
    return points;
  }

  serialize(points: Point[]): string[] {
    return points.map(serializePoint);
  }

  buildLines(record: RawRecord, timestamp: Date): string[] {
    return this.serialize(this.build(record, timestamp));
  }

  /**
   * Narrow to the variable allow-list, resolve the timestamp and build.
   * A record without a usable timestamp yields no lines.
   */
  buildRecord(record: RawRecord, variables?: ReadonlySet<string>): BuiltRecord {
    const scoped = variables ? record.restrictTo(variables) : record;
    const timestamp = this.resolveTimestamp(scoped);
    return {
      timestamp,
      lines: timestamp ? this.buildLines(scoped, timestamp) : [],
    };
  }
}
