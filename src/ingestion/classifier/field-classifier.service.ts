import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  FIELD_MAPPINGS,
  FieldMappings,
  findOverlappingKeys,
} from '../../config/field-mappings';
import { RawValue } from '../dto/raw-record';

/**
 * Where a raw API variable lands in the time-series model.
 */
export interface FieldIdentity {
  measurement: string;
  field: string;
}

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Coerce a raw value to a finite float.
 *
 * Empty or all-whitespace strings, unparsable text, null and non-finite
 * results are "no value" (null), never zero.
 */
export function toNumeric(value: RawValue | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;

  const trimmed = value.trim();
  if (trimmed === '' || !DECIMAL_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * FieldClassifier - raw variable name -> (measurement, field)
 *
 * Tables are consulted in the order the mapping file lists them and the
 * first match wins. Unknown names return null: the API exposes far more
 * variables than are modeled, so a miss is expected and callers skip it.
 */
@Injectable()
export class FieldClassifier {
  private readonly logger = new Logger(FieldClassifier.name);
  private readonly lookup = new Map<string, FieldIdentity>();
  private readonly stringFields: ReadonlySet<string>;

  constructor(@Inject(FIELD_MAPPINGS) mappings: FieldMappings) {
    for (const table of mappings.tables) {
      for (const [rawName, field] of Object.entries(table.fields)) {
        if (!this.lookup.has(rawName)) {
          this.lookup.set(rawName, { measurement: table.measurement, field });
        }
      }
    }
    this.stringFields = new Set(mappings.stringFields);

    for (const [rawName, owners] of findOverlappingKeys(mappings)) {
      this.logger.warn(
        `Variable '${rawName}' is mapped by ${owners.join(', ')}; using ${owners[0]}`,
      );
    }

    this.logger.log(
      `Initialized with ${this.lookup.size} variable(s) across ${mappings.tables.length} measurement table(s)`,
    );
  }

  classify(rawName: string): FieldIdentity | null {
    return this.lookup.get(rawName) ?? null;
  }

  /**
   * Fields that must never be written numerically (forced-string allow-list).
   */
  isStringField(field: string): boolean {
    return this.stringFields.has(field);
  }

  toNumeric(value: RawValue | undefined): number | null {
    return toNumeric(value);
  }
}
