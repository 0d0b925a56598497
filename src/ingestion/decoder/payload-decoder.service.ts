import { Inject, Injectable, Logger } from '@nestjs/common';
import { DecodeError } from '../../common/pipeline-error';
import { pipelineConfig, PipelineConfig } from '../../config/pipeline.config';
import { RawRecord, RawValue } from '../dto/raw-record';
import {
  isLiteralMapping,
  LiteralSyntaxError,
  LiteralValue,
  parseLiteral,
} from './literal-parser';

/** Any <script ...>...</script> span, across lines, shortest match */
const SCRIPT_SPAN = /<script[\s\S]*?<\/script>/g;

/**
 * PayloadDecoder - raw API response string -> ordered RawRecords
 *
 * The payload is a list of flat mappings in literal notation, sometimes
 * with script markup injected by the API's web front. Decoding is
 * all-or-nothing: any malformed part fails the whole payload.
 */
@Injectable()
export class PayloadDecoder {
  private readonly logger = new Logger(PayloadDecoder.name);

  constructor(
    @Inject(pipelineConfig.KEY) private readonly config: PipelineConfig,
  ) {}

  /**
   * @throws DecodeError when the cleaned payload is not a list of flat
   *   string-keyed mappings
   */
  decode(raw: string): RawRecord[] {
    const cleaned = raw.replace(SCRIPT_SPAN, '').trim();

    let parsed: LiteralValue;
    try {
      parsed = parseLiteral(cleaned);
    } catch (error) {
      const message =
        error instanceof LiteralSyntaxError ? error.message : String(error);
      this.logger.error(`Failed to parse payload: ${message}`);
      throw new DecodeError(
        `Payload is not a valid literal: ${message}`,
        error instanceof Error ? error : undefined,
      );
    }

    if (!Array.isArray(parsed)) {
      throw new DecodeError('Payload root is not a list');
    }

    const records = parsed.map((item, index) => this.toRecord(item, index));
    this.logger.log(`Decoded ${records.length} records`);
    return records;
  }

  private toRecord(item: LiteralValue, index: number): RawRecord {
    if (!isLiteralMapping(item)) {
      throw new DecodeError(`Element ${index} is not a mapping`);
    }

    const values: [string, RawValue][] = [];
    for (const [key, value] of item.entries) {
      if (typeof key !== 'string') {
        throw new DecodeError(
          `Element ${index} has a non-string key ${JSON.stringify(key)}`,
        );
      }
      if (Array.isArray(value) || isLiteralMapping(value)) {
        throw new DecodeError(
          `Element ${index} has a nested value for '${key}'`,
        );
      }
      values.push([key, value]);
    }
    return new RawRecord(values, this.config.timestampField);
  }
}
