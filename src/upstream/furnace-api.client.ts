import { Inject, Injectable, Logger } from '@nestjs/common';
import { XMLParser } from 'fast-xml-parser';
import { CalendarDate } from '../common/calendar-date';
import { SLEEP, Sleep } from '../common/clock';
import { FetchError, asError, describeError } from '../common/pipeline-error';
import {
  EndpointSettings,
  pipelineConfig,
  PipelineConfig,
} from '../config/pipeline.config';
import { DayRange, PayloadSource } from './payload-source.interface';

/**
 * HTTP client for the furnace monitoring API.
 *
 * Both endpoints answer with an XML envelope (`<string>...</string>`)
 * whose text is the literal payload handed to the decoder.
 */
@Injectable()
export class FurnaceApiClient implements PayloadSource {
  private readonly logger = new Logger(FurnaceApiClient.name);
  private readonly xmlParser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: false,
    processEntities: true,
    trimValues: true,
  });

  constructor(
    @Inject(pipelineConfig.KEY) private readonly config: PipelineConfig,
    @Inject(SLEEP) private readonly sleep: Sleep,
  ) {}

  async fetchLive(): Promise<string> {
    const endpoint = this.config.upstream.live;
    const params = new URLSearchParams({
      user: endpoint.user,
      password: endpoint.password,
    });
    return this.fetchWithRetry('live', endpoint, params);
  }

  async fetchDaily(date: CalendarDate, range: DayRange): Promise<string> {
    const endpoint = this.config.upstream.daily;
    const params = new URLSearchParams({
      user: endpoint.user,
      password: endpoint.password,
      month: String(date.month),
      day: String(date.day),
      year: String(date.year),
      range: String(range),
    });
    return this.fetchWithRetry('daily', endpoint, params);
  }

  private async fetchWithRetry(
    kind: 'live' | 'daily',
    endpoint: EndpointSettings,
    params: URLSearchParams,
  ): Promise<string> {
    const url = `${endpoint.url}?${params.toString()}`;

    for (let attempt = 1; ; attempt++) {
      try {
        const response = await fetch(url, {
          signal: AbortSignal.timeout(this.config.upstream.timeoutMs),
        });
        this.logger.log(`API response status code: ${response.status}`);
        if (!response.ok) {
          throw new Error(`HTTP ${response.status} ${response.statusText}`);
        }

        const payload = this.unwrapEnvelope(await response.text());
        this.logger.debug(`API payload: ${payload.slice(0, 100)}...`);
        return payload;
      } catch (error) {
        this.logger.error(
          `API fetch failed (attempt ${attempt}/${endpoint.attempts}): ${describeError(error)}`,
        );
        if (attempt >= endpoint.attempts) {
          throw new FetchError(
            kind,
            `Giving up after ${attempt} attempt(s): ${describeError(error)}`,
            asError(error),
          );
        }
        await this.sleep(endpoint.retryDelayMs);
      }
    }
  }

  /**
   * Text of the envelope's root element.
   */
  private unwrapEnvelope(xml: string): string {
    const parsed: unknown = this.xmlParser.parse(xml);
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('API response is not XML');
    }

    const root: unknown = Object.values(parsed)[0];
    const text =
      typeof root === 'object' && root !== null && '#text' in root
        ? root['#text']
        : root;

    if (typeof text !== 'string' || text.trim() === '') {
      throw new Error('API response is empty');
    }
    return text;
  }
}
