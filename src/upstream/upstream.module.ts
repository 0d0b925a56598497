import { Module } from '@nestjs/common';
import { FurnaceApiClient } from './furnace-api.client';
import { PAYLOAD_SOURCE } from './payload-source.interface';

@Module({
  providers: [{ provide: PAYLOAD_SOURCE, useClass: FurnaceApiClient }],
  exports: [PAYLOAD_SOURCE],
})
export class UpstreamModule {}
