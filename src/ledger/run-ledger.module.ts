import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PipelineRun } from '../database/entities/pipeline-run.entity';
import { RunLedger } from './run-ledger.service';

@Module({
  imports: [TypeOrmModule.forFeature([PipelineRun])],
  providers: [RunLedger],
  exports: [RunLedger],
})
export class RunLedgerModule {}
