import { Module } from '@nestjs/common';
import { IngestionModule } from '../ingestion/ingestion.module';
import { RunLedgerModule } from '../ledger/run-ledger.module';
import { UpstreamModule } from '../upstream/upstream.module';
import { PipelineOrchestrator } from './pipeline-orchestrator.service';

@Module({
  imports: [UpstreamModule, IngestionModule, RunLedgerModule],
  providers: [PipelineOrchestrator],
  exports: [PipelineOrchestrator],
})
export class OrchestratorModule {}
