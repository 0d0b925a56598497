import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { CommonModule } from './common/common.module';
import { pipelineConfig, PipelineConfig } from './config/pipeline.config';
import { PipelineRun } from './database/entities/pipeline-run.entity';
import { RunLedgerModule } from './ledger/run-ledger.module';
import { LoggingModule } from './logging/logging.module';
import { OrchestratorModule } from './orchestrator/orchestrator.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [pipelineConfig],
    }),
    TypeOrmModule.forRootAsync({
      useFactory: (config: PipelineConfig) => {
        fs.mkdirSync(path.dirname(config.ledgerPath), { recursive: true });
        return {
          type: 'better-sqlite3',
          database: config.ledgerPath,
          entities: [PipelineRun],
          synchronize: false, // RunLedger.init creates the table when absent
          logging: false,
        };
      },
      inject: [pipelineConfig.KEY],
    }),
    CommonModule,
    LoggingModule,
    RunLedgerModule,
    OrchestratorModule,
  ],
})
export class AppModule {}
