#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Command } from 'commander';
import { AppModule } from './app.module';
import {
  buildInvocation,
  CliOptions,
  Invocation,
  parseFlag,
  parseMode,
  parseRange,
  parseSeconds,
} from './cli/pipeline-request';
import { describeError } from './common/pipeline-error';
import { RunLedger } from './ledger/run-ledger.service';
import {
  DEBUG_LOG_LEVELS,
  DEFAULT_LOG_LEVELS,
  RunFileLogger,
} from './logging/run-file.logger';
import { PipelineOrchestrator } from './orchestrator/pipeline-orchestrator.service';

async function execute(invocation: Invocation): Promise<void> {
  Object.assign(process.env, invocation.env);

  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  const logger = app.get(RunFileLogger);
  logger.setLogLevels(invocation.debug ? DEBUG_LOG_LEVELS : DEFAULT_LOG_LEVELS);
  app.useLogger(logger);

  try {
    const orchestrator = app.get(PipelineOrchestrator);
    const { request, options } = invocation;

    switch (request.kind) {
      case 'live':
        await orchestrator.runLive(options);
        break;
      case 'daily':
        await orchestrator.runDaily(request.date, options);
        break;
      case 'range':
        await orchestrator.runRange(request.start, request.end, options);
        break;
      case 'runs': {
        const runs = await app.get(RunLedger).list(request.mode);
        process.stdout.write(`${JSON.stringify(runs, null, 2)}\n`);
        break;
      }
    }
  } finally {
    await app.close();
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('furnace-pipeline')
    .description('Blast furnace telemetry ingestion into InfluxDB')
    .option('--mode <mode>', 'live (latest sample) or daily (by date)', parseMode)
    .option('--date <date>', 'day to ingest in daily mode (MM-DD-YYYY), default yesterday UTC')
    .option('--startdate <date>', 'first day of a range (MM-DD-YYYY)')
    .option('--enddate <date>', 'last day of a range (MM-DD-YYYY)')
    .option('--range <range>', '1 = 00:00-12:00, 2 = 12:00-24:00; default both', parseRange)
    .option('--db-write <bool>', 'write points to InfluxDB', parseFlag, false)
    .option('--override <bool>', 'rewrite points already stored', parseFlag, true)
    .option('--retain-file <bool>', 'keep a gzip copy of the emitted points', parseFlag, false)
    .option('--debug <bool>', 'debug logging', parseFlag, false)
    .option('--delay <seconds>', 'live cadence in seconds', parseSeconds)
    .option('--db-host <url>', 'InfluxDB URL')
    .option('--db-org <org>', 'InfluxDB organisation')
    .option('--log-run <bool>', 'record the run in the run ledger', parseFlag, false)
    .option('--variable-file <path>', 'only ingest the variables listed in this file')
    .option('--list-runs', 'print the run ledger (filtered by --mode) and exit', false)
    .action(async (cli: CliOptions) => {
      await execute(buildInvocation(cli));
    });

  return program;
}

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (err) {
    process.stderr.write(`${describeError(err)}\n`);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
