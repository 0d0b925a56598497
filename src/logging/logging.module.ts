import { Global, Module } from '@nestjs/common';
import { RunFileLogger } from './run-file.logger';

@Global()
@Module({
  providers: [RunFileLogger],
  exports: [RunFileLogger],
})
export class LoggingModule {}
