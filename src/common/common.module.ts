import { Global, Module } from '@nestjs/common';
import { CLOCK, SLEEP, systemClock, timerSleep } from './clock';

/**
 * Process-wide time providers, overridden in tests.
 */
@Global()
@Module({
  providers: [
    { provide: CLOCK, useValue: systemClock },
    { provide: SLEEP, useValue: timerSleep },
  ],
  exports: [CLOCK, SLEEP],
})
export class CommonModule {}
