import { Injectable } from '@nestjs/common';
import type { Clock } from '../domain/clock.port';

/**
 * Wall-clock time source, bound to CLOCK outside of tests.
 */
@Injectable()
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}
