/**
 * Clock port for time-dependent operations.
 * Refresh due-ness is decided from this, never from the wall clock directly.
 */
export interface Clock {
  now(): Date;
}

export const CLOCK = Symbol('CLOCK');
