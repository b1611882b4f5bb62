/**
 * Wall clock behind registration times, report timestamps and response envelopes.
 */
type Now = () => Date;

const wallClock: Now = () => new Date();
let current: Now = wallClock;

export const clock = {
  now(): Date {
    return current();
  },
  isoNow(): string {
    return current().toISOString();
  },
  /** Pin the clock to a fixed source; call with no argument to restore the wall clock. */
  use(now: Now = wallClock): void {
    current = now;
  },
};
