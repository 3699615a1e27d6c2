export interface ClockPort {
  nowMs(): number;
}

/**
 * System clock adapter backed by Date.now().
 *
 * Only composition roots create this; engine components take a ClockPort
 * so tests can drive time explicitly.
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}

/**
 * Manually advanced clock for tests and replay
 */
export function createManualClock(startMs: number = 0): ClockPort & { advance(ms: number): void } {
  let now = startMs;
  return {
    nowMs: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}
