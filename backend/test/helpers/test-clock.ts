import type { Clock } from '../../src/shared/time/clock';

/**
 * WHY:
 * - Token expiry is clock-driven; tests move time instead of sleeping.
 */
export function createTestClock(start: Date = new Date('2026-01-15T10:00:00.000Z')) {
  let current = new Date(start.getTime());

  const clock: Clock = () => new Date(current.getTime());

  return {
    clock,
    nowMs: () => current.getTime(),
    advanceSeconds(seconds: number) {
      current = new Date(current.getTime() + seconds * 1000);
    },
    set(date: Date) {
      current = new Date(date.getTime());
    },
  };
}

export type TestClock = ReturnType<typeof createTestClock>;
