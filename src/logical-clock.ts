export interface LogicalClock {
  next(): number;
  current(): number;
}

/**
 * Wall-clock milliseconds that never repeat or go backwards, even when the
 * system clock does. Seeds are the largest timestamps already persisted.
 */
export function createLogicalClock(
  seeds: Array<number | null | undefined> = [],
  now: () => number = Date.now,
): LogicalClock {
  const finite = seeds.filter((s): s is number => Number.isFinite(s));
  let current = Math.max(0, ...finite);
  return {
    next() {
      current = Math.max(now(), current + 1);
      return current;
    },
    current() {
      return current;
    },
  };
}
