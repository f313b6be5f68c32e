import { createLogicalClock } from "../logical-clock.js";

describe("createLogicalClock", () => {
  test("starts after the largest seed even when the wall clock is behind", () => {
    const clock = createLogicalClock([5, null, 900, undefined], () => 100);
    expect(clock.current()).toBe(900);
    expect(clock.next()).toBe(901);
    expect(clock.next()).toBe(902);
  });

  test("follows the wall clock when it is ahead", () => {
    let now = 1_000;
    const clock = createLogicalClock([], () => now);
    expect(clock.next()).toBe(1_000);
    expect(clock.next()).toBe(1_001);
    now = 5_000;
    expect(clock.next()).toBe(5_000);
  });
});
