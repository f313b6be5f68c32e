import { readAhead } from "../prefetch.js";

async function* numbers(count: number, pulled: number[]) {
  for (let i = 1; i <= count; i++) {
    pulled.push(i);
    yield i;
  }
}

const delay = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("readAhead", () => {
  test("yields results in source order with bounded work in flight", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const seen: Array<[number, number]> = [];
    const work = async (n: number) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(n % 2 === 0 ? 1 : 15);
      inFlight -= 1;
      return n * 10;
    };
    for await (const [n, res] of readAhead(numbers(6, []), 3, work)) {
      if (res.ok) seen.push([n, res.value]);
    }
    expect(seen).toEqual([
      [1, 10],
      [2, 20],
      [3, 30],
      [4, 40],
      [5, 50],
      [6, 60],
    ]);
    expect(maxInFlight).toBeLessThanOrEqual(3);
    expect(maxInFlight).toBeGreaterThan(1);
  });

  test("failures are yielded, not thrown", async () => {
    const out: string[] = [];
    const work = async (n: number) => {
      if (n === 2) throw new Error("bad two");
      return n;
    };
    for await (const [n, res] of readAhead(numbers(3, []), 2, work)) {
      out.push(res.ok ? `ok ${n}` : `err ${n}`);
    }
    expect(out).toEqual(["ok 1", "err 2", "ok 3"]);
  });

  test("a synchronous throw from work is yielded as a failure", async () => {
    const work = (n: number): Promise<number> => {
      throw new Error(`sync ${n}`);
    };
    const results: boolean[] = [];
    for await (const [, res] of readAhead(numbers(2, []), 1, work)) {
      results.push(res.ok);
    }
    expect(results).toEqual([false, false]);
  });

  test("breaking early stops pulling from the source", async () => {
    const pulled: number[] = [];
    for await (const [n] of readAhead(numbers(10, pulled), 2, async (x) => x)) {
      if (n === 1) break;
    }
    expect(pulled).toEqual([1, 2]);
  });
});
