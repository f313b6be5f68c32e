// src/prefetch.ts
export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

function settle<R>(p: Promise<R>): Promise<Settled<R>> {
  return p.then(
    (value): Settled<R> => ({ ok: true, value }),
    (error: unknown): Settled<R> => ({ ok: false, error }),
  );
}

/**
 * Start `work` on up to `depth` items of `source` ahead of the consumer and
 * yield results in source order. A rejected item is yielded as
 * `{ ok: false }` rather than thrown, so failures of work the consumer never
 * reaches do not surface as unhandled rejections.
 *
 * Breaking out of the loop stops pulling from `source` and waits for work
 * already started before returning.
 */
export async function* readAhead<T, R>(
  source: AsyncIterable<T>,
  depth: number,
  work: (item: T) => Promise<R>,
): AsyncGenerator<[T, Settled<R>], void, undefined> {
  const limit = Math.max(1, Math.floor(depth));
  const it = source[Symbol.asyncIterator]();
  const queue: Array<{ item: T; result: Promise<Settled<R>> }> = [];
  let exhausted = false;
  try {
    while (true) {
      while (!exhausted && queue.length < limit) {
        const next = await it.next();
        if (next.done) {
          exhausted = true;
          break;
        }
        const item = next.value;
        // a synchronous throw from work settles like a rejection
        const result = settle(new Promise<R>((resolve) => resolve(work(item))));
        queue.push({ item, result });
      }
      const head = queue.shift();
      if (!head) return;
      yield [head.item, await head.result];
    }
  } finally {
    if (!exhausted) {
      await it.return?.();
    }
    await Promise.all(queue.map((q) => q.result));
  }
}
