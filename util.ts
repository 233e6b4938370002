/**
 * An AsyncIterable that can also be awaited directly.
 * - `for await (const p of seq)` starts a fresh traversal every time
 * - `await seq` runs one traversal and collects its items into an array
 */
export interface CollectableAsyncIterable<T> extends AsyncIterable<T>, PromiseLike<T[]> {}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

/**
 * Wrap a generator factory so each iteration calls it anew. Nothing runs
 * until the first iteration or await.
 */
export function restartable<T>(traverse: () => AsyncGenerator<T, void, undefined>): CollectableAsyncIterable<T> {
  const seq: CollectableAsyncIterable<T> = {
    [Symbol.asyncIterator]: () => traverse(),
    then<TResult1 = T[], TResult2 = never>(
      resolve?: ((value: T[]) => TResult1 | PromiseLike<TResult1>) | null,
      reject?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
    ): PromiseLike<TResult1 | TResult2> {
      return collect({ [Symbol.asyncIterator]: () => traverse() }).then(resolve, reject);
    },
  };
  return seq;
}
