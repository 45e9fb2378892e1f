// Single-shot wake-up signal between a producer and a waiting consumer.
// Used by the evaluation worker and the job runner.

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let settle: (value: T) => void = () => {};
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value) => settle(value) };
}
