/**
 * Timing utilities for ordering-sensitive tests
 */

/**
 * Promise resolved from the outside. Lets a test hold an async validator or
 * hook at a known point and release it later.
 */
export interface Deferred<T = void> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
  readonly settled: boolean;
}

export function deferred<T = void>(): Deferred<T> {
  let settled = false;
  let resolveFn: (value: T) => void = () => {};
  let rejectFn: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((resolve, reject) => {
    resolveFn = resolve;
    rejectFn = reject;
  });
  return {
    promise,
    resolve(value) {
      settled = true;
      resolveFn(value);
    },
    reject(reason) {
      settled = true;
      rejectFn(reason);
    },
    get settled() {
      return settled;
    },
  };
}

/**
 * Wait for a specified duration
 * @param ms - Milliseconds to wait
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Let every pending microtask run, so promise chains started synchronously
 * reach their next real await
 */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
