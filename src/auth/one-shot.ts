/**
 * Single-use handoff between a producer (the callback route) and one waiter.
 *
 * The first resolve/reject takes the slot and returns true; every later call
 * is a no-op returning false. The promise never settles twice.
 */
export interface OneShot<T> {
  readonly promise: Promise<T>;
  readonly settled: boolean;
  /** True once the slot was taken by reject() */
  readonly rejected: boolean;
  resolve(value: T): boolean;
  reject(reason: Error): boolean;
}

export function createOneShot<T>(): OneShot<T> {
  let settled = false;
  let rejected = false;
  let resolvePromise: (value: T) => void = () => undefined;
  let rejectPromise: (reason: Error) => void = () => undefined;

  const promise = new Promise<T>((resolve, reject) => {
    resolvePromise = resolve;
    rejectPromise = reject;
  });
  // A rejection may land before anyone waits; the waiter still observes it.
  promise.catch(() => undefined);

  return {
    promise,
    get settled() {
      return settled;
    },
    get rejected() {
      return rejected;
    },
    resolve(value: T): boolean {
      if (settled) return false;
      settled = true;
      resolvePromise(value);
      return true;
    },
    reject(reason: Error): boolean {
      if (settled) return false;
      settled = true;
      rejected = true;
      rejectPromise(reason);
      return true;
    },
  };
}
