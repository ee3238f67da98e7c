export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
}

class DeferredPromise<T> implements Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;
  reject: (reason: unknown) => void = () => undefined;

  constructor() {
    // The executor runs synchronously, so both callbacks are bound before
    // the constructor returns.
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

/** A promise plus the functions that settle it. */
export function deferred<T>(): Deferred<T> {
  return new DeferredPromise<T>();
}
