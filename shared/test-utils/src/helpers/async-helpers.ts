/**
 * Async helpers for tests that need to hold or pace a collaborator.
 */

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * A promise with its resolve/reject exposed.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason?: unknown) => void;
}

export function createDeferred<T = void>(): Deferred<T> {
  const handles: { resolve?: (value: T) => void; reject?: (reason?: unknown) => void } = {};

  const promise = new Promise<T>((res, rej) => {
    handles.resolve = res;
    handles.reject = rej;
  });

  return {
    promise,
    // The executor runs synchronously, so both handles are set by now
    resolve: (value: T) => handles.resolve?.(value),
    reject: (reason?: unknown) => handles.reject?.(reason),
  };
}
