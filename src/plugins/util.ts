/** Shared helpers for the dispatch components. */

/** Readable identity for a handler or callback in log lines. */
export function callbackName(fn: { name: string }): string {
  return fn.name || '<anonymous>';
}

/** Throws when a dispatch key (event name, hook point) is unusable. */
export function assertKey(kind: string, key: string): void {
  if (typeof key !== 'string' || key.trim() === '') {
    throw new Error(`Invalid ${kind}: ${JSON.stringify(key)}`);
  }
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
