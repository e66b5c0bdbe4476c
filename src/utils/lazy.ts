/**
 * Build a value on first call and hand back the same value forever after.
 * `init` runs at most once, even when it returns `undefined`.
 */
export function lazy<T>(init: () => T): () => T {
  let built = false;
  let value: T;
  return () => {
    if (!built) {
      value = init();
      built = true;
    }
    return value;
  };
}
