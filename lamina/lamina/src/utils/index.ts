/** Memoizes `factory` per key object, without keeping the key alive. */
export function weakMemo<K extends object, V>(factory: (key: K) => V): (key: K) => V {
  const values = new WeakMap<K, V>();
  return (key) => {
    let value = values.get(key);
    if (value === undefined) {
      value = factory(key);
      values.set(key, value);
    }
    return value;
  };
}

export function never(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}

export const isInstanceOfAny = <T extends object>(
  value: unknown,
  constructors: readonly (abstract new (...args: never) => T)[],
): value is T => constructors.some((constructor) => value instanceof constructor);

// Deep copy for plain JSON payloads crossing the draft/wire boundary
export const copyJson = <T>(value: T): T => structuredClone(value);

export const isArrayOf = <E>(value: unknown, is: (item: unknown) => item is E): value is E[] =>
  Array.isArray(value) && value.every((item: unknown) => is(item));
