/**
 * Indices hand out views over a private copy, so nothing built later can
 * add or remove a name.
 */
export function asReadonlyMap<K, V>(map: ReadonlyMap<K, V>): ReadonlyMap<K, V> {
  const snapshot = new Map(map);
  const view: ReadonlyMap<K, V> = Object.freeze({
    get size() {
      return snapshot.size;
    },
    get: (key: K) => snapshot.get(key),
    has: (key: K) => snapshot.has(key),
    forEach: (callbackfn: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown) =>
      snapshot.forEach((value, key) => callbackfn.call(thisArg, value, key, view)),
    entries: () => snapshot.entries(),
    keys: () => snapshot.keys(),
    values: () => snapshot.values(),
    [Symbol.iterator]: () => snapshot[Symbol.iterator](),
  });
  return view;
}

export function freezeReadonlyArray<T>(items: readonly T[]): readonly T[] {
  return Object.freeze([...items]);
}
