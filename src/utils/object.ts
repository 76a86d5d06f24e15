/**
 * Returns a shallow copy of the provided record without any `undefined` values.
 *
 * Option bags assembled from optional CLI flags go through it so objects
 * handed to Node APIs never carry explicit `undefined` entries.
 */
export function omitUndefinedEntries<T extends Record<string, unknown>>(
  entries: T,
): Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> {
  const result: Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> = {};
  for (const key of Object.keys(entries) as (keyof T)[]) {
    const value = entries[key];
    if (value !== undefined) {
      result[key] = value as Exclude<T[typeof key], undefined>;
    }
  }
  return result;
}
