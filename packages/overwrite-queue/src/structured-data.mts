/**
 * Which values the queue may copy by itself.
 *
 * `structuredClone` copies plain data faithfully: primitives, arrays, plain
 * objects, Date, RegExp, Map, Set, ArrayBuffer and typed arrays. It throws on
 * functions and symbols, and it turns class instances into plain objects.
 * Queues whose element type is not plain data must be given a `clone` option.
 */

type Primitive = string | number | boolean | bigint | null | undefined;

type Leaf = Primitive | Date | RegExp | ArrayBuffer | ArrayBufferView;

// recursion stops after this many levels of nesting and accepts what is left
type MaxDepth = 8;

type StructuredDataCheck<T, Depth extends unknown[] = []> = T extends Leaf
  ? true
  : Depth['length'] extends MaxDepth
    ? true
    : T extends (...args: never[]) => unknown
      ? false
      : T extends ReadonlyArray<infer Item>
        ? StructuredDataCheck<Item, [...Depth, unknown]>
        : T extends ReadonlyMap<infer Key, infer Value>
          ? StructuredDataCheck<Key | Value, [...Depth, unknown]>
          : T extends ReadonlySet<infer Item>
            ? StructuredDataCheck<Item, [...Depth, unknown]>
            : T extends object
              ? StructuredDataCheck<T[keyof T], [...Depth, unknown]>
              : false;

/**
 * `true` when every value of type `T` is plain data, `false` when some member
 * is a function, symbol, or an object with methods (class instances, promises).
 *
 * @example
 * ```typescript
 * type A = IsStructuredData<{ at: Date; tags: Set<string> }>; // true
 * type B = IsStructuredData<{ onDone: () => void }>;          // false
 * ```
 */
export type IsStructuredData<T> = false extends StructuredDataCheck<T> ? false : true;

/**
 * Run-time counterpart of {@link IsStructuredData}: whether `structuredClone`
 * would return an equal value of the same shape
 */
export function isStructuredData(value: unknown, seen: Set<object> = new Set()): boolean {
  if (typeof value === 'function' || typeof value === 'symbol') {
    return false;
  }
  if (typeof value !== 'object' || value === null) {
    return true;
  }
  // cycles are preserved by structuredClone
  if (seen.has(value)) {
    return true;
  }
  seen.add(value);

  if (
    value instanceof Date ||
    value instanceof RegExp ||
    value instanceof ArrayBuffer ||
    ArrayBuffer.isView(value)
  ) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every((item) => isStructuredData(item, seen));
  }
  if (value instanceof Map) {
    return [...value].every(
      ([key, entry]) => isStructuredData(key, seen) && isStructuredData(entry, seen)
    );
  }
  if (value instanceof Set) {
    return [...value].every((item) => isStructuredData(item, seen));
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  if (prototype !== Object.prototype && prototype !== null) {
    return false;
  }
  // symbol keys are dropped by structuredClone
  if (Object.getOwnPropertySymbols(value).length > 0) {
    return false;
  }
  return Object.values(value).every((entry) => isStructuredData(entry, seen));
}

/**
 * Default `clone` of a queue: a structured clone of plain data, anything
 * else as given. Never throws and never changes the value's type.
 */
export const copyStructuredData = <T,>(value: T): T =>
  typeof value === 'object' && value !== null && isStructuredData(value)
    ? structuredClone(value)
    : value;
